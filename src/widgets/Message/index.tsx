import React, { useContext } from "react";
import { I18nManager, Pressable, StyleSheet, View, ViewStyle } from "react-native";
import { EdgeInsets, SafeAreaInsetsContext } from "react-native-safe-area-context";

import { MessageConfig, MessageConfigInput, resolveMessageConfig } from "../../chat/config";
import * as T from "../../chat/types";
import { useChatUser } from "../../context/UserProvider";
import { isMobile } from "../../util";
import { composeBubble } from "../Bubble";
import { resolveBorderRadii, uniformBorderRadii } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { useChatTheme } from "../hooks/useChatTheme";
import { MessagePressable } from "../MessagePressable";
import { MessageStatus } from "../MessageStatus";
import { MessageRenderers, NO_RENDERERS, RenderContext, RenderNode } from "../Models";
import { composeReply } from "../RepliedMessage";
import { UserAvatar } from "../UserAvatar";
import { isAuthor } from "../utils";
import { VisibilityDetector } from "../VisibilityDetector";

export const AVATAR_SPACER_WIDTH = 40;
export const REPLY_GAP = 6;
const BUBBLE_MARGIN_BOTTOM = 4;
const BUBBLE_MARGIN_START = 20;

const ZERO_INSETS: EdgeInsets = { top: 0, right: 0, bottom: 0, left: 0 };

/**
 * Outer margin of a message row: the theme's `bubbleMargin` when set,
 * otherwise a small gap below and room on the start side, widened by the
 * safe-area insets on phones.
 */
export const resolveBubbleMargin = (
  context: RenderContext,
  config: MessageConfig,
): ViewStyle => {
  if (context.theme.bubbleMargin) {
    return context.theme.bubbleMargin;
  }
  const start = BUBBLE_MARGIN_START + (context.isMobile ? context.insets.left : 0);
  const end = context.isMobile ? context.insets.right : 0;

  return config.bubbleRtlAlignment === "left"
    ? { marginBottom: BUBBLE_MARGIN_BOTTOM, marginStart: start, marginEnd: end }
    : { marginBottom: BUBBLE_MARGIN_BOTTOM, marginLeft: start, marginRight: end };
};

const renderAvatarSlot = (
  context: RenderContext,
  message: T.Message,
  config: MessageConfig,
  renderers: MessageRenderers,
): RenderNode => {
  // keeps grouped messages lined up under the one that shows the avatar
  if (!config.showAvatar) {
    return <View testID={TEST_ID.AVATAR_SPACER} style={styles.avatarSpacer} />;
  }
  if (renderers.avatarBuilder) {
    return renderers.avatarBuilder(message.author);
  }
  return (
    <UserAvatar
      author={message.author}
      theme={context.theme}
      onAvatarTap={renderers.onAvatarTap}
    />
  );
};

const renderStatus = (
  context: RenderContext,
  message: T.Message,
  config: MessageConfig,
  renderers: MessageRenderers,
): RenderNode | null => {
  if (!config.showStatus) {
    return null;
  }
  const { onMessageStatusTap, onMessageStatusLongPress, customStatusBuilder } = renderers;

  return (
    <View testID={TEST_ID.STATUS_SLOT} style={context.theme.statusIconPadding}>
      <Pressable
        testID={TEST_ID.STATUS_PRESSABLE}
        onPress={() => onMessageStatusTap?.(context, message)}
        onLongPress={() => onMessageStatusLongPress?.(context, message)}
      >
        {customStatusBuilder ? (
          customStatusBuilder(message)
        ) : (
          <MessageStatus status={message.status} theme={context.theme} />
        )}
      </Pressable>
    </View>
  );
};

/**
 * Full row for one message: avatar, status and the bubble column with the
 * reply preview above the bubble.
 *
 * Key invariants:
 * - [author-by-id] the current user is the author iff the ids match
 * - [row-order] [avatar or spacer] [status if on the left] [column]
 *   [status if on the right], laid out left to right unless
 *   `bubbleRtlAlignment` is "left", which follows the ambient direction
 * - [status-side] status shows only for the current user's messages and
 *   only with `showStatus`
 * - [avatar-slot] only for other people's messages with `showUserAvatars`;
 *   without `showAvatar` it is a fixed-width spacer
 * - [reply-depth] the reply preview draws `message.repliedMessage` only
 * - [callbacks] bubble presses report the message, reply presses the
 *   replied message, each with this render's context
 */
export const renderMessage = (
  context: RenderContext,
  message: T.Message,
  config: MessageConfig,
  renderers: MessageRenderers = NO_RENDERERS,
): RenderNode => {
  const { theme } = context;
  // [author-by-id]
  const currentUserIsAuthor = isAuthor(context.user, message);
  const isRtlBiased = config.bubbleRtlAlignment === "left";

  const borderRadii = resolveBorderRadii(theme.messageBorderRadius, {
    currentUserIsAuthor,
    roundBorder: config.roundBorder,
    bubbleRtlAlignment: config.bubbleRtlAlignment,
  });

  const {
    onMessageTap,
    onMessageDoubleTap,
    onMessageLongPress,
    onRepliedMessageTap,
    onMessageVisibilityChanged,
  } = renderers;

  const replied = message.repliedMessage;
  const bubble = composeBubble(context, message, config, renderers, borderRadii, false);
  const alignment = currentUserIsAuthor ? styles.alignEnd : styles.alignStart;

  return (
    <View
      testID={TEST_ID.MESSAGE}
      style={[alignment, isRtlBiased ? null : styles.ltr, resolveBubbleMargin(context, config)]}
    >
      <View testID={TEST_ID.MESSAGE_ROW} style={styles.row}>
        {/* [avatar-slot] */}
        {!currentUserIsAuthor && config.showUserAvatars
          ? renderAvatarSlot(context, message, config, renderers)
          : null}
        {/* [status-side] */}
        {currentUserIsAuthor && config.isLeftStatus
          ? renderStatus(context, message, config, renderers)
          : null}
        <View
          testID={TEST_ID.MESSAGE_COLUMN}
          style={[alignment, { maxWidth: config.messageWidth }]}
        >
          {/* [reply-depth] */}
          {replied ? (
            <MessagePressable
              testID={TEST_ID.REPLY_PRESSABLE}
              onTap={onRepliedMessageTap ? () => onRepliedMessageTap(context, replied) : undefined}
            >
              {composeReply(
                context,
                replied,
                config,
                renderers,
                uniformBorderRadii(theme.messageBorderRadius),
                currentUserIsAuthor,
              )}
            </MessagePressable>
          ) : null}
          {replied ? <View testID={TEST_ID.REPLY_GAP} style={styles.replyGap} /> : null}
          {/* [callbacks] */}
          <MessagePressable
            testID={TEST_ID.BUBBLE_PRESSABLE}
            onTap={onMessageTap ? () => onMessageTap(context, message) : undefined}
            onDoubleTap={
              onMessageDoubleTap ? () => onMessageDoubleTap(context, message) : undefined
            }
            onLongPress={
              onMessageLongPress ? () => onMessageLongPress(context, message) : undefined
            }
          >
            {onMessageVisibilityChanged ? (
              <VisibilityDetector
                message={message}
                onVisibilityChanged={onMessageVisibilityChanged}
              >
                {bubble}
              </VisibilityDetector>
            ) : (
              bubble
            )}
          </MessagePressable>
        </View>
        {currentUserIsAuthor && !config.isLeftStatus
          ? renderStatus(context, message, config, renderers)
          : null}
      </View>
    </View>
  );
};

export type MessageProps = {
  message: T.Message;
  config?: MessageConfigInput;
  renderers?: MessageRenderers;
};

// Reads the surroundings once per render and hands them to renderMessage
export const Message = ({ message, config, renderers = NO_RENDERERS }: MessageProps) => {
  const theme = useChatTheme();
  const user = useChatUser();
  const insets = useContext(SafeAreaInsetsContext) ?? ZERO_INSETS;

  const context: RenderContext = {
    user,
    theme,
    insets,
    isMobile: isMobile(),
    isRTL: I18nManager.isRTL,
  };

  return renderMessage(context, message, resolveMessageConfig(config), renderers);
};

const styles = StyleSheet.create({
  ltr: {
    direction: "ltr",
  },
  alignStart: {
    alignItems: "flex-start",
  },
  alignEnd: {
    alignItems: "flex-end",
  },
  row: {
    flexDirection: "row",
    alignItems: "flex-end",
  },
  avatarSpacer: {
    width: AVATAR_SPACER_WIDTH,
  },
  replyGap: {
    height: REPLY_GAP,
  },
});
