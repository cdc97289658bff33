import React from "react";
import { Linking, StyleSheet, Text, View } from "react-native";
import ParsedText, { ParseShape } from "react-native-parsed-text";

import type { EmojiEnlargementBehavior, TextMessageOptions } from "../../chat/config";
import { ChatTheme, CODE_FONT_FAMILY } from "../../chat/styles";
import * as T from "../../chat/types";
import { MessageTextStyles, resolveTextStyles } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { isEmojiOnly } from "../emoji";
import { error } from "../logging";
import type { LinkPreviewBuilderProps, RenderNode } from "../Models";
import { UserName } from "../UserName";

const WWW_URL_PATTERN = /^www\./i;

// Enough of a link to be worth asking for a preview
export const LINK_PATTERN = /(?:https?:\/\/|www\.)[^\s]+\.[^\s]+/i;

const BOLD_PATTERN = /\*([^*\n]+)\*/;
const ITALIC_PATTERN = /_([^_\n]+)_/;
const LINE_THROUGH_PATTERN = /~([^~\n]+)~/;
const CODE_PATTERN = /`([^`\n]+)`/;

const renderInner = (_matchingString: string, matches: string[]): string => matches[1];

export const onUrlPress = (url: string) => {
  const cleanUrl = url.replace(/\.$/, "");
  // react-native-parsed-text matches "www.example.com" but Linking cannot
  // open it without a scheme
  if (WWW_URL_PATTERN.test(cleanUrl)) {
    onUrlPress(`https://${cleanUrl}`);
  } else {
    Linking.openURL(cleanUrl).catch((e) => {
      error(e, "No handler for URL:", cleanUrl);
    });
  }
};

const onEmailPress = (email: string) =>
  Linking.openURL(`mailto:${email}`).catch((e) =>
    error(e, "No handler for mailto"),
  );

/**
 * Message text with links, emails and the inline markdown subset
 * (`*bold*`, `_italic_`, `~strike~`, `` `code` ``). Caller matchers run first.
 */
export const MessageTextBody = ({
  text,
  styles: textStyles,
  options,
}: {
  text: string;
  styles: MessageTextStyles;
  options: TextMessageOptions;
}) => {
  const { body } = textStyles;
  const linkStyle = textStyles.link ?? [body, styles.underline];
  const onLinkPressed = options.onLinkPressed ?? onUrlPress;
  const onEmailPressed = options.onEmailPressed ?? onEmailPress;

  const parse: ParseShape[] = [
    ...options.matchers,
    {
      type: "email",
      style: linkStyle,
      onPress: (email: string) => onEmailPressed(email),
    },
    {
      type: "url",
      style: linkStyle,
      onPress: (url: string) => onLinkPressed(url),
    },
    {
      pattern: BOLD_PATTERN,
      renderText: renderInner,
      style: textStyles.bold ?? [body, styles.bold],
    },
    {
      pattern: ITALIC_PATTERN,
      renderText: renderInner,
      style: [body, styles.italic],
    },
    {
      pattern: LINE_THROUGH_PATTERN,
      renderText: renderInner,
      style: [body, styles.lineThrough],
    },
    {
      pattern: CODE_PATTERN,
      renderText: renderInner,
      style: textStyles.code ?? [body, styles.code],
    },
  ];

  return (
    <ParsedText
      testID={TEST_ID.PARSED_TEXT}
      selectable={options.isTextSelectable}
      style={body}
      parse={parse}
    >
      {text}
    </ParsedText>
  );
};

export type TextMessageProps = {
  message: T.TextMessage;
  theme: ChatTheme;
  isOwnMessage: boolean;
  messageWidth: number;
  showName: boolean;
  emojiEnlargementBehavior: EmojiEnlargementBehavior;
  usePreviewData: boolean;
  options: TextMessageOptions;
  userAgent?: string;
  nameBuilder?: (author: T.User) => RenderNode;
  linkPreviewBuilder?: (props: LinkPreviewBuilderProps) => RenderNode;
  onPreviewDataFetched?: (message: T.TextMessage, previewData: T.PreviewData) => void;
};

/**
 * Body of a text message.
 *
 * Key invariants:
 * - [enlarged-emoji] emoji-only text under the enlargement policy renders as
 *   a single Text in the emoji style, without markdown parsing
 * - [link-preview] a preview is delegated to `linkPreviewBuilder` only when
 *   previews are enabled, someone listens for fetched data and the text
 *   holds a link
 * - [fetch-once] fetched preview data is reported only while the message has
 *   none of its own
 */
export const TextMessage = ({
  message,
  theme,
  isOwnMessage,
  messageWidth,
  showName,
  emojiEnlargementBehavior,
  usePreviewData,
  options,
  userAgent,
  nameBuilder,
  linkPreviewBuilder,
  onPreviewDataFetched,
}: TextMessageProps) => {
  const textStyles = resolveTextStyles(theme, isOwnMessage);
  const enlargeEmojis = isEmojiOnly(emojiEnlargementBehavior, message.text);

  const renderText = (enlarge: boolean) => (
    <View>
      {showName
        ? (nameBuilder?.(message.author) ?? (
            <UserName author={message.author} theme={theme} />
          ))
        : null}
      {enlarge ? (
        <Text
          testID={TEST_ID.ENLARGED_EMOJI}
          selectable={options.isTextSelectable}
          style={textStyles.emoji}
        >
          {message.text}
        </Text>
      ) : (
        <MessageTextBody text={message.text} styles={textStyles} options={options} />
      )}
    </View>
  );

  // [link-preview]
  if (
    usePreviewData &&
    onPreviewDataFetched &&
    linkPreviewBuilder &&
    LINK_PATTERN.test(message.text)
  ) {
    return linkPreviewBuilder({
      text: message.text,
      previewData: message.previewData,
      width: messageWidth,
      textNode: renderText(false),
      paddingHorizontal: theme.messageInsetsHorizontal,
      paddingVertical: theme.messageInsetsVertical,
      titleStyle: textStyles.linkTitle,
      descriptionStyle: textStyles.linkDescription,
      openOnPreviewImageTap: options.openOnPreviewImageTap,
      openOnPreviewTitleTap: options.openOnPreviewTitleTap,
      userAgent,
      onLinkPressed: options.onLinkPressed,
      onPreviewDataFetched: (previewData) => {
        // [fetch-once]
        if (!message.previewData) {
          onPreviewDataFetched(message, previewData);
        }
      },
    });
  }

  return (
    <View
      testID={TEST_ID.TEXT_MESSAGE}
      style={{
        marginHorizontal: theme.messageInsetsHorizontal,
        marginVertical: theme.messageInsetsVertical,
      }}
    >
      {renderText(enlargeEmojis)}
    </View>
  );
};

const styles = StyleSheet.create({
  underline: {
    textDecorationLine: "underline",
  },
  bold: {
    fontWeight: "bold",
  },
  italic: {
    fontStyle: "italic",
  },
  lineThrough: {
    textDecorationLine: "line-through",
  },
  code: {
    fontFamily: CODE_FONT_FAMILY,
  },
});
