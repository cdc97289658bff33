import React from "react";
import { StyleSheet, View } from "react-native";

import type { MessageConfig } from "../../chat/config";
import * as T from "../../chat/types";
import { BorderRadii, borderRadiiToStyle, resolveBubbleStyle } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { isEmojiOnly } from "../emoji";
import { renderBody } from "../MessageBody";
import type { MessageRenderers, RenderContext, RenderNode } from "../Models";
import { isAuthor } from "../utils";

/**
 * One message's body in its bubble shell.
 *
 * Exactly one of these comes back:
 * - [override-wins] the caller's `bubbleBuilder` result, given the rendered
 *   body, the message and whether the next message continues the group.
 *   This takes precedence over every other branch, the emoji case included
 * - [bare-emoji] the body itself, unwrapped, when the text is emoji-only and
 *   `hideBackgroundOnEmojiMessages` is set
 * - [default-shell] the body in a View clipped to `borderRadii` and filled
 *   with the resolved bubble color
 */
export const composeBubble = (
  context: RenderContext,
  message: T.Message,
  config: MessageConfig,
  renderers: MessageRenderers,
  borderRadii: BorderRadii,
  isReplyPreview: boolean,
): RenderNode => {
  const body = renderBody(message, context, config, renderers, isReplyPreview);

  const enlargeEmojis =
    message.kind === "text" &&
    isEmojiOnly(config.emojiEnlargementBehavior, message.text);

  const style = resolveBubbleStyle(context.theme, {
    kind: message.kind,
    isOwnMessage: isAuthor(context.user, message),
    hasCustomOverride: renderers.bubbleBuilder !== undefined,
    hideBackground: enlargeEmojis && config.hideBackgroundOnEmojiMessages,
    borderRadii,
  });

  // [override-wins]
  if (renderers.bubbleBuilder) {
    return renderers.bubbleBuilder(body, {
      message,
      nextMessageInGroup: config.roundBorder,
    });
  }

  // [bare-emoji]
  if (!style) {
    return body;
  }

  // [default-shell]
  return (
    <View
      testID={TEST_ID.BUBBLE}
      style={[
        styles.shell,
        borderRadiiToStyle(style.borderRadii),
        { backgroundColor: style.fillColor },
      ]}
    >
      {body}
    </View>
  );
};

const styles = StyleSheet.create({
  shell: {
    overflow: "hidden",
  },
});
