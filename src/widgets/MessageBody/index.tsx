import React from "react";
import { StyleSheet, View } from "react-native";

import type { MessageConfig } from "../../chat/config";
import * as T from "../../chat/types";
import { TEST_ID } from "../Constant";
import { warn } from "../logging";
import { FileMessage } from "../MessageFile";
import { ImageMessage } from "../MessageImage";
import { TextMessage } from "../MessageText";
import type { BodyBuilderOptions, MessageRenderers, RenderContext, RenderNode } from "../Models";
import { isAuthor } from "../utils";

// Zero-size stand-in for kinds nobody knows how to draw
export const EmptyBody = () => <View testID={TEST_ID.EMPTY_BODY} style={styles.empty} />;

type BodyArgs = {
  context: RenderContext;
  config: MessageConfig;
  renderers: MessageRenderers;
  options: BodyBuilderOptions;
};

type BodyRenderer<K extends T.MessageKind> = (
  message: T.MessageByKind[K],
  args: BodyArgs,
) => RenderNode;

const BODY_RENDERERS: { [K in T.MessageKind]: BodyRenderer<K> } = {
  text: (message, { context, config, renderers, options }) => {
    // reply previews never spend a line on the name
    const showName = options.isReplyPreview ? false : config.showName;
    if (renderers.textMessageBuilder) {
      return renderers.textMessageBuilder(message, { ...options, showName });
    }
    return (
      <TextMessage
        message={message}
        theme={context.theme}
        isOwnMessage={isAuthor(context.user, message)}
        messageWidth={options.messageWidth}
        showName={showName}
        emojiEnlargementBehavior={config.emojiEnlargementBehavior}
        usePreviewData={config.usePreviewData}
        options={config.textMessageOptions}
        userAgent={config.userAgent}
        nameBuilder={renderers.nameBuilder}
        linkPreviewBuilder={renderers.linkPreviewBuilder}
        onPreviewDataFetched={renderers.onPreviewDataFetched}
      />
    );
  },
  image: (message, { context, config, renderers, options }) => {
    if (renderers.imageMessageBuilder) {
      return renderers.imageMessageBuilder(message, options);
    }
    return (
      <ImageMessage
        message={message}
        theme={context.theme}
        isOwnMessage={isAuthor(context.user, message)}
        messageWidth={options.messageWidth}
        imageHeaders={config.imageHeaders}
      />
    );
  },
  file: (message, { context, renderers, options }) => {
    if (renderers.fileMessageBuilder) {
      return renderers.fileMessageBuilder(message, options);
    }
    return (
      <FileMessage
        message={message}
        theme={context.theme}
        isOwnMessage={isAuthor(context.user, message)}
      />
    );
  },
  audio: (message, { renderers, options }) =>
    renderers.audioMessageBuilder ? (
      renderers.audioMessageBuilder(message, options)
    ) : (
      <EmptyBody />
    ),
  video: (message, { renderers, options }) =>
    renderers.videoMessageBuilder ? (
      renderers.videoMessageBuilder(message, options)
    ) : (
      <EmptyBody />
    ),
  custom: (message, { renderers, options }) =>
    renderers.customMessageBuilder ? (
      renderers.customMessageBuilder(message, options)
    ) : (
      <EmptyBody />
    ),
};

const dispatch = <K extends T.MessageKind>(
  kind: K,
  message: T.MessageByKind[K],
  args: BodyArgs,
): RenderNode => BODY_RENDERERS[kind](message, args);

/**
 * Body content of a message, picked by its kind.
 *
 * Key invariants:
 * - [override-verbatim] a builder for the kind receives the message with
 *   `{ messageWidth, isReplyPreview }` and its result is returned untouched
 * - [empty-fallback] audio, video and custom without a builder, and any kind
 *   this table does not know, render a zero-size EmptyBody and never throw
 * - [reply-hides-name] text in a reply preview is told not to show the name,
 *   whatever the config says
 */
export const renderBody = (
  message: T.Message,
  context: RenderContext,
  config: MessageConfig,
  renderers: MessageRenderers,
  isReplyPreview: boolean,
): RenderNode => {
  // [empty-fallback] messages come off the wire, so the tag may be newer than us
  const kind: string = message.kind;
  if (!T.isMessageKind(kind)) {
    warn("No renderer for message kind", kind, "of", message.id);
    return <EmptyBody />;
  }
  return dispatch(message.kind, message, {
    context,
    config,
    renderers,
    options: { messageWidth: config.messageWidth, isReplyPreview },
  });
};

const styles = StyleSheet.create({
  empty: {
    width: 0,
    height: 0,
  },
});
