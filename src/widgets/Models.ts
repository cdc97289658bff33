import type { ReactElement } from "react";
import type { TextStyle } from "react-native";
import type { EdgeInsets } from "react-native-safe-area-context";

import type { ChatTheme } from "../chat/styles";
import * as T from "../chat/types";

export type RenderNode = ReactElement;

/**
 * Everything a render pass needs from its surroundings. Built fresh for every
 * render by the Message component and threaded through explicitly.
 */
export type RenderContext = {
  user: T.User;
  theme: ChatTheme;
  insets: EdgeInsets;
  isMobile: boolean;
  isRTL: boolean;
};

export type BodyBuilderOptions = {
  messageWidth: number;
  isReplyPreview: boolean;
};

export type TextBodyBuilderOptions = BodyBuilderOptions & {
  showName: boolean;
};

export type BodyBuilder<M extends T.Message> = (
  message: M,
  options: BodyBuilderOptions,
) => RenderNode;

export type BubbleBuilder = (
  child: RenderNode,
  options: { message: T.Message; nextMessageInGroup: boolean },
) => RenderNode;

export type MessageCallback = (context: RenderContext, message: T.Message) => void;

export type LinkPreviewBuilderProps = {
  text: string;
  previewData?: T.PreviewData;
  width: number;
  // the plain text rendering to show alongside the preview
  textNode: RenderNode;
  paddingHorizontal: number;
  paddingVertical: number;
  titleStyle: TextStyle;
  descriptionStyle: TextStyle;
  openOnPreviewImageTap: boolean;
  openOnPreviewTitleTap: boolean;
  userAgent?: string;
  onLinkPressed?: (url: string) => void;
  onPreviewDataFetched: (previewData: T.PreviewData) => void;
};

/**
 * Optional strategy slots. Every slot has a default: builders fall back to the
 * built-in widgets (or an empty node), callbacks to doing nothing.
 */
export type MessageRenderers = {
  textMessageBuilder?: (message: T.TextMessage, options: TextBodyBuilderOptions) => RenderNode;
  imageMessageBuilder?: BodyBuilder<T.ImageMessage>;
  fileMessageBuilder?: BodyBuilder<T.FileMessage>;
  audioMessageBuilder?: BodyBuilder<T.AudioMessage>;
  videoMessageBuilder?: BodyBuilder<T.VideoMessage>;
  customMessageBuilder?: BodyBuilder<T.CustomMessage>;

  bubbleBuilder?: BubbleBuilder;
  customStatusBuilder?: (message: T.Message) => RenderNode;
  avatarBuilder?: (author: T.User) => RenderNode;
  nameBuilder?: (author: T.User) => RenderNode;
  repliedMessageLabelBuilder?: (
    repliedMessage: T.Message,
    currentUserIsAuthorOfReply: boolean,
  ) => RenderNode;
  linkPreviewBuilder?: (props: LinkPreviewBuilderProps) => RenderNode;

  onAvatarTap?: (author: T.User) => void;
  onMessageTap?: MessageCallback;
  onMessageDoubleTap?: MessageCallback;
  onMessageLongPress?: MessageCallback;
  onMessageStatusTap?: MessageCallback;
  onMessageStatusLongPress?: MessageCallback;
  onRepliedMessageTap?: MessageCallback;
  onMessageVisibilityChanged?: (message: T.Message, visible: boolean) => void;
  onPreviewDataFetched?: (message: T.TextMessage, previewData: T.PreviewData) => void;
};

export const NO_RENDERERS: Readonly<MessageRenderers> = Object.freeze({});
