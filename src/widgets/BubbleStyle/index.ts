import type { TextStyle, ViewStyle } from "react-native";

import type { BubbleRtlAlignment } from "../../chat/config";
import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { assertNever } from "../../util";

export type AbsoluteBorderRadii = {
  direction: "absolute";
  topLeft: number;
  topRight: number;
  bottomLeft: number;
  bottomRight: number;
};

export type DirectionalBorderRadii = {
  direction: "directional";
  topStart: number;
  topEnd: number;
  bottomStart: number;
  bottomEnd: number;
};

export type BorderRadii = AbsoluteBorderRadii | DirectionalBorderRadii;

/**
 * Corner radii of a message bubble.
 *
 * Key invariants:
 * - [top-corners-round] both top corners always get the full radius
 * - [outward-corner] the bottom corner on the bubble's own side of the
 *   conversation (right/end for the current user, left/start for everyone
 *   else) is squared off
 * - [grouped-round] `roundBorder` rounds both bottom corners regardless of
 *   authorship
 * - [directional-mode] `bubbleRtlAlignment === "left"` returns start/end
 *   corners that follow the ambient text direction
 */
export const resolveBorderRadii = (
  radius: number,
  {
    currentUserIsAuthor,
    roundBorder,
    bubbleRtlAlignment,
  }: {
    currentUserIsAuthor: boolean;
    roundBorder: boolean;
    bubbleRtlAlignment: BubbleRtlAlignment;
  },
): BorderRadii => {
  const leading = currentUserIsAuthor || roundBorder ? radius : 0;
  const trailing = !currentUserIsAuthor || roundBorder ? radius : 0;

  if (bubbleRtlAlignment === "left") {
    return {
      direction: "directional",
      topStart: radius,
      topEnd: radius,
      bottomStart: leading,
      bottomEnd: trailing,
    };
  }
  return {
    direction: "absolute",
    topLeft: radius,
    topRight: radius,
    bottomLeft: leading,
    bottomRight: trailing,
  };
};

export const uniformBorderRadii = (radius: number): BorderRadii => ({
  direction: "absolute",
  topLeft: radius,
  topRight: radius,
  bottomLeft: radius,
  bottomRight: radius,
});

export const borderRadiiToStyle = (radii: BorderRadii): ViewStyle => {
  switch (radii.direction) {
    case "absolute":
      return {
        borderTopLeftRadius: radii.topLeft,
        borderTopRightRadius: radii.topRight,
        borderBottomLeftRadius: radii.bottomLeft,
        borderBottomRightRadius: radii.bottomRight,
      };
    case "directional":
      return {
        borderTopStartRadius: radii.topStart,
        borderTopEndRadius: radii.topEnd,
        borderBottomStartRadius: radii.bottomStart,
        borderBottomEndRadius: radii.bottomEnd,
      };
    default:
      return assertNever(radii);
  }
};

// Images and other people's messages sit on the secondary surface
export const resolveFillColor = (
  theme: ChatTheme,
  kind: T.MessageKind,
  isOwnMessage: boolean,
): string =>
  kind === "image" || !isOwnMessage ? theme.secondaryColor : theme.primaryColor;

export type BubbleStyle = {
  fillColor: string;
  borderRadii: BorderRadii;
};

/**
 * Shell style for a bubble, or null when no shell is drawn at all: a caller
 * override owns the whole bubble, or the message is emoji-only with the
 * background hidden.
 */
export const resolveBubbleStyle = (
  theme: ChatTheme,
  {
    kind,
    isOwnMessage,
    hasCustomOverride,
    hideBackground,
    borderRadii,
  }: {
    kind: T.MessageKind;
    isOwnMessage: boolean;
    hasCustomOverride: boolean;
    hideBackground: boolean;
    borderRadii: BorderRadii;
  },
): BubbleStyle | null => {
  if (hasCustomOverride || hideBackground) {
    return null;
  }
  return {
    fillColor: resolveFillColor(theme, kind, isOwnMessage),
    borderRadii,
  };
};

export type MessageTextStyles = {
  body: TextStyle;
  link?: TextStyle;
  bold?: TextStyle;
  code?: TextStyle;
  emoji: TextStyle;
  caption: TextStyle;
  linkTitle: TextStyle;
  linkDescription: TextStyle;
};

export const resolveTextStyles = (
  theme: ChatTheme,
  isOwnMessage: boolean,
): MessageTextStyles =>
  isOwnMessage
    ? {
        body: theme.sentMessageBodyTextStyle,
        link: theme.sentMessageBodyLinkTextStyle,
        bold: theme.sentMessageBodyBoldTextStyle,
        code: theme.sentMessageBodyCodeTextStyle,
        emoji: theme.sentEmojiMessageTextStyle,
        caption: theme.sentMessageCaptionTextStyle,
        linkTitle: theme.sentMessageLinkTitleTextStyle,
        linkDescription: theme.sentMessageLinkDescriptionTextStyle,
      }
    : {
        body: theme.receivedMessageBodyTextStyle,
        link: theme.receivedMessageBodyLinkTextStyle,
        bold: theme.receivedMessageBodyBoldTextStyle,
        code: theme.receivedMessageBodyCodeTextStyle,
        emoji: theme.receivedEmojiMessageTextStyle,
        caption: theme.receivedMessageCaptionTextStyle,
        linkTitle: theme.receivedMessageLinkTitleTextStyle,
        linkDescription: theme.receivedMessageLinkDescriptionTextStyle,
      };
