import React from "react";
import { Image, StyleSheet, Text, View } from "react-native";

import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { resolveTextStyles } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { formatBytes } from "../utils";

const THUMBNAIL_SIZE = 64;
const MIN_ASPECT_RATIO = 0.1;
const MAX_ASPECT_RATIO = 10;

export const getAspectRatio = (width?: number, height?: number): number =>
  width && height && width > 0 && height > 0 ? width / height : 1;

// Panoramas and slivers are shown as a thumbnail row instead
export const isMinimizedImage = (aspectRatio: number): boolean =>
  aspectRatio < MIN_ASPECT_RATIO || aspectRatio > MAX_ASPECT_RATIO;

/**
 * Size of a full-width image in a bubble of `messageWidth`: the whole width,
 * at the image's aspect ratio, never taller than `messageWidth`.
 */
export const fitImageSize = (
  width: number | undefined,
  height: number | undefined,
  messageWidth: number,
): { width: number; height: number } => {
  const aspectRatio = getAspectRatio(width, height);
  return {
    width: messageWidth,
    height: Math.min(messageWidth / aspectRatio, messageWidth),
  };
};

type Props = {
  message: T.ImageMessage;
  theme: ChatTheme;
  isOwnMessage: boolean;
  messageWidth: number;
  imageHeaders?: Record<string, string>;
};

export const ImageMessage = ({
  message,
  theme,
  isOwnMessage,
  messageWidth,
  imageHeaders,
}: Props) => {
  const source = { uri: message.uri, headers: imageHeaders };
  const aspectRatio = getAspectRatio(message.width, message.height);

  if (isMinimizedImage(aspectRatio)) {
    const text = resolveTextStyles(theme, isOwnMessage);
    return (
      <View
        testID={TEST_ID.IMAGE_MESSAGE_MINIMIZED}
        style={[
          styles.minimized,
          {
            marginHorizontal: theme.messageInsetsHorizontal,
            marginVertical: theme.messageInsetsVertical,
          },
        ]}
      >
        <Image source={source} style={styles.thumbnail} />
        <View style={styles.details}>
          <Text style={text.body} numberOfLines={2}>
            {message.name}
          </Text>
          <Text style={[text.caption, styles.size]}>{formatBytes(message.size)}</Text>
        </View>
      </View>
    );
  }

  return (
    <Image
      testID={TEST_ID.IMAGE_MESSAGE}
      accessibilityLabel={message.name}
      source={source}
      resizeMode="cover"
      style={fitImageSize(message.width, message.height, messageWidth)}
    />
  );
};

const styles = StyleSheet.create({
  minimized: {
    flexDirection: "row",
    alignItems: "center",
  },
  thumbnail: {
    width: THUMBNAIL_SIZE,
    height: THUMBNAIL_SIZE,
    borderRadius: 15,
  },
  details: {
    flexShrink: 1,
    marginStart: 16,
  },
  size: {
    marginTop: 4,
  },
});
