import React from "react";
import { StyleSheet, Text, View } from "react-native";

import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { resolveTextStyles } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { formatBytes } from "../utils";

const ICON_SIZE = 42;

// "report.final.pdf" -> "PDF", anything without an extension -> "FILE"
export const getFileBadge = (name: string): string => {
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) {
    return "FILE";
  }
  return name.slice(dot + 1, dot + 5).toUpperCase();
};

type Props = {
  message: T.FileMessage;
  theme: ChatTheme;
  isOwnMessage: boolean;
};

export const FileMessage = ({ message, theme, isOwnMessage }: Props) => {
  const text = resolveTextStyles(theme, isOwnMessage);
  const iconColor = isOwnMessage
    ? theme.sentMessageDocumentIconColor
    : theme.receivedMessageDocumentIconColor;

  return (
    <View
      testID={TEST_ID.FILE_MESSAGE}
      accessibilityLabel="Document"
      style={[
        styles.container,
        {
          marginHorizontal: theme.messageInsetsHorizontal,
          marginVertical: theme.messageInsetsVertical,
        },
      ]}
    >
      <View style={styles.icon}>
        <View style={[styles.iconBackground, { backgroundColor: iconColor }]} />
        <Text style={[styles.badge, { color: iconColor }]}>
          {getFileBadge(message.name)}
        </Text>
      </View>
      <View style={styles.details}>
        <Text style={text.body} numberOfLines={2}>
          {message.name}
        </Text>
        <Text style={[text.caption, styles.size]}>{formatBytes(message.size)}</Text>
      </View>
    </View>
  );
};

const styles = StyleSheet.create({
  container: {
    flexDirection: "row",
    alignItems: "center",
  },
  icon: {
    width: ICON_SIZE,
    height: ICON_SIZE,
    borderRadius: ICON_SIZE / 2,
    overflow: "hidden",
    alignItems: "center",
    justifyContent: "center",
  },
  iconBackground: {
    ...StyleSheet.absoluteFillObject,
    opacity: 0.2,
  },
  badge: {
    fontSize: 10,
    fontWeight: "800",
  },
  details: {
    flexShrink: 1,
    marginStart: 16,
  },
  size: {
    marginTop: 4,
  },
});
