import React from "react";
import { ActivityIndicator, StyleSheet, Text, View } from "react-native";

import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { TEST_ID } from "../Constant";
import { warn } from "../logging";

const SENT_GLYPH = "✓";
const SEEN_GLYPH = "✓✓";
const ERROR_GLYPH = "!";

type Props = {
  status?: T.MessageStatus;
  theme: ChatTheme;
};

/**
 * Delivery glyph for the current user's messages. A message without a
 * status, or with one this version does not know, keeps the glyph's slot as
 * an empty spacer.
 */
export const MessageStatus = ({ status, theme }: Props) => {
  if (status === undefined) {
    return <StatusSpacer />;
  }

  switch (status) {
    case "sending":
      return (
        <ActivityIndicator
          testID={TEST_ID.STATUS_SENDING}
          size="small"
          color={theme.primaryColor}
          style={styles.icon}
        />
      );
    case "sent":
    case "delivered":
      return (
        <Text
          testID={TEST_ID.STATUS}
          accessibilityLabel={status}
          style={[styles.glyph, { color: theme.primaryColor }]}
        >
          {SENT_GLYPH}
        </Text>
      );
    case "seen":
      return (
        <Text
          testID={TEST_ID.STATUS}
          accessibilityLabel={status}
          style={[styles.glyph, { color: theme.primaryColor }]}
        >
          {SEEN_GLYPH}
        </Text>
      );
    case "error":
      return (
        <Text
          testID={TEST_ID.STATUS}
          accessibilityLabel={status}
          style={[styles.glyph, { color: theme.errorColor }]}
        >
          {ERROR_GLYPH}
        </Text>
      );
    default:
      warn("Unknown message status", status);
      return <StatusSpacer />;
  }
};

const StatusSpacer = () => (
  <View testID={TEST_ID.STATUS_SPACER} style={styles.spacer} />
);

const styles = StyleSheet.create({
  spacer: {
    width: 8,
  },
  icon: {
    width: 10,
    height: 10,
  },
  glyph: {
    fontSize: 12,
    lineHeight: 16,
    fontWeight: "700",
  },
});
