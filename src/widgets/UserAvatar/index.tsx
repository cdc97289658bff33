import React from "react";
import { Image, StyleSheet, Text, TouchableOpacity, View } from "react-native";

import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { TEST_ID } from "../Constant";
import { getUserAvatarNameColor, getUserInitials } from "../utils";

export const AVATAR_SIZE = 32;

type Props = {
  author: T.User;
  theme: ChatTheme;
  onAvatarTap?: (author: T.User) => void;
};

/**
 * Round avatar beside received messages: the user's image when there is
 * one, otherwise their initials on a color picked from their id.
 */
export const UserAvatar = ({ author, theme, onAvatarTap }: Props) => {
  const color = getUserAvatarNameColor(author, theme.userAvatarNameColors);

  return (
    <TouchableOpacity
      testID={TEST_ID.AVATAR}
      style={styles.container}
      disabled={!onAvatarTap}
      onPress={() => onAvatarTap?.(author)}
    >
      {author.imageUrl ? (
        <Image
          testID={TEST_ID.AVATAR_IMAGE}
          source={{ uri: author.imageUrl }}
          style={[
            styles.avatar,
            { backgroundColor: theme.userAvatarImageBackgroundColor },
          ]}
        />
      ) : (
        <View style={[styles.avatar, styles.center, { backgroundColor: color }]}>
          <Text style={theme.userAvatarTextStyle}>{getUserInitials(author)}</Text>
        </View>
      )}
    </TouchableOpacity>
  );
};

const styles = StyleSheet.create({
  container: {
    marginEnd: 8,
  },
  avatar: {
    width: AVATAR_SIZE,
    height: AVATAR_SIZE,
    borderRadius: AVATAR_SIZE / 2,
  },
  center: {
    alignItems: "center",
    justifyContent: "center",
  },
});
