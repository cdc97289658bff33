import React from "react";
import { StyleSheet, Text } from "react-native";

import type { ChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { TEST_ID } from "../Constant";
import { getUserAvatarNameColor, getUserName } from "../utils";

type Props = {
  author: T.User;
  theme: ChatTheme;
};

// Author's name above a received message, in the author's avatar color
export const UserName = ({ author, theme }: Props) => {
  const name = getUserName(author);
  if (!name) {
    return null;
  }
  const color = getUserAvatarNameColor(author, theme.userAvatarNameColors);
  return (
    <Text
      testID={TEST_ID.USER_NAME}
      numberOfLines={1}
      style={[theme.userNameTextStyle, styles.name, { color }]}
    >
      {name}
    </Text>
  );
};

const styles = StyleSheet.create({
  name: {
    paddingBottom: 6,
  },
});
