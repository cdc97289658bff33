import { useContext } from "react";

import { ThemeContext } from "../../context/ThemeProvider";
import type { ChatTheme } from "../../chat/styles";

export const useChatTheme = (): ChatTheme => {
  const { theme } = useContext(ThemeContext);
  return theme;
};
