import React, { createContext } from "react";
import { useColorScheme } from "react-native";

import { ChatTheme, darkChatTheme, defaultChatTheme } from "../chat/styles";

type ThemeContextType = {
  theme: ChatTheme;
};

export const ThemeContext = createContext<ThemeContextType>({
  theme: defaultChatTheme,
});

/**
 * Supplies the chat theme to every message below it.
 *
 * Without an explicit `theme` the preset follows the system color scheme.
 */
export const ChatThemeProvider: React.FC<{
  theme?: ChatTheme;
  children: React.ReactNode;
}> = ({ theme, children }) => {
  const systemColorScheme = useColorScheme();
  const resolved =
    theme ?? (systemColorScheme === "dark" ? darkChatTheme : defaultChatTheme);

  return (
    <ThemeContext.Provider value={{ theme: resolved }}>
      {children}
    </ThemeContext.Provider>
  );
};
