import React, { createContext, useContext } from "react";

import * as T from "../chat/types";

const UserContext = createContext<T.User | null>(null);

export const ChatUserProvider: React.FC<{
  user: T.User;
  children: React.ReactNode;
}> = ({ user, children }) => (
  <UserContext.Provider value={user}>{children}</UserContext.Provider>
);

// Every message needs to know who is looking at it
export const useChatUser = (): T.User => {
  const user = useContext(UserContext);
  if (!user) {
    throw new Error("useChatUser must be used within a ChatUserProvider");
  }
  return user;
};
