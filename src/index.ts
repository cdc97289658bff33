// data types share names with their widgets (TextMessage, MessageStatus)
import * as ChatTypes from "./chat/types";

export { ChatTypes };
export * from "./chat/config";
export * from "./chat/styles";

export { ChatThemeProvider, ThemeContext } from "./context/ThemeProvider";
export { ChatUserProvider, useChatUser } from "./context/UserProvider";
export {
  createVisibilityTracker,
  VisibilityTrackerContext,
  VisibilityTrackerProvider,
} from "./context/VisibilityProvider";
export type {
  VisibilityHub,
  VisibilityInfo,
  VisibilityListener,
  VisibilityTracker,
} from "./context/VisibilityProvider";

export { Message, renderMessage, resolveBubbleMargin } from "./widgets/Message";
export type { MessageProps } from "./widgets/Message";
export { composeReply } from "./widgets/RepliedMessage";
export { composeBubble } from "./widgets/Bubble";
export { EmptyBody, renderBody } from "./widgets/MessageBody";
export * from "./widgets/BubbleStyle";
export { isEmojiOnly, matchEmojiSequences } from "./widgets/emoji";

export { TextMessage, MessageTextBody } from "./widgets/MessageText";
export { ImageMessage, fitImageSize } from "./widgets/MessageImage";
export { FileMessage } from "./widgets/MessageFile";
export { MessageStatus } from "./widgets/MessageStatus";
export { UserAvatar } from "./widgets/UserAvatar";
export { UserName } from "./widgets/UserName";
export { FittedScale } from "./widgets/FittedScale";
export { MessagePressable, DOUBLE_TAP_DELAY, LONG_PRESS_DURATION } from "./widgets/MessagePressable";
export { VisibilityDetector, VISIBILITY_THRESHOLD } from "./widgets/VisibilityDetector";
export { useChatTheme } from "./widgets/hooks/useChatTheme";
export * from "./widgets/Models";
export {
  formatBytes,
  getUserAvatarNameColor,
  getUserInitials,
  getUserName,
  isSameUser,
} from "./widgets/utils";
