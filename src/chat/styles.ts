import { Platform, TextStyle, ViewStyle } from "react-native";

const NEUTRAL = {
  n0: "#1d1c21",
  n1: "#615e6e",
  n2: "#9e9cab",
  n7: "#ffffff",
};

const PRIMARY = "#6f61e8";
const SECONDARY_LIGHT = "#f5f5f7";
const SECONDARY_DARK = "#2b2250";
const ERROR = "#ff6767";

export const AVATAR_COLORS = [
  "#ff6767",
  "#66e0da",
  "#f5a2d9",
  "#f0c722",
  "#6a85e5",
  "#fd9a6f",
  "#92db6e",
  "#73b8e5",
  "#fd7590",
  "#c78ae5",
];

export const CODE_FONT_FAMILY = Platform.select({
  ios: "Courier",
  default: "monospace",
});

/**
 * Named style tokens consumed by the message widgets.
 *
 * Values are applied as given. `sent*` tokens style messages written by the
 * current user, `received*` tokens everyone else's.
 */
export type ChatTheme = {
  primaryColor: string;
  secondaryColor: string;
  errorColor: string;

  messageBorderRadius: number;
  messageInsetsHorizontal: number;
  messageInsetsVertical: number;
  // replaces the computed outer margin of every message row when set
  bubbleMargin?: ViewStyle;
  statusIconPadding: ViewStyle;

  repliedMessageIndicatorColor: string;
  repliedMessageScaleFactor: number;

  userAvatarNameColors: string[];
  userAvatarImageBackgroundColor: string;
  userAvatarTextStyle: TextStyle;
  userNameTextStyle: TextStyle;

  sentMessageBodyTextStyle: TextStyle;
  receivedMessageBodyTextStyle: TextStyle;
  sentMessageBodyLinkTextStyle?: TextStyle;
  receivedMessageBodyLinkTextStyle?: TextStyle;
  sentMessageBodyBoldTextStyle?: TextStyle;
  receivedMessageBodyBoldTextStyle?: TextStyle;
  sentMessageBodyCodeTextStyle?: TextStyle;
  receivedMessageBodyCodeTextStyle?: TextStyle;
  sentEmojiMessageTextStyle: TextStyle;
  receivedEmojiMessageTextStyle: TextStyle;
  sentMessageCaptionTextStyle: TextStyle;
  receivedMessageCaptionTextStyle: TextStyle;
  sentMessageLinkTitleTextStyle: TextStyle;
  receivedMessageLinkTitleTextStyle: TextStyle;
  sentMessageLinkDescriptionTextStyle: TextStyle;
  receivedMessageLinkDescriptionTextStyle: TextStyle;
  sentMessageDocumentIconColor: string;
  receivedMessageDocumentIconColor: string;
};

const BODY_TEXT: TextStyle = {
  fontSize: 16,
  fontWeight: "500",
  lineHeight: 24,
};

const CAPTION_TEXT: TextStyle = {
  fontSize: 12,
  fontWeight: "500",
  lineHeight: 16,
};

const LINK_TITLE_TEXT: TextStyle = {
  fontSize: 16,
  fontWeight: "800",
  lineHeight: 22,
};

const LINK_DESCRIPTION_TEXT: TextStyle = {
  fontSize: 14,
  fontWeight: "400",
  lineHeight: 19,
};

const EMOJI_TEXT: TextStyle = { fontSize: 40 };

export const defaultChatTheme: ChatTheme = {
  primaryColor: PRIMARY,
  secondaryColor: SECONDARY_LIGHT,
  errorColor: ERROR,

  messageBorderRadius: 20,
  messageInsetsHorizontal: 20,
  messageInsetsVertical: 16,
  statusIconPadding: { paddingHorizontal: 4 },

  repliedMessageIndicatorColor: PRIMARY,
  repliedMessageScaleFactor: 0.8,

  userAvatarNameColors: AVATAR_COLORS,
  userAvatarImageBackgroundColor: "transparent",
  userAvatarTextStyle: {
    color: NEUTRAL.n7,
    fontSize: 12,
    fontWeight: "800",
    lineHeight: 16,
  },
  userNameTextStyle: { fontSize: 12, fontWeight: "800", lineHeight: 16 },

  sentMessageBodyTextStyle: { ...BODY_TEXT, color: NEUTRAL.n7 },
  receivedMessageBodyTextStyle: { ...BODY_TEXT, color: NEUTRAL.n0 },
  sentMessageBodyCodeTextStyle: {
    ...BODY_TEXT,
    color: NEUTRAL.n7,
    fontFamily: CODE_FONT_FAMILY,
  },
  receivedMessageBodyCodeTextStyle: {
    ...BODY_TEXT,
    color: NEUTRAL.n0,
    fontFamily: CODE_FONT_FAMILY,
  },
  sentEmojiMessageTextStyle: EMOJI_TEXT,
  receivedEmojiMessageTextStyle: EMOJI_TEXT,
  sentMessageCaptionTextStyle: { ...CAPTION_TEXT, color: NEUTRAL.n7 },
  receivedMessageCaptionTextStyle: { ...CAPTION_TEXT, color: NEUTRAL.n2 },
  sentMessageLinkTitleTextStyle: { ...LINK_TITLE_TEXT, color: NEUTRAL.n7 },
  receivedMessageLinkTitleTextStyle: { ...LINK_TITLE_TEXT, color: NEUTRAL.n0 },
  sentMessageLinkDescriptionTextStyle: {
    ...LINK_DESCRIPTION_TEXT,
    color: NEUTRAL.n7,
  },
  receivedMessageLinkDescriptionTextStyle: {
    ...LINK_DESCRIPTION_TEXT,
    color: NEUTRAL.n0,
  },
  sentMessageDocumentIconColor: NEUTRAL.n7,
  receivedMessageDocumentIconColor: PRIMARY,
};

export const darkChatTheme: ChatTheme = {
  ...defaultChatTheme,
  secondaryColor: SECONDARY_DARK,
  repliedMessageIndicatorColor: NEUTRAL.n2,
  receivedMessageBodyTextStyle: { ...BODY_TEXT, color: NEUTRAL.n7 },
  receivedMessageBodyCodeTextStyle: {
    ...BODY_TEXT,
    color: NEUTRAL.n7,
    fontFamily: CODE_FONT_FAMILY,
  },
  receivedMessageCaptionTextStyle: { ...CAPTION_TEXT, color: NEUTRAL.n1 },
  receivedMessageLinkTitleTextStyle: { ...LINK_TITLE_TEXT, color: NEUTRAL.n7 },
  receivedMessageLinkDescriptionTextStyle: {
    ...LINK_DESCRIPTION_TEXT,
    color: NEUTRAL.n7,
  },
};
