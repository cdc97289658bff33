export const TEST_ID = {
  MESSAGE: "message",
  MESSAGE_ROW: "message-row",
  MESSAGE_COLUMN: "message-column",
  BUBBLE: "bubble",
  BUBBLE_PRESSABLE: "bubble-pressable",
  EMPTY_BODY: "empty-body",
  REPLY: "replied-message",
  REPLY_LABEL: "replied-message-label",
  REPLY_PADDING: "replied-message-padding",
  REPLY_OPACITY: "replied-message-opacity",
  REPLY_INDICATOR: "replied-message-indicator",
  REPLY_PRESSABLE: "replied-message-pressable",
  REPLY_GAP: "replied-message-gap",
  FITTED_SCALE: "fitted-scale",
  FITTED_SCALE_CONTENT: "fitted-scale-content",
  TEXT_MESSAGE: "text-message",
  ENLARGED_EMOJI: "enlarged-emoji",
  PARSED_TEXT: "parsed-text",
  IMAGE_MESSAGE: "image-message",
  IMAGE_MESSAGE_MINIMIZED: "image-message-minimized",
  FILE_MESSAGE: "file-message",
  STATUS: "message-status",
  STATUS_SLOT: "message-status-slot",
  STATUS_PRESSABLE: "message-status-pressable",
  STATUS_SENDING: "message-status-sending",
  STATUS_SPACER: "message-status-spacer",
  AVATAR: "user-avatar",
  AVATAR_IMAGE: "user-avatar-image",
  AVATAR_SPACER: "user-avatar-spacer",
  USER_NAME: "user-name",
  VISIBILITY_DETECTOR: "visibility-detector",
} as const;
