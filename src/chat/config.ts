import type { ParseShape } from "react-native-parsed-text";

export type EmojiEnlargementBehavior = "never" | "single" | "multi";

// "left" lays bubbles out by start/end instead of left/right so they follow
// the ambient text direction
export type BubbleRtlAlignment = "none" | "left";

export interface TextMessageOptions {
  // Whether the user can press and hold to select text
  isTextSelectable: boolean;
  onEmailPressed?: (email: string) => void;
  // Replaces opening the link with Linking
  onLinkPressed?: (url: string) => void;
  openOnPreviewImageTap: boolean;
  openOnPreviewTitleTap: boolean;
  // Parsed ahead of the built-in email, url and markdown patterns
  matchers: ParseShape[];
}

export interface MessageConfig {
  emojiEnlargementBehavior: EmojiEnlargementBehavior;
  hideBackgroundOnEmojiMessages: boolean;
  showAvatar: boolean;
  showName: boolean;
  showStatus: boolean;
  showUserAvatars: boolean;
  isLeftStatus: boolean;
  // the next message belongs to the same group, so no corner is squared off
  roundBorder: boolean;
  bubbleRtlAlignment: BubbleRtlAlignment;
  messageWidth: number;
  usePreviewData: boolean;
  textMessageOptions: TextMessageOptions;
  imageHeaders?: Record<string, string>;
  userAgent?: string;
}

export const DEFAULT_TEXT_MESSAGE_OPTIONS: TextMessageOptions = {
  isTextSelectable: true,
  openOnPreviewImageTap: false,
  openOnPreviewTitleTap: false,
  matchers: [],
};

export const MAX_MESSAGE_WIDTH = 440;

export const DEFAULT_MESSAGE_CONFIG: MessageConfig = {
  emojiEnlargementBehavior: "multi",
  hideBackgroundOnEmojiMessages: true,
  showAvatar: false,
  showName: false,
  showStatus: false,
  showUserAvatars: false,
  isLeftStatus: false,
  roundBorder: false,
  bubbleRtlAlignment: "none",
  messageWidth: MAX_MESSAGE_WIDTH,
  usePreviewData: true,
  textMessageOptions: DEFAULT_TEXT_MESSAGE_OPTIONS,
};

export type MessageConfigInput = Partial<Omit<MessageConfig, "textMessageOptions">> & {
  textMessageOptions?: Partial<TextMessageOptions>;
};

// keys set to undefined fall back to the default instead of erasing it
const definedOnly = <V extends object>(value: V): Partial<V> => {
  const out: Partial<V> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      out[key] = value[key];
    }
  }
  return out;
};

export const resolveMessageConfig = (input: MessageConfigInput = {}): MessageConfig => {
  const { textMessageOptions, ...rest } = input;
  return {
    ...DEFAULT_MESSAGE_CONFIG,
    ...definedOnly(rest),
    textMessageOptions: {
      ...DEFAULT_TEXT_MESSAGE_OPTIONS,
      ...definedOnly(textMessageOptions ?? {}),
    },
  };
};

/**
 * Width budget for a bubble on a screen of the given width: a share of the
 * screen, capped at MAX_MESSAGE_WIDTH.
 */
export const getMessageWidth = (screenWidth: number, mobile: boolean): number =>
  Math.floor(Math.min(screenWidth * (mobile ? 0.72 : 0.78), MAX_MESSAGE_WIDTH));
