import type { EmojiEnlargementBehavior } from "../../chat/config";

const BLANK_PATTERN = /^\s*$/;

// one emoji: a flag pair, a keycap, or a pictograph with its modifier, tag
// tail (subdivision flags) and ZWJ joins
const EMOJI_SEQUENCE =
  /\p{Regional_Indicator}{2}|[#*0-9]\uFE0F?\u20E3|(?:\p{Emoji_Presentation}|\p{Extended_Pictographic})(?:\p{Emoji_Modifier}|\uFE0F|[\u{E0020}-\u{E007E}]+\u{E007F})?(?:\u200D(?:\p{Emoji_Presentation}|\p{Extended_Pictographic})(?:\p{Emoji_Modifier}|\uFE0F|[\u{E0020}-\u{E007E}]+\u{E007F})?)*/gu;

/**
 * Splits text into its emoji sequences.
 *
 * ZWJ sequences, flags and skin-tone modifiers each count once. Returns null
 * when the text holds anything other than emoji and whitespace.
 */
export const matchEmojiSequences = (text: string): string[] | null => {
  const rest = text.replace(EMOJI_SEQUENCE, "");
  if (!BLANK_PATTERN.test(rest)) {
    return null;
  }
  return text.match(EMOJI_SEQUENCE) ?? [];
};

/**
 * Whether a text message qualifies for enlarged emoji rendering.
 *
 * - `never`: always false, the text is not scanned
 * - `single`: exactly one emoji sequence, surrounding whitespace ignored
 * - `multi`: one or more emoji sequences, optionally separated by whitespace
 */
export const isEmojiOnly = (
  behavior: EmojiEnlargementBehavior,
  text: string,
): boolean => {
  if (behavior === "never") {
    return false;
  }
  const sequences = matchEmojiSequences(text);
  if (sequences === null || sequences.length === 0) {
    return false;
  }
  return behavior === "single" ? sequences.length === 1 : true;
};
