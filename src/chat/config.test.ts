import {
  DEFAULT_MESSAGE_CONFIG,
  DEFAULT_TEXT_MESSAGE_OPTIONS,
  getMessageWidth,
  MAX_MESSAGE_WIDTH,
  resolveMessageConfig,
} from "./config";

describe("resolveMessageConfig", () => {
  it("returns the defaults for an empty input", () => {
    expect(resolveMessageConfig()).toEqual(DEFAULT_MESSAGE_CONFIG);
  });

  it("overrides only the given flags", () => {
    const config = resolveMessageConfig({ showStatus: true, roundBorder: true });
    expect(config.showStatus).toBe(true);
    expect(config.roundBorder).toBe(true);
    expect(config.emojiEnlargementBehavior).toBe("multi");
    expect(config.hideBackgroundOnEmojiMessages).toBe(true);
  });

  it("keeps the default for keys passed as undefined", () => {
    const config = resolveMessageConfig({
      messageWidth: undefined,
      showStatus: undefined,
      textMessageOptions: { isTextSelectable: undefined },
    });
    expect(config.messageWidth).toBe(MAX_MESSAGE_WIDTH);
    expect(config.showStatus).toBe(false);
    expect(config.textMessageOptions).toEqual(DEFAULT_TEXT_MESSAGE_OPTIONS);
  });

  it("merges text options one level deep", () => {
    const onLinkPressed = jest.fn();
    const config = resolveMessageConfig({ textMessageOptions: { onLinkPressed } });
    expect(config.textMessageOptions).toEqual({
      ...DEFAULT_TEXT_MESSAGE_OPTIONS,
      onLinkPressed,
    });
  });
});

describe("getMessageWidth", () => {
  it("takes 72% of a phone screen", () => {
    expect(getMessageWidth(400, true)).toBe(288);
  });

  it("takes 78% of a larger screen, capped", () => {
    expect(getMessageWidth(500, false)).toBe(390);
    expect(getMessageWidth(1200, false)).toBe(MAX_MESSAGE_WIDTH);
  });
});
