import React from "react";
import { Text, View } from "react-native";
import { render, screen } from "@testing-library/react-native";

import { resolveMessageConfig } from "../../chat/config";
import { defaultChatTheme } from "../../chat/styles";
import { resolveBorderRadii, uniformBorderRadii } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { makeContext, makeFile, makeImage, makeText, ME } from "../fixtures";
import { TextMessage } from "../MessageText";
import { BubbleBuilder, NO_RENDERERS, RenderNode } from "../Models";
import { composeBubble } from ".";

const context = makeContext();
const radii = uniformBorderRadii(20);

/**
 * TEST PLAN
 * - default shell: fill color by authorship and kind, clipped corners
 * - emoji-only text: bare body only when the background is hidden
 * - bubbleBuilder: gets the rendered body and grouping flag, wins over everything
 */
describe("composeBubble", () => {
  describe("[default-shell]", () => {
    it("fills someone else's message with the secondary color", () => {
      render(composeBubble(context, makeText("hi"), resolveMessageConfig(), NO_RENDERERS, radii, false));

      expect(screen.getByTestId(TEST_ID.BUBBLE)).toHaveStyle({
        overflow: "hidden",
        backgroundColor: defaultChatTheme.secondaryColor,
        borderTopLeftRadius: 20,
        borderBottomRightRadius: 20,
      });
      expect(screen.getByTestId(TEST_ID.TEXT_MESSAGE)).toBeTruthy();
    });

    it("fills the current user's message with the primary color", () => {
      render(
        composeBubble(
          context,
          makeFile({ author: ME }),
          resolveMessageConfig(),
          NO_RENDERERS,
          radii,
          false,
        ),
      );

      expect(screen.getByTestId(TEST_ID.BUBBLE)).toHaveStyle({
        backgroundColor: defaultChatTheme.primaryColor,
      });
    });

    it("fills the current user's image with the secondary color", () => {
      render(
        composeBubble(
          context,
          makeImage({ author: ME }),
          resolveMessageConfig(),
          NO_RENDERERS,
          radii,
          false,
        ),
      );

      expect(screen.getByTestId(TEST_ID.BUBBLE)).toHaveStyle({
        backgroundColor: defaultChatTheme.secondaryColor,
      });
    });

    it("applies the given corner radii", () => {
      const squared = resolveBorderRadii(20, {
        currentUserIsAuthor: true,
        roundBorder: false,
        bubbleRtlAlignment: "none",
      });
      render(
        composeBubble(
          context,
          makeText("hi", { author: ME }),
          resolveMessageConfig(),
          NO_RENDERERS,
          squared,
          false,
        ),
      );

      expect(screen.getByTestId(TEST_ID.BUBBLE)).toHaveStyle({
        borderBottomLeftRadius: 20,
        borderBottomRightRadius: 0,
      });
    });
  });

  describe("[bare-emoji]", () => {
    it("returns the bare body for emoji-only text with the background hidden", () => {
      const node = composeBubble(
        context,
        makeText("😀"),
        resolveMessageConfig({ hideBackgroundOnEmojiMessages: true }),
        NO_RENDERERS,
        radii,
        false,
      );

      expect(node.type).toBe(TextMessage);
      render(node);
      expect(screen.queryByTestId(TEST_ID.BUBBLE)).toBeNull();
      expect(screen.getByTestId(TEST_ID.ENLARGED_EMOJI)).toBeTruthy();
    });

    it("keeps the shell when the background is not hidden", () => {
      render(
        composeBubble(
          context,
          makeText("😀"),
          resolveMessageConfig({ hideBackgroundOnEmojiMessages: false }),
          NO_RENDERERS,
          radii,
          false,
        ),
      );

      expect(screen.getByTestId(TEST_ID.BUBBLE)).toBeTruthy();
      expect(screen.getByTestId(TEST_ID.ENLARGED_EMOJI)).toBeTruthy();
    });

    it("keeps the shell when enlargement is off", () => {
      const node = composeBubble(
        context,
        makeText("😀"),
        resolveMessageConfig({ emojiEnlargementBehavior: "never" }),
        NO_RENDERERS,
        radii,
        false,
      );

      expect(node.type).toBe(View);
    });

    it("keeps the shell for text that is not emoji-only", () => {
      const node = composeBubble(
        context,
        makeText("😀 hi"),
        resolveMessageConfig(),
        NO_RENDERERS,
        radii,
        false,
      );

      expect(node.type).toBe(View);
    });
  });

  describe("[override-wins]", () => {
    it("hands the rendered body to the bubble builder", () => {
      const result = <Text>custom bubble</Text>;
      const bubbleBuilder = jest.fn<RenderNode, Parameters<BubbleBuilder>>(() => result);
      const message = makeText("hi");

      const node = composeBubble(
        context,
        message,
        resolveMessageConfig({ roundBorder: true }),
        { bubbleBuilder },
        radii,
        false,
      );

      expect(node).toBe(result);
      expect(bubbleBuilder).toHaveBeenCalledTimes(1);
      const [child, options] = bubbleBuilder.mock.calls[0];
      expect(child.type).toBe(TextMessage);
      expect(options).toEqual({ message, nextMessageInGroup: true });
    });

    it("wins over the bare emoji case", () => {
      const result = <Text>custom bubble</Text>;
      const bubbleBuilder = jest.fn(() => result);

      const node = composeBubble(
        context,
        makeText("😀"),
        resolveMessageConfig({ hideBackgroundOnEmojiMessages: true }),
        { bubbleBuilder },
        radii,
        false,
      );

      expect(node).toBe(result);
    });
  });
});
