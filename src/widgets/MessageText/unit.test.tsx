import React from "react";
import { Linking, Text } from "react-native";
import { fireEvent, render, screen, waitFor } from "@testing-library/react-native";

import { DEFAULT_TEXT_MESSAGE_OPTIONS } from "../../chat/config";
import { defaultChatTheme } from "../../chat/styles";
import * as T from "../../chat/types";
import { TEST_ID } from "../Constant";
import type { LinkPreviewBuilderProps } from "../Models";
import { LINK_PATTERN, TextMessage, TextMessageProps } from ".";

const author: T.User = { id: "u2", firstName: "Ada", lastName: "Lovelace" };

const textMessage = (text: string, extra: Partial<T.TextMessage> = {}): T.TextMessage => ({
  id: "t1",
  kind: "text",
  author,
  text,
  ...extra,
});

const renderText = (props: Partial<TextMessageProps> & { message: T.TextMessage }) =>
  render(
    <TextMessage
      theme={defaultChatTheme}
      isOwnMessage={false}
      messageWidth={300}
      showName={false}
      emojiEnlargementBehavior="multi"
      usePreviewData
      options={DEFAULT_TEXT_MESSAGE_OPTIONS}
      {...props}
    />,
  );

describe("LINK_PATTERN", () => {
  it("finds links with a scheme or a www prefix", () => {
    expect(LINK_PATTERN.test("see https://example.com")).toBe(true);
    expect(LINK_PATTERN.test("see www.example.com")).toBe(true);
    expect(LINK_PATTERN.test("no links here.")).toBe(false);
  });
});

describe("TextMessage", () => {
  it("renders parsed text inside the message insets", () => {
    renderText({ message: textMessage("hello there") });

    expect(screen.getByTestId(TEST_ID.TEXT_MESSAGE)).toHaveStyle({
      marginHorizontal: defaultChatTheme.messageInsetsHorizontal,
      marginVertical: defaultChatTheme.messageInsetsVertical,
    });
    expect(screen.getByTestId(TEST_ID.PARSED_TEXT)).toHaveTextContent("hello there");
    expect(screen.queryByTestId(TEST_ID.ENLARGED_EMOJI)).toBeNull();
  });

  it("[enlarged-emoji] renders emoji-only text in the emoji style", () => {
    renderText({ message: textMessage("😀 😀") });

    const emoji = screen.getByTestId(TEST_ID.ENLARGED_EMOJI);
    expect(emoji).toHaveTextContent("😀 😀");
    expect(emoji).toHaveStyle(defaultChatTheme.receivedEmojiMessageTextStyle);
    expect(screen.queryByTestId(TEST_ID.PARSED_TEXT)).toBeNull();
  });

  it("does not enlarge emoji when the policy is never", () => {
    renderText({ message: textMessage("😀"), emojiEnlargementBehavior: "never" });
    expect(screen.queryByTestId(TEST_ID.ENLARGED_EMOJI)).toBeNull();
  });

  it("strips markdown markers and styles the inner text", () => {
    renderText({ message: textMessage("hello *world*") });
    expect(screen.getByText("world")).toHaveStyle({ fontWeight: "bold" });
  });

  it("shows the author's name when asked", () => {
    renderText({ message: textMessage("hi"), showName: true });
    expect(screen.getByTestId(TEST_ID.USER_NAME)).toHaveTextContent("Ada Lovelace");
  });

  it("prefers the caller's name builder", () => {
    const nameBuilder = jest.fn((user: T.User) => <Text>{`@${user.id}`}</Text>);
    renderText({ message: textMessage("hi"), showName: true, nameBuilder });

    expect(nameBuilder).toHaveBeenCalledWith(author);
    expect(screen.getByText("@u2")).toBeTruthy();
    expect(screen.queryByTestId(TEST_ID.USER_NAME)).toBeNull();
  });

  it("hands link presses to the caller", () => {
    const onLinkPressed = jest.fn();
    renderText({
      message: textMessage("read https://example.com/docs now"),
      options: { ...DEFAULT_TEXT_MESSAGE_OPTIONS, onLinkPressed },
    });

    fireEvent.press(screen.getByText("https://example.com/docs"));

    expect(onLinkPressed).toHaveBeenCalledWith("https://example.com/docs");
  });

  it("opens links with Linking by default", async () => {
    const openURL = jest.spyOn(Linking, "openURL").mockResolvedValue(true);
    renderText({ message: textMessage("read https://example.com/docs now") });

    fireEvent.press(screen.getByText("https://example.com/docs"));

    await waitFor(() => expect(openURL).toHaveBeenCalledWith("https://example.com/docs"));
    openURL.mockRestore();
  });

  describe("[link-preview]", () => {
    const previewBuilder = () =>
      jest.fn((props: LinkPreviewBuilderProps) => (
        <Text testID="preview">{props.text}</Text>
      ));

    it("delegates to the link preview builder", () => {
      const linkPreviewBuilder = previewBuilder();
      renderText({
        message: textMessage("look https://example.com"),
        linkPreviewBuilder,
        onPreviewDataFetched: jest.fn(),
        userAgent: "test-agent",
      });

      expect(screen.getByTestId("preview")).toHaveTextContent("look https://example.com");
      expect(screen.queryByTestId(TEST_ID.TEXT_MESSAGE)).toBeNull();
      expect(linkPreviewBuilder).toHaveBeenCalledWith(
        expect.objectContaining({
          width: 300,
          paddingHorizontal: defaultChatTheme.messageInsetsHorizontal,
          paddingVertical: defaultChatTheme.messageInsetsVertical,
          userAgent: "test-agent",
          titleStyle: defaultChatTheme.receivedMessageLinkTitleTextStyle,
        }),
      );
    });

    it("skips the preview when previews are off", () => {
      const linkPreviewBuilder = previewBuilder();
      renderText({
        message: textMessage("look https://example.com"),
        usePreviewData: false,
        linkPreviewBuilder,
        onPreviewDataFetched: jest.fn(),
      });

      expect(linkPreviewBuilder).not.toHaveBeenCalled();
      expect(screen.getByTestId(TEST_ID.TEXT_MESSAGE)).toBeTruthy();
    });

    it("skips the preview when nobody listens for fetched data", () => {
      const linkPreviewBuilder = previewBuilder();
      renderText({ message: textMessage("look https://example.com"), linkPreviewBuilder });
      expect(linkPreviewBuilder).not.toHaveBeenCalled();
    });

    it("skips the preview for text without links", () => {
      const linkPreviewBuilder = previewBuilder();
      renderText({
        message: textMessage("no links"),
        linkPreviewBuilder,
        onPreviewDataFetched: jest.fn(),
      });
      expect(linkPreviewBuilder).not.toHaveBeenCalled();
    });

    it("[fetch-once] reports fetched data only for messages without any", () => {
      const fetched: T.PreviewData = { title: "Example" };

      const withoutData = textMessage("look https://example.com");
      const onFirst = jest.fn();
      const firstBuilder = previewBuilder();
      renderText({
        message: withoutData,
        linkPreviewBuilder: firstBuilder,
        onPreviewDataFetched: onFirst,
      });
      firstBuilder.mock.calls[0][0].onPreviewDataFetched(fetched);
      expect(onFirst).toHaveBeenCalledWith(withoutData, fetched);

      const withData = textMessage("look https://example.com", {
        previewData: { title: "Cached" },
      });
      const onSecond = jest.fn();
      const secondBuilder = previewBuilder();
      renderText({
        message: withData,
        linkPreviewBuilder: secondBuilder,
        onPreviewDataFetched: onSecond,
      });
      secondBuilder.mock.calls[0][0].onPreviewDataFetched(fetched);
      expect(onSecond).not.toHaveBeenCalled();
    });
  });
});
