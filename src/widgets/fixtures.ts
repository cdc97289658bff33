// Shared message and context builders for the widget tests
import { defaultChatTheme } from "../chat/styles";
import * as T from "../chat/types";
import type { RenderContext } from "./Models";

export const ME: T.User = { id: "me", firstName: "Test", lastName: "Viewer" };
export const THEM: T.User = { id: "them", firstName: "Ada", lastName: "Lovelace" };

export const makeContext = (overrides: Partial<RenderContext> = {}): RenderContext => ({
  user: ME,
  theme: defaultChatTheme,
  insets: { top: 0, right: 0, bottom: 0, left: 0 },
  isMobile: true,
  isRTL: false,
  ...overrides,
});

export const makeText = (
  text: string,
  extra: Partial<Omit<T.TextMessage, "kind">> = {},
): T.TextMessage => ({
  id: "text-1",
  kind: "text",
  author: THEM,
  text,
  ...extra,
});

export const makeImage = (extra: Partial<Omit<T.ImageMessage, "kind">> = {}): T.ImageMessage => ({
  id: "image-1",
  kind: "image",
  author: THEM,
  uri: "https://example.com/photo.jpg",
  name: "photo.jpg",
  size: 4096,
  width: 800,
  height: 600,
  ...extra,
});

export const makeFile = (extra: Partial<Omit<T.FileMessage, "kind">> = {}): T.FileMessage => ({
  id: "file-1",
  kind: "file",
  author: THEM,
  uri: "file:///tmp/notes.txt",
  name: "notes.txt",
  size: 512,
  ...extra,
});

export const makeAudio = (extra: Partial<Omit<T.AudioMessage, "kind">> = {}): T.AudioMessage => ({
  id: "audio-1",
  kind: "audio",
  author: THEM,
  uri: "file:///tmp/voice.m4a",
  name: "voice.m4a",
  size: 1024,
  duration: 3000,
  ...extra,
});

export const makeVideo = (extra: Partial<Omit<T.VideoMessage, "kind">> = {}): T.VideoMessage => ({
  id: "video-1",
  kind: "video",
  author: THEM,
  uri: "file:///tmp/clip.mp4",
  name: "clip.mp4",
  size: 2048,
  ...extra,
});

export const makeCustom = (extra: Partial<Omit<T.CustomMessage, "kind">> = {}): T.CustomMessage => ({
  id: "custom-1",
  kind: "custom",
  author: THEM,
  ...extra,
});
