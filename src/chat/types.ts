export type SUUID = string;

export type User = {
  id: SUUID;
  firstName?: string;
  lastName?: string;
  imageUrl?: string;
};

export type MessageStatus = "sending" | "sent" | "delivered" | "seen" | "error";

export type PreviewDataImage = {
  url: string;
  width: number;
  height: number;
};

export type PreviewData = {
  title?: string;
  description?: string;
  image?: PreviewDataImage;
  link?: string;
};

type BaseMessage = {
  id: SUUID;
  author: User;
  status?: MessageStatus;
  // only one level of this chain is ever rendered
  repliedMessage?: Message | null;
  createdAt?: number;
  metadata?: Record<string, unknown>;
};

export type TextMessage = BaseMessage & {
  kind: "text";
  text: string;
  previewData?: PreviewData;
};

export type ImageMessage = BaseMessage & {
  kind: "image";
  uri: string;
  name: string;
  size: number;
  width?: number;
  height?: number;
};

export type FileMessage = BaseMessage & {
  kind: "file";
  uri: string;
  name: string;
  size: number;
  mimeType?: string;
};

export type AudioMessage = BaseMessage & {
  kind: "audio";
  uri: string;
  name: string;
  size: number;
  // milliseconds
  duration: number;
  mimeType?: string;
};

export type VideoMessage = BaseMessage & {
  kind: "video";
  uri: string;
  name: string;
  size: number;
  width?: number;
  height?: number;
};

export type CustomMessage = BaseMessage & {
  kind: "custom";
};

export type MessageByKind = {
  text: TextMessage;
  image: ImageMessage;
  file: FileMessage;
  audio: AudioMessage;
  video: VideoMessage;
  custom: CustomMessage;
};

export type MessageKind = keyof MessageByKind;

export type Message = MessageByKind[MessageKind];

export const MESSAGE_KINDS: readonly MessageKind[] = [
  "text",
  "image",
  "file",
  "audio",
  "video",
  "custom",
];

export const isMessageKind = (kind: string): kind is MessageKind =>
  (MESSAGE_KINDS as readonly string[]).includes(kind);
