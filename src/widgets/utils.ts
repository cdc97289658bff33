import * as T from "../chat/types";

// Identity is the id, never the object
export function isSameUser(
  user: Pick<T.User, "id">,
  other: Pick<T.User, "id"> | null | undefined,
) {
  return Boolean(other && user.id === other.id);
}

export function isAuthor(user: Pick<T.User, "id">, message: T.Message) {
  return isSameUser(user, message.author);
}

export function getUserName(user: T.User): string {
  return `${user.firstName ?? ""} ${user.lastName ?? ""}`.trim();
}

export function getUserInitials(user: T.User): string {
  const first = user.firstName?.trim() ?? "";
  const last = user.lastName?.trim() ?? "";
  return `${first.charAt(0)}${last.charAt(0)}`.toUpperCase();
}

/**
 * Stable color for a user, picked from the palette by the sum of the
 * character codes of the id.
 */
export function getUserAvatarNameColor(user: T.User, colors: string[]): string {
  let sumChars = 0;
  for (let i = 0; i < user.id.length; i += 1) {
    sumChars += user.id.charCodeAt(i);
  }
  return colors[sumChars % colors.length];
}

const BYTE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"];

export function formatBytes(size: number, fractionDigits = 2): string {
  if (size <= 0) {
    return "0 B";
  }
  const multiple = Math.min(
    Math.floor(Math.log(size) / Math.log(1024)),
    BYTE_UNITS.length - 1,
  );
  const value = size / Math.pow(1024, multiple);
  return `${value.toFixed(fractionDigits)} ${BYTE_UNITS[multiple]}`;
}
