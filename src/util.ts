import { Platform } from "react-native";

export const isMobile = (): boolean =>
  Platform.OS === "android" || Platform.OS === "ios";

export function assertNever(x: never): never {
  throw new Error("Unexpected object: " + x);
}
