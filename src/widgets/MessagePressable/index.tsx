import React, { useCallback, useEffect, useRef } from "react";
import { Pressable } from "react-native";

export const LONG_PRESS_DURATION = 500;

// A second tap inside this window is a double tap
export const DOUBLE_TAP_DELAY = 300;

type Props = {
  testID?: string;
  onTap?: () => void;
  onDoubleTap?: () => void;
  onLongPress?: () => void;
  children: React.ReactNode;
};

/**
 * Press region with tap, double tap and long press.
 *
 * Without an `onDoubleTap` handler taps fire immediately. With one, a single
 * tap waits out DOUBLE_TAP_DELAY so it is never reported alongside the
 * double tap it turned out to start.
 */
export const MessagePressable = ({
  testID,
  onTap,
  onDoubleTap,
  onLongPress,
  children,
}: Props) => {
  const pendingTap = useRef<ReturnType<typeof setTimeout> | null>(null);

  const clearPendingTap = useCallback(() => {
    if (pendingTap.current) {
      clearTimeout(pendingTap.current);
      pendingTap.current = null;
    }
  }, []);

  useEffect(() => clearPendingTap, [clearPendingTap]);

  const handlePress = useCallback(() => {
    if (!onDoubleTap) {
      onTap?.();
      return;
    }
    if (pendingTap.current) {
      clearPendingTap();
      onDoubleTap();
      return;
    }
    pendingTap.current = setTimeout(() => {
      pendingTap.current = null;
      onTap?.();
    }, DOUBLE_TAP_DELAY);
  }, [onTap, onDoubleTap, clearPendingTap]);

  return (
    <Pressable
      testID={testID}
      onPress={handlePress}
      onLongPress={onLongPress}
      delayLongPress={LONG_PRESS_DURATION}
    >
      {children}
    </Pressable>
  );
};
