import React, { useCallback, useState } from "react";
import { LayoutChangeEvent, StyleSheet, View } from "react-native";

import { TEST_ID } from "../Constant";

type Size = { width: number; height: number };

type Props = {
  scale: number;
  children: React.ReactNode;
};

/**
 * Draws its child scaled from the top-left corner and, once the child has
 * been measured, gives back the space the scale freed up so siblings sit
 * against the scaled edge instead of the original one.
 */
export const FittedScale = ({ scale, children }: Props) => {
  const [size, setSize] = useState<Size | null>(null);

  const onLayout = useCallback((e: LayoutChangeEvent) => {
    const { width, height } = e.nativeEvent.layout;
    setSize((prev) =>
      prev && prev.width === width && prev.height === height ? prev : { width, height },
    );
  }, []);

  const shrink = size
    ? {
        marginRight: -size.width * (1 - scale),
        marginBottom: -size.height * (1 - scale),
      }
    : null;

  return (
    <View testID={TEST_ID.FITTED_SCALE} style={styles.container}>
      <View
        testID={TEST_ID.FITTED_SCALE_CONTENT}
        onLayout={onLayout}
        style={[styles.content, { transform: [{ scale }] }, shrink]}
      >
        {children}
      </View>
    </View>
  );
};

const styles = StyleSheet.create({
  container: {
    alignSelf: "flex-start",
  },
  content: {
    transformOrigin: "top left",
  },
});
