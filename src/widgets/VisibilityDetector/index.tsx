import React, { useContext, useEffect } from "react";
import { View } from "react-native";

import * as T from "../../chat/types";
import { VisibilityTrackerContext } from "../../context/VisibilityProvider";
import { TEST_ID } from "../Constant";
import { warn } from "../logging";

export const VISIBILITY_THRESHOLD = 0.1;

type Props = {
  message: T.Message;
  onVisibilityChanged: (message: T.Message, visible: boolean) => void;
  children: React.ReactNode;
};

/**
 * Reports every visibility event the tracker delivers for this message as
 * `visibleFraction > VISIBILITY_THRESHOLD`. Holds no state of its own, so a
 * repeated or dropped event only repeats or drops one callback.
 */
export const VisibilityDetector = ({
  message,
  onVisibilityChanged,
  children,
}: Props) => {
  const tracker = useContext(VisibilityTrackerContext);

  useEffect(() => {
    if (!tracker) {
      warn("VisibilityDetector rendered without a VisibilityTrackerProvider");
      return;
    }
    return tracker.observe(message.id, (info) => {
      onVisibilityChanged(message, info.visibleFraction > VISIBILITY_THRESHOLD);
    });
  }, [tracker, message, onVisibilityChanged]);

  return <View testID={TEST_ID.VISIBILITY_DETECTOR}>{children}</View>;
};
