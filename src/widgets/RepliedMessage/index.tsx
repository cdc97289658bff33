import React from "react";
import { StyleSheet, View } from "react-native";

import type { MessageConfig } from "../../chat/config";
import * as T from "../../chat/types";
import { composeBubble } from "../Bubble";
import type { BorderRadii } from "../BubbleStyle";
import { TEST_ID } from "../Constant";
import { FittedScale } from "../FittedScale";
import type { MessageRenderers, RenderContext, RenderNode } from "../Models";

export const REPLY_OPACITY = 0.69;
const INDICATOR_WIDTH = 4;
const INDICATOR_GAP = 12;

/**
 * Preview of the message being replied to, drawn above the reply.
 *
 * Key invariants:
 * - [one-level] only `repliedMessage` itself is drawn, never its own
 *   `repliedMessage`, since composeBubble does not look at that field
 * - [padding-then-scale] the 12-unit gap to the indicator is applied outside
 *   the opacity and scale layers, so it is never scaled down
 * - [indicator-side] the bar sits on the left when someone else wrote the
 *   reply and on the right when the current user did
 */
export const composeReply = (
  context: RenderContext,
  repliedMessage: T.Message,
  config: MessageConfig,
  renderers: MessageRenderers,
  borderRadii: BorderRadii,
  isAuthorOfReply: boolean,
): RenderNode => {
  const { theme } = context;
  const labelBuilder = renderers.repliedMessageLabelBuilder;

  return (
    <View
      testID={TEST_ID.REPLY}
      style={isAuthorOfReply ? styles.alignEnd : styles.alignStart}
    >
      {labelBuilder ? (
        <View testID={TEST_ID.REPLY_LABEL} style={styles.label}>
          {labelBuilder(repliedMessage, isAuthorOfReply)}
        </View>
      ) : null}
      <View>
        <View
          testID={TEST_ID.REPLY_PADDING}
          style={isAuthorOfReply ? styles.gapRight : styles.gapLeft}
        >
          <View testID={TEST_ID.REPLY_OPACITY} style={styles.faded}>
            <FittedScale scale={theme.repliedMessageScaleFactor}>
              {composeBubble(context, repliedMessage, config, renderers, borderRadii, true)}
            </FittedScale>
          </View>
        </View>
        <View
          testID={TEST_ID.REPLY_INDICATOR}
          style={[
            styles.indicator,
            isAuthorOfReply ? styles.indicatorRight : styles.indicatorLeft,
            { backgroundColor: theme.repliedMessageIndicatorColor },
          ]}
        />
      </View>
    </View>
  );
};

const styles = StyleSheet.create({
  alignStart: {
    alignItems: "flex-start",
  },
  alignEnd: {
    alignItems: "flex-end",
  },
  label: {
    paddingBottom: 8,
  },
  gapLeft: {
    paddingLeft: INDICATOR_GAP,
  },
  gapRight: {
    paddingRight: INDICATOR_GAP,
  },
  faded: {
    opacity: REPLY_OPACITY,
  },
  indicator: {
    position: "absolute",
    top: 0,
    bottom: 0,
    width: INDICATOR_WIDTH,
    borderRadius: 2,
  },
  indicatorLeft: {
    left: 0,
  },
  indicatorRight: {
    right: 0,
  },
});
