import React, { createContext } from "react";

export type VisibilityInfo = {
  key: string;
  visibleFraction: number;
};

export type VisibilityListener = (info: VisibilityInfo) => void;

/**
 * Whatever measures on-screen visibility (a list's viewability config, an
 * intersection observer on web) reports through one of these. Listeners are
 * called once per published event, in publish order.
 */
export interface VisibilityTracker {
  observe(key: string, listener: VisibilityListener): () => void;
}

export type VisibilityHub = VisibilityTracker & {
  publish(key: string, visibleFraction: number): void;
};

export const createVisibilityTracker = (): VisibilityHub => {
  const listeners = new Map<string, Set<VisibilityListener>>();

  return {
    observe(key, listener) {
      const forKey = listeners.get(key) ?? new Set<VisibilityListener>();
      forKey.add(listener);
      listeners.set(key, forKey);
      return () => {
        forKey.delete(listener);
        if (forKey.size === 0) {
          listeners.delete(key);
        }
      };
    },
    publish(key, visibleFraction) {
      const forKey = listeners.get(key);
      if (!forKey) {
        return;
      }
      // copy: a listener may unsubscribe while we iterate
      for (const listener of Array.from(forKey)) {
        listener({ key, visibleFraction });
      }
    },
  };
};

export const VisibilityTrackerContext = createContext<VisibilityTracker | null>(null);

export const VisibilityTrackerProvider: React.FC<{
  tracker: VisibilityTracker;
  children: React.ReactNode;
}> = ({ tracker, children }) => (
  <VisibilityTrackerContext.Provider value={tracker}>
    {children}
  </VisibilityTrackerContext.Provider>
);
