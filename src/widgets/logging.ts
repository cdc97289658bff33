export const error = (e: unknown, ...args: unknown[]): void => {
  console.error(...args, e);
};

// development builds only
export const warn = (...args: unknown[]): void => {
  if (__DEV__) {
    console.warn(...args);
  }
};
