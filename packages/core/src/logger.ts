/**
 * Where the library reports progress (`log`), skipped files (`warn`) and
 * failures (`error`). A missing sink discards that kind of message.
 */
export type Logger = {
  log?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

/** Discards everything; the default for a `Repository`. */
export const silentLogger: Logger = {};
