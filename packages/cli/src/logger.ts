import type { Logger } from '@adrs/core';

export type ConsoleLoggerOptions = {
  /** Drop progress messages such as `Wrote <path>`. */
  quiet?: boolean;
};

/**
 * Progress goes to stdout next to command output; warnings and errors go to
 * stderr even under `--quiet`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    log: options.quiet ? undefined : (msg) => console.log(msg),
    warn: (msg) => console.warn(`warning: ${msg}`),
    error: (msg) => console.error(`error: ${msg}`),
  };
}

/**
 * Logger that records every message, for tests and callers that render
 * messages themselves.
 */
export function createMemoryLogger(): Logger & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    log: (msg) => messages.push(msg),
    warn: (msg) => messages.push(`warning: ${msg}`),
    error: (msg) => messages.push(`error: ${msg}`),
  };
}
