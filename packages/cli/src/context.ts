import { isAdrError, Repository, type Logger } from '@adrs/core';
import { InvalidArgumentError, type Command } from 'commander';
import { resolve } from 'node:path';
import { integer, minValue, pipe, regex, safeParse, string, toNumber } from 'valibot';
import { createConsoleLogger } from './logger.js';

export type GlobalOptions = {
  cwd?: string;
  quiet?: boolean;
};

/**
 * Everything a command needs besides its own arguments.
 */
export type CommandContext = {
  cwd: string;
  logger: Logger;
  env?: Record<string, string | undefined>;
  homeDir?: string;
};

export function contextFrom(command: Command): CommandContext {
  const { cwd, quiet } = command.optsWithGlobals<GlobalOptions>();
  return {
    cwd: resolve(cwd ?? process.cwd()),
    logger: createConsoleLogger({ quiet }),
  };
}

export function openRepository(ctx: CommandContext): Repository {
  return Repository.open({
    cwd: ctx.cwd,
    env: ctx.env,
    homeDir: ctx.homeDir,
    logger: ctx.logger,
  });
}

const recordNumberSchema = pipe(string(), regex(/^\d+$/), toNumber(), integer(), minValue(1));

/** commander argument parser for record numbers. */
export function parseRecordNumber(value: string): number {
  const result = safeParse(recordNumberSchema, value.trim());
  if (!result.success) {
    throw new InvalidArgumentError(`'${value}' is not a record number.`);
  }
  return result.output;
}

/**
 * Report library errors through the logger and mark the process as failed;
 * anything else is a bug and propagates.
 */
export function reportErrors(logger: Logger, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (!isAdrError(err)) throw err;
    logger.error?.(err.message);
    process.exitCode = 1;
  }
}
