import { formatStatus, parseStatus } from '@adrs/core';
import { Command } from 'commander';
import {
  contextFrom,
  openRepository,
  parseRecordNumber,
  reportErrors,
  type CommandContext,
} from '../context.js';

export type StatusCommandOptions = {
  by?: number;
};

/** Change a record's status. Returns the rewritten file. */
export function runStatus(
  ctx: CommandContext,
  query: string,
  status: string,
  options: StatusCommandOptions = {},
): string {
  const repo = openRepository(ctx);
  const adr = repo.find(query);
  const next = parseStatus(status);
  const path = repo.setStatus(adr.number, next, options.by);
  ctx.logger.log?.(`ADR ${adr.number} is now ${formatStatus(next)}`);
  return path;
}

export const statusCommand = new Command('status')
  .description("Change a decision record's status")
  .argument('<adr>', 'Record number or title')
  .argument('<status>', 'New status, e.g. Accepted')
  .option('--by <number>', 'Superseding record, with status Superseded', parseRecordNumber)
  .action((query: string, status: string, options: StatusCommandOptions, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      runStatus(ctx, query, status, options);
    });
  });
