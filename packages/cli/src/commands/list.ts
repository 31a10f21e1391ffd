import { Command } from 'commander';
import { relative } from 'node:path';
import { contextFrom, openRepository, reportErrors, type CommandContext } from '../context.js';

/** Record paths relative to the working directory, in number order. */
export function runList(ctx: CommandContext): string[] {
  const repo = openRepository(ctx);
  return repo.list().map((adr) => relative(ctx.cwd, adr.path ?? repo.adrPath()));
}

export const listCommand = new Command('list')
  .description('List decision records')
  .action((_options: unknown, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      for (const line of runList(ctx)) console.log(line);
    });
  });
