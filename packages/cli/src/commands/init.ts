import { Repository } from '@adrs/core';
import { Command } from 'commander';
import { contextFrom, reportErrors, type CommandContext } from '../context.js';

export type InitCommandOptions = {
  ng?: boolean;
};

/**
 * Create a collection under the working directory. Returns the path of the
 * first record.
 */
export function runInit(
  ctx: CommandContext,
  directory: string | undefined,
  options: InitCommandOptions = {},
): string {
  const repo = Repository.init(ctx.cwd, {
    directory,
    mode: options.ng ? 'ng' : 'compatible',
    logger: ctx.logger,
  });
  ctx.logger.log?.(`Initialized ADR directory at ${repo.adrPath()}`);
  const [first] = repo.list();
  return first?.path ?? repo.adrPath();
}

export const initCommand = new Command('init')
  .description('Initialize the ADR directory and record the first decision')
  .argument('[directory]', 'Directory for the records, relative to the working directory')
  .option('--ng', 'Write structured records with a YAML metadata block', false)
  .action((directory: string | undefined, options: InitCommandOptions, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      console.log(runInit(ctx, directory, options));
    });
  });
