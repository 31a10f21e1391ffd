import { adrDirPath, describeConfigSource, resolveConfig } from '@adrs/core';
import { Command } from 'commander';
import { contextFrom, reportErrors, type CommandContext } from '../context.js';

/** The resolved settings as `key: value` lines. */
export function runConfig(ctx: CommandContext): string[] {
  const resolved = resolveConfig({ cwd: ctx.cwd, env: ctx.env, homeDir: ctx.homeDir });
  return [
    `root: ${resolved.root}`,
    `adr_dir: ${adrDirPath(resolved)}`,
    `mode: ${resolved.config.mode}`,
    `source: ${describeConfigSource(resolved)}`,
  ];
}

export const configCommand = new Command('config')
  .description('Show the resolved configuration')
  .action((_options: unknown, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      for (const line of runConfig(ctx)) console.log(line);
    });
  });
