import { formatLinkKind, parseLinkKind, reverseLinkKind } from '@adrs/core';
import { Command } from 'commander';
import { contextFrom, openRepository, reportErrors, type CommandContext } from '../context.js';

/**
 * Link two records, each given by number or title. The reverse kind defaults
 * to the counterpart of `kind`.
 */
export function runLink(
  ctx: CommandContext,
  source: string,
  kind: string,
  target: string,
  reverse?: string,
): void {
  const repo = openRepository(ctx);
  const from = repo.find(source);
  const to = repo.find(target);
  const linkKind = parseLinkKind(kind);
  const reverseKind = reverse === undefined ? reverseLinkKind(linkKind) : parseLinkKind(reverse);

  repo.link(from.number, to.number, linkKind, reverseKind);
  ctx.logger.log?.(
    `Linked ${from.number} ${formatLinkKind(linkKind)} ${to.number} (${formatLinkKind(reverseKind)})`,
  );
}

export const linkCommand = new Command('link')
  .description('Link two decision records')
  .argument('<source>', 'Record number or title')
  .argument('<kind>', 'Link kind from the source, e.g. "Amends"')
  .argument('<target>', 'Record number or title')
  .argument('[reverse]', 'Link kind from the target, e.g. "Amended by"')
  .action(
    (
      source: string,
      kind: string,
      target: string,
      reverse: string | undefined,
      _options: unknown,
      command: Command,
    ) => {
      const ctx = contextFrom(command);
      reportErrors(ctx.logger, () => runLink(ctx, source, kind, target, reverse));
    },
  );
