import {
  parseLinkKind,
  reverseLinkKind,
  type Adr,
  type LinkKind,
} from '@adrs/core';
import { Command, InvalidArgumentError } from 'commander';
import {
  contextFrom,
  openRepository,
  parseRecordNumber,
  reportErrors,
  type CommandContext,
} from '../context.js';

/** `--link 5:Amends:Amended by` */
export type LinkSpec = {
  target: number;
  kind: LinkKind;
  reverse: LinkKind;
};

export type NewCommandOptions = {
  supersedes?: number;
  link?: LinkSpec[];
};

/**
 * Parse `target:kind[:reverse]`. Without a reverse kind the usual counterpart
 * of `kind` is used.
 */
export function parseLinkSpec(value: string): LinkSpec {
  const [target = '', kind = '', reverse, ...extra] = value.split(':');
  if (!kind.trim() || extra.length > 0 || reverse?.trim() === '') {
    throw new InvalidArgumentError(`'${value}' is not of the form target:kind[:reverse].`);
  }
  const linkKind = parseLinkKind(kind.trim());
  return {
    target: parseRecordNumber(target),
    kind: linkKind,
    reverse: reverse === undefined ? reverseLinkKind(linkKind) : parseLinkKind(reverse.trim()),
  };
}

function collectLinkSpec(value: string, previous: LinkSpec[] = []): LinkSpec[] {
  return [...previous, parseLinkSpec(value)];
}

/**
 * Create a record, optionally superseding another and linking to others.
 * Link targets are checked before anything is written.
 */
export function runNew(ctx: CommandContext, title: string, options: NewCommandOptions = {}): Adr {
  const repo = openRepository(ctx);
  const links = options.link ?? [];
  for (const link of links) repo.get(link.target);

  const adr =
    options.supersedes === undefined ? repo.newAdr(title) : repo.supersede(title, options.supersedes);
  for (const link of links) {
    repo.link(adr.number, link.target, link.kind, link.reverse);
  }

  ctx.logger.log?.(`Created ADR ${adr.number}: ${adr.title}`);
  return repo.get(adr.number);
}

export const newCommand = new Command('new')
  .description('Create a new decision record')
  .argument('<title...>', 'Title of the decision')
  .option('-s, --supersedes <number>', 'Record this one supersedes', parseRecordNumber)
  .option('-l, --link <target:kind:reverse>', 'Link to another record (repeatable)', collectLinkSpec)
  .action((title: string[], options: NewCommandOptions, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      const adr = runNew(ctx, title.join(' '), options);
      console.log(adr.path);
    });
  });
