import {
  AdrIoError,
  adrFilename,
  describeError,
  formatLinkKind,
  fullTitle,
  type Adr,
} from '@adrs/core';
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import { contextFrom, openRepository, reportErrors, type CommandContext } from '../context.js';

export type TocOptions = {
  ordered?: boolean;
  /** Markdown file placed before the list. */
  intro?: string;
  /** Markdown file placed after the list. */
  outro?: string;
  /** Prepended to every link target. */
  prefix?: string;
};

export type GraphOptions = {
  /** Prepended to every node URL. */
  prefix?: string;
  /** Replaces the record file extension in node URLs. */
  extension?: string;
};

/** Markdown list linking every record, in number order. */
export function runGenerateToc(ctx: CommandContext, options: TocOptions = {}): string {
  const adrs = openRepository(ctx).list();
  const prefix = options.prefix ?? '';

  const items = adrs.map((adr, i) => {
    const bullet = options.ordered ? `${i + 1}.` : '*';
    return `${bullet} [${fullTitle(adr)}](${prefix}${fileOf(adr)})`;
  });

  const parts: string[] = [];
  if (options.intro !== undefined) parts.push(readPart(ctx, options.intro, 'intro'));
  if (items.length > 0) parts.push(items.join('\n'));
  if (options.outro !== undefined) parts.push(readPart(ctx, options.outro, 'outro'));
  return parts.join('\n\n');
}

/**
 * Graphviz digraph of the collection. Dotted edges follow the numbering,
 * solid labelled edges follow the links.
 */
export function runGenerateGraph(ctx: CommandContext, options: GraphOptions = {}): string {
  const adrs = openRepository(ctx).list();
  const prefix = options.prefix ?? '';
  const extension = options.extension ?? 'md';

  const lines = ['digraph {', '  node [shape=plaintext];'];
  for (const adr of adrs) {
    const file = fileOf(adr);
    const url = `${prefix}${file.slice(0, file.length - extname(file).length)}.${extension}`;
    lines.push(`  _${adr.number} [label=${quote(fullTitle(adr))}, URL=${quote(url)}];`);
  }

  lines.push('  edge [style=dotted, weight=10];');
  for (let i = 1; i < adrs.length; i++) {
    const prev = adrs[i - 1];
    const next = adrs[i];
    if (prev && next) lines.push(`  _${prev.number} -> _${next.number};`);
  }

  lines.push('  edge [style=solid, weight=1];');
  for (const adr of adrs) {
    for (const link of adr.links) {
      lines.push(`  _${adr.number} -> _${link.target} [label=${quote(formatLinkKind(link.kind))}];`);
    }
  }

  lines.push('}');
  return lines.join('\n');
}

function fileOf(adr: Adr): string {
  return adr.path ? basename(adr.path) : adrFilename(adr.number, adr.title);
}

function quote(text: string): string {
  return `"${text.replace(/["\\]/g, (char) => `\\${char}`)}"`;
}

function readPart(ctx: CommandContext, file: string, label: string): string {
  const path = resolve(ctx.cwd, file);
  try {
    return readFileSync(path, 'utf8').trimEnd();
  } catch (err) {
    throw new AdrIoError(`Failed to read ${label} file ${path}: ${describeError(err)}`, path, err);
  }
}

const tocCommand = new Command('toc')
  .description('Print a Markdown table of contents')
  .option('-o, --ordered', 'Use a numbered list')
  .option('-i, --intro <file>', 'Prepend the content of <file>')
  .option('-O, --outro <file>', 'Append the content of <file>')
  .option('-p, --prefix <prefix>', 'Prefix for record links')
  .action((options: TocOptions, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      console.log(runGenerateToc(ctx, options));
    });
  });

const graphCommand = new Command('graph')
  .description('Print a Graphviz graph of the records and their links')
  .option('-p, --prefix <prefix>', 'Prefix for node URLs')
  .option('-e, --extension <ext>', 'File extension for node URLs', 'md')
  .action((options: GraphOptions, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      console.log(runGenerateGraph(ctx, options));
    });
  });

export const generateCommand = new Command('generate')
  .description('Generate documentation from the decision records')
  .addCommand(tocCommand)
  .addCommand(graphCommand);
