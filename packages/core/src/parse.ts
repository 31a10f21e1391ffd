import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import {
  array,
  integer,
  looseObject,
  minValue,
  nullable,
  number,
  optional,
  pipe,
  safeParse,
  string,
  type BaseIssue,
} from 'valibot';
import { parse as parseYaml } from 'yaml';
import { AdrFormatError, AdrIoError, describeError } from './errors.js';
import {
  Status,
  formatStatus,
  isSameStatus,
  parseIsoDate,
  parseLinkKind,
  parseStatus,
  today,
  type Adr,
  type AdrLink,
  type AdrStatus,
} from './types.js';

export type DocumentFormat = 'structured' | 'legacy';

/**
 * A parsed document before a record number has been settled. Legacy
 * documents whose heading carries no number rely on their filename.
 */
export type ParsedAdr = Omit<Adr, 'number'> & { number?: number };

export type ParseOptions = {
  /** Source file; supplies the number when the text does not. */
  path?: string;
};

export type SafeParseResult =
  | { success: true; adr: Adr }
  | { success: false; error: AdrFormatError };

const METADATA_DELIMITER = '---';

/**
 * `Supersedes [1. Use MySQL](0001-use-mysql.md)`, optionally followed by
 * `: description`. Brackets inside the label are backslash-escaped.
 */
const STATUS_LINK =
  /^([\w\s-]+?)\s+\[(\d+)\.\s+(?:\\.|[^\]\\])+\]\((\d{4,})-[^)]+\.md\)(?::\s*(.*))?$/;

const NUMBERED_TITLE = /^(\d+)\. (.*)$/;

const FILENAME_NUMBER = /^(\d{4,})-/;

const DATE_LINE = /^Date:\s*(.*)$/;

const STATUS_WORDS = new Set([
  'proposed',
  'accepted',
  'deprecated',
  'superseded',
  'superceded',
  'draft',
  'rejected',
]);

export function detectFormat(text: string): DocumentFormat {
  const [first = ''] = splitLines(text);
  return first.trimEnd() === METADATA_DELIMITER ? 'structured' : 'legacy';
}

/**
 * Parse document text into record fields. Throws {@link AdrFormatError} for a
 * malformed metadata block; legacy documents always parse.
 */
export function parseDocument(text: string): ParsedAdr {
  return detectFormat(text) === 'structured' ? parseStructured(text) : parseLegacy(text);
}

export function parseAdr(text: string, options: ParseOptions = {}): Adr {
  const { path } = options;
  let parsed: ParsedAdr;
  try {
    parsed = parseDocument(text);
  } catch (err) {
    if (path && err instanceof AdrFormatError && err.path === undefined) {
      throw new AdrFormatError(err.reason, path);
    }
    throw err;
  }

  const number = parsed.number ?? (path ? numberFromFilename(basename(path)) : undefined);
  if (number === undefined) {
    throw new AdrFormatError(
      path ? 'cannot extract ADR number from filename' : 'document does not state an ADR number',
      path,
    );
  }

  return { ...parsed, number, ...(path === undefined ? {} : { path }) };
}

export function safeParseAdr(text: string, options: ParseOptions = {}): SafeParseResult {
  try {
    return { success: true, adr: parseAdr(text, options) };
  } catch (err) {
    if (err instanceof AdrFormatError) return { success: false, error: err };
    throw err;
  }
}

export function parseAdrFile(path: string): Adr {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new AdrIoError(`Failed to read ${path}: ${describeError(err)}`, path, err);
  }
  return parseAdr(text, { path });
}

export function numberFromFilename(filename: string): number | undefined {
  const match = FILENAME_NUMBER.exec(filename);
  if (!match) return undefined;
  const n = Number(match[1]);
  return n > 0 ? n : undefined;
}

// ============================================================================
// Structured documents (YAML metadata block + body)
// ============================================================================

const metadataLinkSchema = looseObject({
  target: pipe(number(), integer(), minValue(1)),
  kind: string(),
  description: optional(nullable(string())),
});

const metadataSchema = looseObject({
  number: optional(pipe(number(), integer(), minValue(1))),
  title: optional(string()),
  date: optional(string()),
  status: optional(nullable(string())),
  links: optional(nullable(array(metadataLinkSchema))),
});

function describeIssues(issues: readonly BaseIssue<unknown>[]): string {
  return issues
    .map((issue) => {
      const key = issue.path?.map((item) => String(item.key)).join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function parseStructured(text: string): ParsedAdr {
  const lines = splitLines(text);
  const end = lines.findIndex((line, i) => i > 0 && line.trimEnd() === METADATA_DELIMITER);
  if (end === -1) {
    throw new AdrFormatError('metadata block is not closed');
  }

  let raw: unknown;
  try {
    raw = parseYaml(lines.slice(1, end).join('\n'));
  } catch (err) {
    throw new AdrFormatError(`metadata is not valid YAML: ${describeError(err)}`);
  }

  const result = safeParse(metadataSchema, raw ?? {});
  if (!result.success) {
    throw new AdrFormatError(`invalid metadata: ${describeIssues(result.issues)}`);
  }
  const meta = result.output;

  const bodyLines = lines.slice(end + 1);
  const title = meta.title ?? findTitle(bodyLines)?.title;
  if (title === undefined) {
    throw new AdrFormatError('metadata has no title');
  }

  let date = today();
  if (meta.date !== undefined) {
    const parsedDate = parseIsoDate(meta.date);
    if (!parsedDate) throw new AdrFormatError(`invalid date '${meta.date}'`);
    date = parsedDate;
  }

  let status: AdrStatus = Status.Proposed;
  if (meta.status !== undefined) status = parseStatus(meta.status ?? '');

  const links: AdrLink[] = (meta.links ?? []).map((link) => {
    const parsed: AdrLink = { target: link.target, kind: parseLinkKind(link.kind) };
    if (link.description != null) parsed.description = link.description;
    return parsed;
  });

  const adr: ParsedAdr = {
    title,
    date,
    status,
    links,
    context: '',
    decision: '',
    consequences: '',
  };
  if (meta.number !== undefined) adr.number = meta.number;

  for (const [name, content] of extractSections(bodyLines)) {
    applyBodySection(adr, name, content);
  }
  return adr;
}

// ============================================================================
// Legacy documents (adr-tools headings)
// ============================================================================

function parseLegacy(text: string): ParsedAdr {
  const lines = splitLines(text);
  const adr: ParsedAdr = {
    title: '',
    date: today(),
    status: Status.Proposed,
    links: [],
    context: '',
    decision: '',
    consequences: '',
  };

  const heading = findTitle(lines);
  if (heading) {
    adr.title = heading.title;
    if (heading.number !== undefined) adr.number = heading.number;
  }

  for (const line of lines) {
    if (line.startsWith('## ')) break;
    const match = DATE_LINE.exec(line);
    if (match) {
      const date = parseIsoDate(match[1] ?? '');
      if (date) adr.date = date;
      break;
    }
  }

  for (const [name, content] of extractSections(lines)) {
    if (name === 'status') {
      applyStatusSection(adr, content);
    } else {
      applyBodySection(adr, name, content);
    }
  }
  return adr;
}

/**
 * Whether an adr-tools status section can carry `status`: it must be a
 * single recognized word that parses back to the same status.
 */
export function isLegacyStatus(status: AdrStatus): boolean {
  const text = formatStatus(status).trim();
  if (!/^\S+$/.test(text) || !STATUS_WORDS.has(text.toLowerCase())) return false;
  return isSameStatus(parseStatus(text), status);
}

/**
 * Status sections mix a status word with link lines. Link lines only add
 * links; the status comes from explicit status words.
 */
function applyStatusSection(adr: ParsedAdr, content: string): void {
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const link = STATUS_LINK.exec(line);
    if (link) {
      const target = Number(link[2]);
      if (target > 0) {
        const description = link[4]?.trim();
        adr.links.push(
          description
            ? { target, kind: parseLinkKind(link[1] ?? ''), description }
            : { target, kind: parseLinkKind(link[1] ?? '') },
        );
      }
      continue;
    }

    if (line.includes('[') || line.includes(']')) continue;
    const [word = ''] = line.split(/\s+/);
    if (STATUS_WORDS.has(word.toLowerCase())) {
      adr.status = parseStatus(word);
    }
  }
}

// ============================================================================
// Shared helpers
// ============================================================================

function splitLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split(/\r?\n/);
}

function findTitle(lines: readonly string[]): { title: string; number?: number } | undefined {
  const line = lines.find((l) => l.startsWith('# '));
  if (line === undefined) return undefined;
  const text = line.slice(2).trim();
  const match = NUMBERED_TITLE.exec(text);
  if (!match) return { title: text };
  const n = Number(match[1]);
  const title = (match[2] ?? '').trim();
  return n > 0 ? { title, number: n } : { title };
}

/**
 * Split on literal `## ` heading lines. Returns `[name, content]` pairs with
 * lower-cased names and trimmed content, in document order.
 */
export function extractSections(lines: readonly string[]): Array<[string, string]> {
  const sections: Array<[string, string]> = [];
  let current: string | null = null;
  let buffer: string[] = [];

  for (const line of lines) {
    if (line.startsWith('## ')) {
      if (current !== null) sections.push([current, buffer.join('\n').trim()]);
      current = line.slice(3).trim().toLowerCase();
      buffer = [];
    } else if (current !== null) {
      buffer.push(line);
    }
  }
  if (current !== null) sections.push([current, buffer.join('\n').trim()]);

  return sections;
}

function applyBodySection(adr: ParsedAdr, name: string, content: string): void {
  switch (name) {
    case 'context':
      adr.context = content;
      break;
    case 'decision':
      adr.decision = content;
      break;
    case 'consequences':
      adr.consequences = content;
      break;
    default:
      break;
  }
}
