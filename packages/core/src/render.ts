import { stringify } from 'yaml';
import {
  adrFilename,
  formatLinkKind,
  formatNumber,
  formatStatus,
  fullTitle,
  statusKeyword,
  type Adr,
  type AdrLink,
} from './types.js';

/**
 * `compatible` writes adr-tools documents; `ng` prepends a YAML metadata
 * block to the same body.
 */
export type SerializationMode = 'compatible' | 'ng';

export type RenderOptions = {
  mode: SerializationMode;
  /** Title of a linked record, used to label status-section links. */
  titleOf?: (number: number) => string | undefined;
};

const PLACEHOLDERS = {
  context: "What is the issue that we're seeing that is motivating this decision or change?",
  decision: "What is the change that we're proposing and/or doing?",
  consequences: 'What becomes easier or more difficult to do because of this change?',
} as const;

type MetadataLink = {
  target: number;
  kind: string;
  description?: string;
};

type Metadata = {
  number: number;
  title: string;
  date: string;
  status: string;
  links?: MetadataLink[];
};

export function renderAdr(adr: Adr, options: RenderOptions): string {
  const body = renderBody(adr, options.titleOf);
  if (options.mode === 'compatible') return body;
  return `---\n${renderMetadata(adr)}---\n\n${body}`;
}

function renderMetadata(adr: Adr): string {
  const metadata: Metadata = {
    number: adr.number,
    title: adr.title,
    date: adr.date,
    status: statusKeyword(adr.status),
  };
  if (adr.links.length > 0) {
    metadata.links = adr.links.map((link) => {
      const entry: MetadataLink = {
        target: link.target,
        kind: link.kind.type === 'custom' ? link.kind.value : formatLinkKind(link.kind).toLowerCase(),
      };
      if (link.description !== undefined) entry.description = link.description;
      return entry;
    });
  }
  return stringify(metadata);
}

function renderBody(adr: Adr, titleOf: RenderOptions['titleOf']): string {
  const lines = [
    `# ${fullTitle(adr)}`,
    '',
    `Date: ${adr.date}`,
    '',
    '## Status',
    '',
    formatStatus(adr.status),
  ];
  for (const link of adr.links) {
    lines.push('', renderStatusLink(link, titleOf));
  }
  lines.push(
    '',
    '## Context',
    '',
    adr.context || PLACEHOLDERS.context,
    '',
    '## Decision',
    '',
    adr.decision || PLACEHOLDERS.decision,
    '',
    '## Consequences',
    '',
    adr.consequences || PLACEHOLDERS.consequences,
    '',
  );
  return lines.join('\n');
}

/**
 * `Supersedes [1. Use MySQL](0001-use-mysql.md)`; unknown targets render as
 * `[1. ...](0001-....md)` so the line still parses back as a link. A
 * description follows as `: text` on the same line.
 */
export function renderStatusLink(link: AdrLink, titleOf?: RenderOptions['titleOf']): string {
  const title = titleOf?.(link.target);
  const label = title ? fullTitle({ number: link.target, title }) : `${link.target}. ...`;
  const file = title ? adrFilename(link.target, title) : `${formatNumber(link.target)}-....md`;
  const line = `${formatLinkKind(link.kind)} [${escapeLabel(label)}](${file})`;
  const description = link.description?.replace(/\s+/g, ' ').trim();
  return description ? `${line}: ${description}` : line;
}

function escapeLabel(label: string): string {
  return label.replace(/[\\[\]]/g, (char) => `\\${char}`);
}
