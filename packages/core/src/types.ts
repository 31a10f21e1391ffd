/**
 * Calendar date in `YYYY-MM-DD` form.
 */
export type IsoDate = `${number}-${number}-${number}`;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoDate(text: string): text is IsoDate {
  const match = ISO_DATE.exec(text);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function parseIsoDate(text: string): IsoDate | null {
  const trimmed = text.trim();
  return isIsoDate(trimmed) ? trimmed : null;
}

export function formatIsoDate(date: Date): IsoDate {
  const y = String(date.getUTCFullYear()).padStart(4, '0');
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  const text = `${y}-${m}-${d}`;
  if (!isIsoDate(text)) throw new Error(`Invalid date: ${date.toISOString()}`);
  return text;
}

export function today(): IsoDate {
  return formatIsoDate(new Date());
}

// ============================================================================
// Status
// ============================================================================

export type KnownStatus = 'proposed' | 'accepted' | 'deprecated' | 'superseded';

/**
 * Lifecycle status of a decision. Unknown vocabulary is kept verbatim in the
 * `custom` variant so historical documents always parse.
 */
export type AdrStatus = { type: KnownStatus } | { type: 'custom'; value: string };

export const Status = {
  Proposed: { type: 'proposed' },
  Accepted: { type: 'accepted' },
  Deprecated: { type: 'deprecated' },
  Superseded: { type: 'superseded' },
  custom: (value: string): AdrStatus => ({ type: 'custom', value }),
} as const satisfies Record<string, AdrStatus | ((value: string) => AdrStatus)>;

const STATUS_ALIASES: Record<string, KnownStatus> = {
  proposed: 'proposed',
  accepted: 'accepted',
  deprecated: 'deprecated',
  superseded: 'superseded',
  // common misspelling found in adr-tools repositories
  superceded: 'superseded',
};

const STATUS_NAMES: Record<KnownStatus, string> = {
  proposed: 'Proposed',
  accepted: 'Accepted',
  deprecated: 'Deprecated',
  superseded: 'Superseded',
};

export function parseStatus(text: string): AdrStatus {
  const known = STATUS_ALIASES[text.trim().toLowerCase()];
  return known ? { type: known } : { type: 'custom', value: text };
}

export function formatStatus(status: AdrStatus): string {
  return status.type === 'custom' ? status.value : STATUS_NAMES[status.type];
}

/**
 * Metadata form: lower-case canonical name, or the custom text verbatim.
 */
export function statusKeyword(status: AdrStatus): string {
  return status.type === 'custom' ? status.value : status.type;
}

export function isSameStatus(a: AdrStatus, b: AdrStatus): boolean {
  if (a.type === 'custom' || b.type === 'custom') {
    return a.type === b.type && formatStatus(a) === formatStatus(b);
  }
  return a.type === b.type;
}

// ============================================================================
// Links
// ============================================================================

export type KnownLinkKind =
  | 'supersedes'
  | 'superseded-by'
  | 'amends'
  | 'amended-by'
  | 'relates-to';

export type LinkKind = { type: KnownLinkKind } | { type: 'custom'; value: string };

export const Link = {
  Supersedes: { type: 'supersedes' },
  SupersededBy: { type: 'superseded-by' },
  Amends: { type: 'amends' },
  AmendedBy: { type: 'amended-by' },
  RelatesTo: { type: 'relates-to' },
  custom: (value: string): LinkKind => ({ type: 'custom', value }),
} as const satisfies Record<string, LinkKind | ((value: string) => LinkKind)>;

const LINK_ALIASES: Record<string, KnownLinkKind> = {
  supersedes: 'supersedes',
  'superseded by': 'superseded-by',
  'superseded-by': 'superseded-by',
  amends: 'amends',
  'amended by': 'amended-by',
  'amended-by': 'amended-by',
  'relates to': 'relates-to',
  'relates-to': 'relates-to',
};

const LINK_NAMES: Record<KnownLinkKind, string> = {
  supersedes: 'Supersedes',
  'superseded-by': 'Superseded by',
  amends: 'Amends',
  'amended-by': 'Amended by',
  'relates-to': 'Relates to',
};

const LINK_REVERSE: Record<KnownLinkKind, KnownLinkKind> = {
  supersedes: 'superseded-by',
  'superseded-by': 'supersedes',
  amends: 'amended-by',
  'amended-by': 'amends',
  'relates-to': 'relates-to',
};

export function parseLinkKind(text: string): LinkKind {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
  const known = LINK_ALIASES[normalized];
  return known ? { type: known } : { type: 'custom', value: text };
}

export function formatLinkKind(kind: LinkKind): string {
  return kind.type === 'custom' ? kind.value : LINK_NAMES[kind.type];
}

export function reverseLinkKind(kind: LinkKind): LinkKind {
  return kind.type === 'custom' ? kind : { type: LINK_REVERSE[kind.type] };
}

export function isSameLinkKind(a: LinkKind, b: LinkKind): boolean {
  return a.type === b.type && formatLinkKind(a) === formatLinkKind(b);
}

export type AdrLink = {
  /** Number of the linked record. Not checked for existence here. */
  target: number;
  kind: LinkKind;
  description?: string;
};

export function createLink(target: number, kind: LinkKind, description?: string): AdrLink {
  return description === undefined ? { target, kind } : { target, kind, description };
}

export function isSameLink(a: AdrLink, b: AdrLink): boolean {
  return a.target === b.target && isSameLinkKind(a.kind, b.kind) && a.description === b.description;
}

// ============================================================================
// Records
// ============================================================================

/**
 * One architecture decision record.
 *
 * `number` is fixed once the record is written under a filename containing
 * it; renumbering means renaming the file.
 */
export type Adr = {
  number: number;
  title: string;
  date: IsoDate;
  status: AdrStatus;
  /** Insertion order is kept; duplicates are allowed. */
  links: AdrLink[];
  context: string;
  decision: string;
  consequences: string;
  /** File the record was loaded from or last written to. */
  path?: string;
};

export type AdrInit = Partial<Omit<Adr, 'number' | 'title'>>;

export function createAdr(number: number, title: string, init: AdrInit = {}): Adr {
  return {
    number,
    title,
    date: init.date ?? today(),
    status: init.status ?? Status.Proposed,
    links: init.links ? [...init.links] : [],
    context: init.context ?? '',
    decision: init.decision ?? '',
    consequences: init.consequences ?? '',
    ...(init.path === undefined ? {} : { path: init.path }),
  };
}

export function addLink(adr: Adr, link: AdrLink): void {
  adr.links.push(link);
}

export function hasLink(adr: Adr, link: AdrLink): boolean {
  return adr.links.some((existing) => isSameLink(existing, link));
}

export function fullTitle(adr: Pick<Adr, 'number' | 'title'>): string {
  return `${adr.number}. ${adr.title}`;
}

// ============================================================================
// Filenames
// ============================================================================

export const ADR_EXTENSION = '.md';

/**
 * Extensions recognized when enumerating a collection directory.
 */
export const ADR_EXTENSIONS: readonly string[] = ['.md', '.markdown'];

export function formatNumber(number: number): string {
  return String(number).padStart(4, '0');
}

export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function adrFilename(number: number, title: string): string {
  const slug = slugify(title) || 'untitled';
  return `${formatNumber(number)}-${slug}${ADR_EXTENSION}`;
}
