import { describe, expect, it } from 'vitest';
import { AdrFormatError } from './errors.js';
import {
  detectFormat,
  extractSections,
  isLegacyStatus,
  numberFromFilename,
  parseAdr,
  safeParseAdr,
} from './parse.js';
import { Link, Status } from './types.js';

const LEGACY = `# 2. Use PostgreSQL

Date: 2024-03-01

## Status

Accepted

Supersedes [1. Use MySQL](0001-use-mysql.md)

## Context

We need a relational database.

## Decision

Use PostgreSQL.

## Consequences

Operations must learn a new engine.
`;

const STRUCTURED = `---
number: 5
title: Adopt GraphQL
date: 2024-05-20
status: accepted
links:
  - target: 2
    kind: amends
  - target: 3
    kind: relates to
    description: shares the schema registry
---

# 5. Adopt GraphQL

## Context

Clients over-fetch.

## Decision

Serve a GraphQL endpoint.

## Consequences

Caching gets harder.
`;

describe('detectFormat', () => {
  it('treats a leading delimiter line as structured', () => {
    expect(detectFormat(STRUCTURED)).toBe('structured');
    expect(detectFormat('---  \ntitle: x\n---\n')).toBe('structured');
    expect(detectFormat(LEGACY)).toBe('legacy');
    expect(detectFormat('\n---\n')).toBe('legacy');
  });
});

describe('legacy documents', () => {
  it('parses the adr-tools layout', () => {
    const adr = parseAdr(LEGACY);
    expect(adr).toEqual({
      number: 2,
      title: 'Use PostgreSQL',
      date: '2024-03-01',
      status: Status.Accepted,
      links: [{ target: 1, kind: Link.Supersedes }],
      context: 'We need a relational database.',
      decision: 'Use PostgreSQL.',
      consequences: 'Operations must learn a new engine.',
    });
  });

  it('does not derive the status from link lines', () => {
    const adr = parseAdr(`# 1. Use MySQL

## Status

Superseded by [3. Use Redis](0003-use-redis.md)
`);
    expect(adr.status).toEqual(Status.Proposed);
    expect(adr.links).toEqual([{ target: 3, kind: Link.SupersededBy }]);
  });

  it('takes the link target from the label rather than the filename', () => {
    const adr = parseAdr('# 1. A\n\n## Status\n\nAccepted\n\nAmends [3. X](0009-x.md)\n');
    expect(adr.links).toEqual([{ target: 3, kind: Link.Amends }]);
  });

  it('reads escaped brackets and a trailing description on link lines', () => {
    const adr = parseAdr(
      '# 2. Log as text\n\n## Status\n\nAccepted\n\n' +
        'Supersedes [1. Log as \\[JSON\\]](0001-log-as-json.md): too verbose\n',
    );
    expect(adr.status).toEqual(Status.Accepted);
    expect(adr.links).toEqual([{ target: 1, kind: Link.Supersedes, description: 'too verbose' }]);
  });

  it('reads the superceded misspelling as Superseded', () => {
    const adr = parseAdr('# 4. Old idea\n\n## Status\n\nSuperceded\n');
    expect(adr.status).toEqual(Status.Superseded);
  });

  it('keeps recognized non-canonical status words as custom statuses', () => {
    const adr = parseAdr('# 4. Old idea\n\n## Status\n\nRejected after review\n');
    expect(adr.status).toEqual(Status.custom('Rejected'));
  });

  it('ignores unrecognized status text', () => {
    const adr = parseAdr('# 4. Old idea\n\n## Status\n\nPending discussion\n');
    expect(adr.status).toEqual(Status.Proposed);
  });

  it('takes the number from the filename when the heading has none', () => {
    const adr = parseAdr('# Use Kafka\n\n## Status\n\nAccepted\n', {
      path: '/repo/doc/adr/0007-use-kafka.md',
    });
    expect(adr.number).toBe(7);
    expect(adr.title).toBe('Use Kafka');
    expect(adr.path).toBe('/repo/doc/adr/0007-use-kafka.md');
  });

  it('prefers the heading number over the filename', () => {
    const adr = parseAdr('# 12. Use Kafka\n', { path: '/repo/0007-use-kafka.md' });
    expect(adr.number).toBe(12);
  });

  it('fails when no number can be found', () => {
    expect(() => parseAdr('# Use Kafka\n')).toThrow(
      'Invalid ADR format: document does not state an ADR number',
    );
    expect(() => parseAdr('# Use Kafka\n', { path: '/repo/notes.md' })).toThrow(
      'Invalid ADR format in /repo/notes.md: cannot extract ADR number from filename',
    );
  });

  it('handles a byte order mark and CRLF line endings', () => {
    const adr = parseAdr('\uFEFF# 1. Hello\r\n\r\n## Status\r\n\r\nAccepted\r\n\r\n## Context\r\n\r\nWindows\r\n');
    expect(adr.number).toBe(1);
    expect(adr.title).toBe('Hello');
    expect(adr.status).toEqual(Status.Accepted);
    expect(adr.context).toBe('Windows');
  });

  it('ignores a Date line that follows the first section', () => {
    const adr = parseAdr('# 1. Hello\n\n## Context\n\nDate: 2001-01-01\n');
    expect(adr.date).not.toBe('2001-01-01');
    expect(adr.context).toBe('Date: 2001-01-01');
  });
});

describe('structured documents', () => {
  it('reads metadata and body sections', () => {
    const adr = parseAdr(STRUCTURED);
    expect(adr).toEqual({
      number: 5,
      title: 'Adopt GraphQL',
      date: '2024-05-20',
      status: Status.Accepted,
      links: [
        { target: 2, kind: Link.Amends },
        { target: 3, kind: Link.RelatesTo, description: 'shares the schema registry' },
      ],
      context: 'Clients over-fetch.',
      decision: 'Serve a GraphQL endpoint.',
      consequences: 'Caching gets harder.',
    });
  });

  it('falls back to the body heading for the title', () => {
    const adr = parseAdr('---\nnumber: 9\n---\n\n# 9. Split the monolith\n');
    expect(adr.title).toBe('Split the monolith');
    expect(adr.status).toEqual(Status.Proposed);
  });

  it('treats a blank status as an empty custom status', () => {
    const adr = parseAdr('---\nnumber: 9\ntitle: T\nstatus:\n---\n');
    expect(adr.status).toEqual(Status.custom(''));
  });

  it('rejects an unterminated metadata block', () => {
    expect(() => parseAdr('---\nnumber: 1\ntitle: T\n')).toThrow(
      'Invalid ADR format: metadata block is not closed',
    );
  });

  it('rejects metadata that fails validation', () => {
    expect(() => parseAdr('---\nnumber: -1\ntitle: T\n---\n')).toThrow(/invalid metadata/);
    expect(() => parseAdr('---\nnumber: 1\ntitle: T\nlinks:\n  - kind: amends\n---\n')).toThrow(
      AdrFormatError,
    );
  });

  it('rejects an invalid date', () => {
    expect(() => parseAdr('---\nnumber: 1\ntitle: T\ndate: 2024-13-01\n---\n')).toThrow(
      "Invalid ADR format: invalid date '2024-13-01'",
    );
  });

  it('rejects metadata without any title', () => {
    expect(() => parseAdr('---\nnumber: 1\n---\n\nNo heading here.\n')).toThrow(
      'Invalid ADR format: metadata has no title',
    );
  });

  it('attaches the path to format errors', () => {
    const result = safeParseAdr('---\nnumber: 1\n', { path: '/repo/0001-x.md' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.path).toBe('/repo/0001-x.md');
      expect(result.error.reason).toBe('metadata block is not closed');
    }
  });
});

describe('isLegacyStatus', () => {
  it('accepts single recognized words only', () => {
    expect(isLegacyStatus(Status.Accepted)).toBe(true);
    expect(isLegacyStatus(Status.custom('Draft'))).toBe(true);
    expect(isLegacyStatus(Status.custom('Withdrawn'))).toBe(false);
    expect(isLegacyStatus(Status.custom('Rejected after review'))).toBe(false);
    expect(isLegacyStatus(Status.custom(''))).toBe(false);
  });
});

describe('extractSections', () => {
  it('splits on level-two headings only', () => {
    const sections = extractSections([
      'preamble',
      '## Context',
      '',
      'text',
      '### Detail',
      'more',
      '##NoSpace',
      '## Decision',
      '  done  ',
    ]);
    expect(sections).toEqual([
      ['context', 'text\n### Detail\nmore\n##NoSpace'],
      ['decision', 'done'],
    ]);
  });
});

describe('numberFromFilename', () => {
  it('requires at least four leading digits and a dash', () => {
    expect(numberFromFilename('0042-foo.md')).toBe(42);
    expect(numberFromFilename('12345-foo.md')).toBe(12345);
    expect(numberFromFilename('042-foo.md')).toBeUndefined();
    expect(numberFromFilename('0000-foo.md')).toBeUndefined();
  });
});
