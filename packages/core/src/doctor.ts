import { basename } from 'node:path';
import type { Repository, SkippedFile } from './repository.js';
import { formatNumber, type Adr } from './types.js';

export type Severity = 'info' | 'warning' | 'error';

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  error: 2,
};

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export type CheckId =
  | 'duplicate-numbers'
  | 'file-naming'
  | 'missing-status'
  | 'broken-links'
  | 'numbering-gaps'
  | 'superseded-links'
  | 'unparsed-files';

export type Diagnostic = {
  severity: Severity;
  check: CheckId;
  message: string;
  path?: string;
  adrNumber?: number;
};

export class DoctorReport {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[] = []) {
    this.diagnostics = diagnostics;
  }

  add(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === 'error');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some((d) => d.severity === 'warning');
  }

  /** No warnings and no errors; info diagnostics do not count. */
  isHealthy(): boolean {
    return !this.hasErrors() && !this.hasWarnings();
  }

  countBySeverity(severity: Severity): number {
    return this.diagnostics.filter((d) => d.severity === severity).length;
  }
}

export type CheckOptions = {
  /** Files the scan could not parse. */
  skipped?: readonly SkippedFile[];
};

type Rule = (adrs: readonly Adr[], report: DoctorReport) => void;

const RULES: readonly Rule[] = [
  checkDuplicateNumbers,
  checkFileNaming,
  checkMissingStatus,
  checkBrokenLinks,
  checkNumberingGaps,
  checkSupersededLinks,
];

/**
 * Run every health check over the repository. Throws only when the
 * collection cannot be enumerated.
 */
export function check(repo: Repository): DoctorReport {
  const { adrs, skipped } = repo.scan();
  return checkAdrs(adrs, { skipped });
}

export function checkAdrs(adrs: readonly Adr[], options: CheckOptions = {}): DoctorReport {
  const report = new DoctorReport();
  for (const rule of RULES) rule(adrs, report);
  checkUnparsedFiles(options.skipped ?? [], report);

  // Array.prototype.sort is stable: rule order is kept within a severity
  report.diagnostics.sort((a, b) => compareSeverity(b.severity, a.severity));
  return report;
}

function withLocation(adr: Adr): Pick<Diagnostic, 'path' | 'adrNumber'> {
  return adr.path === undefined ? { adrNumber: adr.number } : { path: adr.path, adrNumber: adr.number };
}

function checkDuplicateNumbers(adrs: readonly Adr[], report: DoctorReport) {
  const byNumber = new Map<number, Adr[]>();
  for (const adr of adrs) {
    const group = byNumber.get(adr.number);
    if (group) group.push(adr);
    else byNumber.set(adr.number, [adr]);
  }

  for (const [number, group] of byNumber) {
    if (group.length < 2) continue;
    const files = group.map((adr) => (adr.path ? basename(adr.path) : `'${adr.title}'`));
    report.add({
      severity: 'error',
      check: 'duplicate-numbers',
      message: `ADR number ${number} is used by multiple files: ${files.join(', ')}`,
      adrNumber: number,
    });
  }
}

function checkFileNaming(adrs: readonly Adr[], report: DoctorReport) {
  for (const adr of adrs) {
    if (adr.path === undefined) continue;
    const filename = basename(adr.path);
    const expectedPrefix = `${formatNumber(adr.number)}-`;
    if (!filename.startsWith(expectedPrefix)) {
      report.add({
        severity: 'warning',
        check: 'file-naming',
        message: `File '${filename}' should start with '${expectedPrefix}'`,
        ...withLocation(adr),
      });
    }
  }
}

function checkMissingStatus(adrs: readonly Adr[], report: DoctorReport) {
  for (const adr of adrs) {
    if (adr.status.type === 'custom' && adr.status.value.trim() === '') {
      report.add({
        severity: 'warning',
        check: 'missing-status',
        message: `ADR ${adr.number} '${adr.title}' has an empty status`,
        ...withLocation(adr),
      });
    }
  }
}

function checkBrokenLinks(adrs: readonly Adr[], report: DoctorReport) {
  const existing = new Set(adrs.map((adr) => adr.number));
  for (const adr of adrs) {
    for (const link of adr.links) {
      if (existing.has(link.target)) continue;
      report.add({
        severity: 'error',
        check: 'broken-links',
        message: `ADR ${adr.number} '${adr.title}' links to non-existent ADR ${link.target}`,
        ...withLocation(adr),
      });
    }
  }
}

function checkNumberingGaps(adrs: readonly Adr[], report: DoctorReport) {
  if (adrs.length === 0) return;

  const numbers = [...new Set(adrs.map((adr) => adr.number))].sort((a, b) => a - b);

  // Only the first few missing numbers are ever shown; the rest are counted.
  const shown: number[] = [];
  let count = 0;
  for (let i = 1; i < numbers.length; i++) {
    const prev = numbers[i - 1] ?? 0;
    const next = numbers[i] ?? 0;
    for (let n = prev + 1; n < next && shown.length < 5; n++) shown.push(n);
    count += next - prev - 1;
  }
  if (count === 0) return;

  const listed =
    count <= 5 ? shown.join(', ') : `${shown.slice(0, 3).join(', ')}, ... (${count} total)`;
  report.add({
    severity: 'info',
    check: 'numbering-gaps',
    message: `Missing ADR numbers in sequence: ${listed}`,
  });
}

function checkSupersededLinks(adrs: readonly Adr[], report: DoctorReport) {
  for (const adr of adrs) {
    if (adr.status.type !== 'superseded') continue;
    if (adr.links.some((link) => link.kind.type === 'superseded-by')) continue;
    report.add({
      severity: 'warning',
      check: 'superseded-links',
      message: `ADR ${adr.number} '${adr.title}' has status 'Superseded' but no 'Superseded by' link`,
      ...withLocation(adr),
    });
  }
}

function checkUnparsedFiles(skipped: readonly SkippedFile[], report: DoctorReport) {
  if (skipped.length === 0) return;
  const files = skipped.map((file) => basename(file.path));
  report.add({
    severity: 'warning',
    check: 'unparsed-files',
    message: `${skipped.length} file(s) could not be parsed and were left out of these checks: ${files.join(', ')}`,
  });
}
