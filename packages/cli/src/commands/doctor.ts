import { check, type Diagnostic } from '@adrs/core';
import { Command } from 'commander';
import { contextFrom, openRepository, reportErrors, type CommandContext } from '../context.js';

export type DoctorResult = {
  lines: string[];
  /** False when any error-level diagnostic was found. */
  ok: boolean;
};

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.severity}: [${diagnostic.check}] ${diagnostic.message}`;
}

export function runDoctor(ctx: CommandContext): DoctorResult {
  const report = check(openRepository(ctx));
  const lines = report.diagnostics.map(formatDiagnostic);

  if (lines.length === 0) {
    lines.push('No problems found.');
  } else {
    const errors = report.countBySeverity('error');
    const warnings = report.countBySeverity('warning');
    const infos = report.countBySeverity('info');
    lines.push(`${errors} error(s), ${warnings} warning(s), ${infos} info`);
  }
  return { lines, ok: !report.hasErrors() };
}

export const doctorCommand = new Command('doctor')
  .description('Check the decision records for consistency problems')
  .action((_options: unknown, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      const { lines, ok } = runDoctor(ctx);
      for (const line of lines) console.log(line);
      if (!ok) process.exitCode = 1;
    });
  });
