import { AdrIoError, describeError, safeParseAdr } from '@adrs/core';
import { Command } from 'commander';
import { execSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { contextFrom, openRepository, reportErrors, type CommandContext } from '../context.js';

/** Opens `file` in `editor` and returns once the editor exits. */
export type EditorLauncher = (editor: string, file: string) => void;

export type EditOptions = {
  editor?: string;
  launch?: EditorLauncher;
};

/** Runs the editor through the shell so values like `code --wait` work. */
export const launchEditor: EditorLauncher = (editor, file) => {
  try {
    execSync(`${editor} "${file}"`, { stdio: 'inherit' });
  } catch (err) {
    throw new AdrIoError(`Editor '${editor}' failed: ${describeError(err)}`, file, err);
  }
};

export function resolveEditor(ctx: CommandContext, editor?: string): string {
  const env = ctx.env ?? process.env;
  return editor || env.VISUAL || env.EDITOR || 'vi';
}

/**
 * Edit a record's file through a scratch copy, then write the result back.
 * Returns the record path.
 */
export function runEdit(ctx: CommandContext, query: string, options: EditOptions = {}): string {
  const repo = openRepository(ctx);
  const adr = repo.find(query);
  const content = repo.readContent(adr);
  const launch = options.launch ?? launchEditor;

  const scratchDir = mkdtempSync(join(tmpdir(), 'adrs-edit-'));
  try {
    const scratch = join(scratchDir, basename(adr.path ?? `${adr.number}.md`));
    writeFileSync(scratch, content);
    launch(resolveEditor(ctx, options.editor), scratch);
    const edited = readFileSync(scratch, 'utf8');

    if (edited === content) {
      ctx.logger.log?.(`No changes to ADR ${adr.number}`);
      return adr.path ?? repo.adrPath();
    }

    const path = repo.writeContent(adr, edited);
    const parsed = safeParseAdr(edited, { path });
    if (!parsed.success) {
      ctx.logger.warn?.(`${parsed.error.message}; the file was saved as edited`);
    }
    ctx.logger.log?.(`Updated ADR ${adr.number}`);
    return path;
  } finally {
    rmSync(scratchDir, { recursive: true, force: true });
  }
}

export const editCommand = new Command('edit')
  .description('Open a decision record in your editor')
  .argument('<adr>', 'Record number or title')
  .option('--editor <command>', 'Editor to run instead of $VISUAL or $EDITOR')
  .action((query: string, options: { editor?: string }, command: Command) => {
    const ctx = contextFrom(command);
    reportErrors(ctx.logger, () => {
      console.log(runEdit(ctx, query, { editor: options.editor }));
    });
  });
