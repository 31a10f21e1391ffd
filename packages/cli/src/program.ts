import { Command } from 'commander';
import { createRequire } from 'node:module';
import { object, parse, string } from 'valibot';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { editCommand } from './commands/edit.js';
import { generateCommand } from './commands/generate.js';
import { initCommand } from './commands/init.js';
import { linkCommand } from './commands/link.js';
import { listCommand } from './commands/list.js';
import { newCommand } from './commands/new.js';
import { statusCommand } from './commands/status.js';

const require = createRequire(import.meta.url);
const packageJson = parse(object({ version: string() }), require('../package.json'));

export function createProgram(): Command {
  const program = new Command();

  program
    .name('adrs')
    .description('Manage Architecture Decision Records')
    .version(packageJson.version)
    .option('-C, --cwd <dir>', 'Run as if started in <dir>')
    .option('-q, --quiet', 'Suppress informational logs', false);

  program.addCommand(initCommand);
  program.addCommand(newCommand);
  program.addCommand(editCommand);
  program.addCommand(listCommand);
  program.addCommand(linkCommand);
  program.addCommand(statusCommand);
  program.addCommand(doctorCommand);
  program.addCommand(generateCommand);
  program.addCommand(configCommand);

  return program;
}
