/**
 * The `warden` program
 */

import { Command } from 'commander';
import { checkCommand, lintCommand, suggestCommand } from './commands';
import { defaultCommandIO, registerCommand, type CommandIO } from './define-command';

export const PROGRAM_NAME = 'warden';
export const PROGRAM_VERSION = '0.1.0';

export function createProgram(io: CommandIO = defaultCommandIO()): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .version(PROGRAM_VERSION)
    .description('Classify staged changes, scan them for secrets and validate commit messages.')
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  registerCommand(program, lintCommand, io);
  registerCommand(program, suggestCommand, io);
  registerCommand(program, checkCommand, io);

  program.addHelpText(
    'after',
    [
      '',
      'Examples:',
      `  $ ${PROGRAM_NAME} lint --message-file .git/COMMIT_EDITMSG`,
      `  $ ${PROGRAM_NAME} suggest --json`,
      `  $ ${PROGRAM_NAME} check origin/main..HEAD --concurrency 8`,
    ].join('\n')
  );

  return program;
}
