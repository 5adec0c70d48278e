/**
 * Command definitions and their registration on a commander program
 *
 * A command declares its flags once (shared with contracts), a zod schema
 * validating what commander parsed, and a handler returning an exit code.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Command } from 'commander';
import type { z } from 'zod';
import {
  ConfigurationError,
  exitCodeForError,
  type FlagDefinitions,
  type Logger,
} from '@commit-warden/contracts';
import { createConsoleLogger } from './logger';

export interface CommandIO {
  /** Directory the process was started in */
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  colors: ChalkInstance;
  setExitCode: (code: number) => void;
}

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  colors: ChalkInstance;
  logger: Logger;
}

export interface CommandResult<TResult = unknown> {
  exitCode: number;
  result?: TResult;
}

export interface CommandArgument {
  name: string;
  description: string;
}

export interface CommandInput<TOptions> {
  options: TOptions;
  args: string[];
}

export interface WardenCommand<TOptions extends { verbose: boolean }> {
  id: string;
  description: string;
  flags: FlagDefinitions;
  argument?: CommandArgument;
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  handler: {
    execute(ctx: CommandContext, input: CommandInput<TOptions>): Promise<CommandResult>;
  };
}

export function defineCommand<TOptions extends { verbose: boolean }>(
  command: WardenCommand<TOptions>
): WardenCommand<TOptions> {
  return command;
}

export function defaultCommandIO(): CommandIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    colors: chalk,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

/**
 * `message-file` + `{ type: 'string', alias: 'm' }` -> `-m, --message-file <value>`
 */
export function toOptionSpec(name: string, flag: FlagDefinitions[string]): string {
  const long = `--${name}`;
  const value = flag.type === 'boolean' ? '' : ` <${flag.type === 'number' ? 'n' : 'value'}>`;
  return flag.alias ? `-${flag.alias}, ${long}${value}` : `${long}${value}`;
}

/**
 * Validate raw options, run the handler and map failures to exit codes.
 * Errors are reported on stderr; nothing is thrown.
 */
export async function runCommand<TOptions extends { verbose: boolean }>(
  command: WardenCommand<TOptions>,
  rawOptions: unknown,
  args: string[],
  io: CommandIO
): Promise<number> {
  const parsed = command.schema.safeParse(rawOptions);
  if (!parsed.success) {
    const error = new ConfigurationError(
      `Invalid options for "${command.id}"`,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
    io.stderr(`${io.colors.red('error')} ${error.message}`);
    return exitCodeForError(error);
  }

  const options = parsed.data;
  const logger = createConsoleLogger({ verbose: options.verbose, write: io.stderr, colors: io.colors });

  try {
    const { exitCode } = await command.handler.execute(
      { cwd: io.cwd, env: io.env, stdout: io.stdout, colors: io.colors, logger },
      { options, args }
    );
    return exitCode;
  } catch (error) {
    logger.error(`${command.id} failed`, error);
    return exitCodeForError(error);
  }
}

export function registerCommand<TOptions extends { verbose: boolean }>(
  program: Command,
  command: WardenCommand<TOptions>,
  io: CommandIO
): Command {
  const sub = program.command(command.id).description(command.description);
  if (command.argument) {
    sub.argument(`<${command.argument.name}>`, command.argument.description);
  }
  for (const [name, flag] of Object.entries(command.flags)) {
    sub.option(toOptionSpec(name, flag), flag.description);
  }

  sub.action(async () => {
    io.setExitCode(await runCommand(command, sub.opts(), sub.args, io));
  });
  return sub;
}
