/**
 * Console logger for the CLI: everything goes to stderr so stdout stays
 * parseable under --json
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogMeta, Logger } from '@commit-warden/contracts';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
  colors?: ChalkInstance;
}

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) return '';
  return ` ${JSON.stringify(meta)}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const colors = options.colors ?? chalk;

  return {
    debug(message, meta) {
      if (options.verbose) write(colors.gray(`debug ${message}${formatMeta(meta)}`));
    },
    info(message, meta) {
      write(`${colors.cyan('info')}  ${message}${formatMeta(meta)}`);
    },
    warn(message, meta) {
      write(`${colors.yellow('warn')}  ${message}${formatMeta(meta)}`);
    },
    error(message, error, meta) {
      const reason = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : '';
      write(`${colors.red('error')} ${message}${reason}${formatMeta(meta)}`);
    },
  };
}
