import { EXIT_CODES } from '@commit-warden/contracts';
import { createProgram } from './cli/program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_CODES.internal;
  });
