export { createProgram, PROGRAM_NAME, PROGRAM_VERSION } from './program';
export {
  defineCommand,
  registerCommand,
  runCommand,
  toOptionSpec,
  defaultCommandIO,
  type CommandIO,
  type CommandContext,
  type CommandInput,
  type CommandResult,
  type WardenCommand,
} from './define-command';
export { createConsoleLogger, type ConsoleLoggerOptions } from './logger';
export { loadWardenConfig, CONFIG_FILE_NAME } from './load-config';
export { openWorkspace, readDiff, readMessage, resolveBranch, type Workspace } from './workspace';
export * from './format';
export * from './commands';
