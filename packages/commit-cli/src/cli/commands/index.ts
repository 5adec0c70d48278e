// CLI commands
export { lintCommand } from './lint';
export { suggestCommand } from './suggest';
export { checkCommand } from './check';
