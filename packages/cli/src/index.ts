/**
 * @sqlcell/cli
 *
 * Command-line front end for @sqlcell/sqlite:
 *
 *   sqlcell query app.db "SELECT * FROM users WHERE id = ?" --param 1
 *   sqlcell exec app.db "UPDATE users SET active = 0"
 *   sqlcell tables app.db --json
 *
 * The CLI entry point is src/bin/sqlcell.ts
 */
export { createProgram, runCli } from './lib/program.js';
export { createLogger, type LoggerOptions } from './lib/logger.js';
export { CommandError, type CommandIO } from './lib/command-runtime.js';
