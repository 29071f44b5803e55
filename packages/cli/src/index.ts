/**
 * @confgate/cli
 *
 * The operator command line. `program` is the configured commander program;
 * the bin entry parses process.argv with it.
 */

export { program } from './commands/index.js';
export { echoHandler, registerEverywhere } from './commands/dispatch.js';
export * from './output/format.js';
