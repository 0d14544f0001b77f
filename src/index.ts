/**
 * nginx-le-helper - guided Let's Encrypt setup for nginx
 *
 * Library entry point; the CLI in ./cli.ts is a thin layer over these exports.
 */

export * from './lib/index.js';
export { createCli, runCli } from './cli/program.js';
export type { CliDependencies } from './cli/context.js';
