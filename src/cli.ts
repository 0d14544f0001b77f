#!/usr/bin/env node

/**
 * CLI entrypoint. Keep lean; commands live in ./cli/commands, logic in ./lib.
 */
import { createCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

process.on('unhandledRejection', (err) => {
  handleError(err);
  process.exit(1);
});
process.on('uncaughtException', (err) => {
  handleError(err);
  process.exit(1);
});

createCli()
  .parseAsync()
  .catch((err: unknown) => {
    handleError(err);
    process.exit(1);
  });
