#!/usr/bin/env node
/**
 * @fileoverview spec-guard CLI entry point
 *
 * Sets up global error handlers and invokes the CLI parser.
 *
 * @module index
 */

import { program } from './cli.js';

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err.message);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

program.parseAsync().catch((err: unknown) => {
  console.error('Command failed:', err);
  process.exit(1);
});
