#!/usr/bin/env node

/**
 * portal-sync CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { EXIT_CODES, registerReadCommands, registerSyncCommands } from './run.js';

const program = new Command();

program
  .name('portal-sync')
  .description(
    'Log in to the partner portal, scrape the account report, and keep MongoDB in sync.',
  )
  .version('0.1.0')
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE);
  });

registerSyncCommands(program);
registerReadCommands(program);

await program.parseAsync();
