#!/usr/bin/env node

/**
 * tm-migrate CLI
 *
 * Resumable migration of test-management assets from Zephyr Scale to qTest.
 *
 * Usage:
 *   tm-migrate init                   Write .tm-migrate/config.json
 *   tm-migrate migrate                Extract, transform and load
 *   tm-migrate extract                Stage source entities only
 *   tm-migrate transform              Transform staged entities
 *   tm-migrate load                   Load what has been staged
 *   tm-migrate report                 Show a run's counts and failures
 *   tm-migrate validate               Check a run's consistency
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  extractCommand,
  transformCommand,
  loadCommand,
  migrateCommand,
  reportCommand,
  validateCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('tm-migrate')
  .description('Migrate folders, test cases, cycles, executions and attachments from Zephyr Scale to qTest.')
  .version(version);

/** Options every run-scoped command takes. */
function withGlobalOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: .tm-migrate/config.json)')
    .option('-r, --run <id>', 'Migration run ID (default: the latest run)')
    .option('-v, --verbose', 'Show detailed progress')
    .option('--no-color', 'Disable colorized output');
}

// ─── tm-migrate init ─────────────────────────────────────────

program
  .command('init')
  .description('Write a starter configuration in the current directory')
  .option('-c, --config <path>', 'Where to write the config file')
  .option('--project-key <key>', 'Zephyr project key')
  .option('--zephyr-url <url>', 'Zephyr Scale API base URL')
  .option('--qtest-url <url>', 'qTest Manager base URL')
  .option('--qtest-project <id>', 'qTest project ID')
  .option('-y, --yes', 'Accept defaults without prompting')
  .option('-f, --force', 'Overwrite an existing config file')
  .action(initCommand);

// ─── tm-migrate migrate ──────────────────────────────────────

withGlobalOptions(
  program
    .command('migrate')
    .description('Run the full pipeline; with --run, resume that run')
    .option('--retry-failed', 'Give failed entities and types another attempt (with --run)'),
).action(migrateCommand);

// ─── tm-migrate extract / transform / load ───────────────────

withGlobalOptions(
  program.command('extract').description('Extract every selected entity type into the staging store'),
).action(extractCommand);

withGlobalOptions(
  program.command('transform').description('Transform staged entities whose references are already loaded'),
).action(transformCommand);

withGlobalOptions(
  program.command('load').description('Load extracted entities, transforming dependents as parents are loaded'),
).action(loadCommand);

// ─── tm-migrate report ───────────────────────────────────────

withGlobalOptions(
  program
    .command('report')
    .description('Show per-type counts and failures of a run')
    .option('--json', 'Output as JSON')
    .option('-a, --all', 'List every run instead'),
).action(reportCommand);

// ─── tm-migrate validate ─────────────────────────────────────

withGlobalOptions(
  program
    .command('validate')
    .description('Check that loaded entities, correlations and the load journal agree')
    .option('--json', 'Output as JSON'),
).action(validateCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
