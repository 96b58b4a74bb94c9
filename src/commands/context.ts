/**
 * Shared command setup: configuration, logger, staging store, adapters and
 * orchestrator for one CLI invocation.
 */

import chalk from 'chalk';
import { ProgressDisplay } from '../cli/progress.js';
import { cleanupSignalHandler, setupSignalHandler } from '../cli/signal-handler.js';
import { showReport } from '../cli/summary.js';
import { loadConfig, type MigrationConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { createQTestDestination } from '../migrate/destination/qtest.js';
import { ConfigurationError, MigrationError, errorMessage } from '../migrate/errors.js';
import { MigrationOrchestrator } from '../migrate/orchestrator.js';
import { createZephyrSource } from '../migrate/source/zephyr.js';
import { StagingStore } from '../migrate/staging/store.js';
import type { MigrationReport } from '../migrate/types.js';

export interface GlobalOptions {
  config?: string;
  run?: string;
  verbose?: boolean;
  /** False under --no-color */
  color?: boolean;
}

export interface CommandContext {
  config: MigrationConfig;
  logger: Logger;
  store: StagingStore;
  /** Built on first use; report and validate never need the APIs */
  orchestrator(): MigrationOrchestrator;
}

/**
 * Run a command body with an open context. The body returns the exit code.
 * Errors are printed, never thrown.
 */
export async function withContext(
  options: GlobalOptions,
  body: (context: CommandContext) => Promise<number>,
): Promise<void> {
  const noColor = options.color === false;
  if (noColor) {
    chalk.level = 0;
  }
  const logger = createLogger({ level: options.verbose ? 'debug' : 'info', noColor });

  let store: StagingStore | null = null;
  try {
    const config = await loadConfig(options.config);
    const opened = new StagingStore({ path: config.staging.databasePath });
    store = opened;

    let orchestrator: MigrationOrchestrator | null = null;
    const context: CommandContext = {
      config,
      logger,
      store: opened,
      orchestrator: () => {
        orchestrator ??= new MigrationOrchestrator({
          config,
          store: opened,
          source: createZephyrSource(config.source, { logger }),
          destination: createQTestDestination(config.destination, { logger }),
          logger,
        });
        return orchestrator;
      },
    };

    process.exitCode = await body(context);
  } catch (err) {
    reportError(err, logger);
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

/**
 * The run named by --run, or the most recent one.
 */
export function resolveRunId(store: StagingStore, run: string | undefined): string {
  if (run) {
    return store.requireRun(run).id;
  }
  const latest = store.latestRun();
  if (!latest) {
    throw new MigrationError('No migration runs yet. Start one with `tm-migrate migrate`.', 'RUN_NOT_FOUND', 'run', false);
  }
  return latest.id;
}

function reportError(err: unknown, logger: Logger): void {
  if (err instanceof ConfigurationError && err.issues.length > 0) {
    logger.error('Invalid configuration:');
    for (const issue of err.issues) {
      logger.error(`  ${issue}`);
    }
    return;
  }
  if (err instanceof MigrationError) {
    logger.error(`${err.message} ${chalk.dim(`[${err.code}]`)}`);
    return;
  }
  logger.error(errorMessage(err));
}

/**
 * Run an orchestrator operation with spinners and Ctrl+C handling, then
 * print the report. Exit code 0 only for a completed run.
 */
export async function runWithProgress(
  context: CommandContext,
  options: GlobalOptions,
  operation: (orchestrator: MigrationOrchestrator) => Promise<MigrationReport>,
  succeeded: (report: MigrationReport) => boolean = (report) => report.status === 'completed',
): Promise<number> {
  const orchestrator = context.orchestrator();
  const progress = new ProgressDisplay({ noColor: options.color === false, verbose: options.verbose });
  const unsubscribe = orchestrator.on(progress.handleEvent);
  setupSignalHandler({ orchestrator, cleanup: () => progress.stop() });

  try {
    const report = await operation(orchestrator);
    progress.stop();
    showReport(report);
    return succeeded(report) ? 0 : 1;
  } finally {
    progress.stop();
    unsubscribe();
    cleanupSignalHandler();
  }
}
