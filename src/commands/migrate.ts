/**
 * tm-migrate migrate — Full Extract → Transform → Load
 *
 * Starts a new run, or with --run continues an interrupted one.
 * --retry-failed gives failed entities and types another attempt.
 */

import { runWithProgress, withContext, type GlobalOptions } from './context.js';

export interface MigrateCommandOptions extends GlobalOptions {
  retryFailed?: boolean;
}

export async function migrateCommand(options: MigrateCommandOptions): Promise<void> {
  await withContext(options, (context) =>
    runWithProgress(context, options, (orchestrator) => {
      if (options.run) {
        return orchestrator.resume(options.run, { retryFailed: options.retryFailed });
      }
      return orchestrator.run();
    }),
  );
}
