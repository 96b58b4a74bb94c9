/**
 * tm-migrate extract — Stage source entities without loading them
 */

import type { MigrationReport } from '../migrate/types.js';
import { runWithProgress, withContext, type GlobalOptions } from './context.js';

/** Extraction succeeded when no type failed or was skipped and the run was not aborted. */
function extracted(report: MigrationReport): boolean {
  return report.status !== 'aborted' && report.types.every((t) => t.status !== 'failed' && t.status !== 'skipped');
}

export async function extractCommand(options: GlobalOptions): Promise<void> {
  await withContext(options, (context) =>
    runWithProgress(context, options, (orchestrator) => orchestrator.extract(options.run), extracted),
  );
}
