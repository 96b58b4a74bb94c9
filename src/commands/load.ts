/**
 * tm-migrate load — Load what has been extracted, transforming dependents
 * as their parents arrive
 */

import { resolveRunId, runWithProgress, withContext, type GlobalOptions } from './context.js';

export async function loadCommand(options: GlobalOptions): Promise<void> {
  await withContext(options, (context) => {
    const runId = resolveRunId(context.store, options.run);
    return runWithProgress(context, options, (orchestrator) => orchestrator.load(runId));
  });
}
