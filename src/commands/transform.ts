/**
 * tm-migrate transform — One transformation pass over staged entities
 */

import { resolveRunId, runWithProgress, withContext, type GlobalOptions } from './context.js';

export async function transformCommand(options: GlobalOptions): Promise<void> {
  await withContext(options, (context) => {
    const runId = resolveRunId(context.store, options.run);
    return runWithProgress(
      context,
      options,
      (orchestrator) => orchestrator.transform(runId),
      (report) => report.status !== 'aborted',
    );
  });
}
