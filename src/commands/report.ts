/**
 * tm-migrate report — Per-type counts and failures of a run
 */

import { showReport, showRuns } from '../cli/summary.js';
import { buildReport } from '../migrate/report.js';
import { resolveRunId, withContext, type GlobalOptions } from './context.js';

export interface ReportCommandOptions extends GlobalOptions {
  json?: boolean;
  /** List every run instead */
  all?: boolean;
}

export async function reportCommand(options: ReportCommandOptions): Promise<void> {
  await withContext(options, async ({ store }) => {
    if (options.all) {
      const runs = store.listRuns();
      if (options.json) {
        console.log(JSON.stringify(runs, null, 2));
      } else {
        showRuns(runs);
      }
      return 0;
    }

    const report = buildReport(store, resolveRunId(store, options.run));
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      showReport(report);
    }
    return report.status === 'completed' ? 0 : 1;
  });
}
