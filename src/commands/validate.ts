/**
 * tm-migrate validate — Check a run's correlations, statuses and journal
 */

import { showValidation } from '../cli/summary.js';
import { validateRun } from '../migrate/validation.js';
import { resolveRunId, withContext, type GlobalOptions } from './context.js';

export interface ValidateCommandOptions extends GlobalOptions {
  json?: boolean;
}

export async function validateCommand(options: ValidateCommandOptions): Promise<void> {
  await withContext(options, async ({ store }) => {
    const result = validateRun(store, resolveRunId(store, options.run));
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      showValidation(result);
    }
    return result.valid ? 0 : 1;
  });
}
