/**
 * Reconciliation pass: repair vacancy_web from its backup snapshot
 */

import type { ReconcileResult } from "@/types";
import {
  countVacancyWeb,
  reconcileVacancyWebFromBackup,
  withTransaction,
} from "@/db";
import * as logger from "@/logger";

/**
 * Run reconciliation as one exclusive transaction.
 *
 * For every URL present in both tables the backup's raw_html,
 * status_code and last_check replace the live values. The live row
 * count is checked before commit; a change rolls everything back.
 *
 * @throws {Error} If the row count changed (nothing is committed)
 */
export function runReconciliation(): ReconcileResult {
  const result = withTransaction(() => {
    const before = countVacancyWeb();
    const outcome = reconcileVacancyWebFromBackup();
    const after = countVacancyWeb();

    if (before !== after) {
      throw new Error(
        `Reconciliation changed vacancy_web row count (${before} -> ${after})`,
      );
    }
    return outcome;
  });

  logger.info("Reconciliation complete", {
    matched: result.matched,
    updated: result.updated,
  });

  return result;
}
