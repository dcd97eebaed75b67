import { categorize, getCategoryRules, type CategoryRuleSet } from './category-service.js';
import { getTagRules, tag, type TagRule } from './tag-service.js';
import type { TransactionStore } from './transaction-store.js';

export interface MaintenanceResult {
  examined: number;
  updated: number;
}

/**
 * Re-applies the current category rules to rows enrichment has not reached.
 * Enriched rows are left alone.
 */
export function recategorizeFastPath(
  store: TransactionStore,
  rules: CategoryRuleSet = getCategoryRules()
): MaintenanceResult {
  const rows = store.fastPathTransactions();
  let updated = 0;

  for (const row of rows) {
    const category = categorize(row, rules);
    if (category !== row.category && store.updateFastPath(row.id, { category })) {
      updated++;
    }
  }

  console.log(`[Maintenance] Recategorized ${updated} of ${rows.length} fast-path transactions`);
  return { examined: rows.length, updated };
}

export function retagUntagged(store: TransactionStore, rules: TagRule[] = getTagRules()): MaintenanceResult {
  const rows = store.untaggedTransactions();
  let updated = 0;

  for (const row of rows) {
    const tags = tag(row, rules);
    if (tags.length > 0 && store.updateFastPath(row.id, { tags })) {
      updated++;
    }
  }

  console.log(`[Maintenance] Tagged ${updated} of ${rows.length} untagged transactions`);
  return { examined: rows.length, updated };
}
