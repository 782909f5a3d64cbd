import type {
  Confidence,
  MigrationCase,
  MigrationEntry,
  MigrationSummary,
  ValidationIssue,
} from './types.js';

export function buildSummary(
  entries: MigrationEntry[],
  issues: ValidationIssue[] | null,
): MigrationSummary {
  const byCase: Record<MigrationCase, number> = {
    GLOBAL_INDEX_REMOVED: 0,
    GLOBAL_INDEX_KEPT: 0,
    REGIONAL_KEYED: 0,
    DATA_SOURCE_SKIPPED: 0,
  };
  const byConfidence: Record<Confidence, number> = { TEMPLATE: 0, HEURISTIC: 0, RULE: 0 };
  let movedBlocks = 0;

  for (const entry of entries) {
    byCase[entry.classification.case] += 1;
    byConfidence[entry.classification.confidence] += 1;
    if (entry.pair) movedBlocks += 1;
  }

  return {
    total: entries.length,
    byCase,
    byConfidence,
    movedBlocks,
    issues,
  };
}
