import type { MigrationResult, ValidationIssue, ValidationIssueKind } from '../../migration/types.js';

const RULE = '='.repeat(60);
const LABEL_WIDTH = 30;

function row(label: string, value: number): string {
  return `  ${label.padEnd(LABEL_WIDTH)}${value}`;
}

const ISSUE_KINDS: ValidationIssueKind[] = ['MISSING_IN_ACTUAL', 'NOT_COVERED'];

const ISSUE_TITLES: Record<ValidationIssueKind, string> = {
  MISSING_IN_ACTUAL: 'Generated moved_to not found in unified state',
  NOT_COVERED: 'Unified resource has no moved_from mapping',
};

function formatIssues(issues: ValidationIssue[]): string[] {
  if (issues.length === 0) {
    return ['', '  Validation passed: all moves match unified state.'];
  }

  const lines = ['', `  VALIDATION ISSUES: ${issues.length}`];
  for (const kind of ISSUE_KINDS) {
    const ofKind = issues.filter((i) => i.kind === kind);
    if (ofKind.length === 0) continue;
    lines.push(`    [${kind}] ${ISSUE_TITLES[kind]} (${ofKind.length}):`);
    for (const issue of ofKind) {
      lines.push(`      - ${issue.address}`);
    }
  }
  return lines;
}

/**
 * Human-readable summary of a migration run.
 */
export function formatReport(result: MigrationResult): string {
  const { summary } = result;
  const lines = [
    RULE,
    'MIGRATION SUMMARY',
    RULE,
    row('Total addresses processed:', summary.total),
    row('Data sources (skipped):', summary.byCase.DATA_SOURCE_SKIPPED),
    row('Global (index removed):', summary.byCase.GLOBAL_INDEX_REMOVED),
    row('Global (index kept):', summary.byCase.GLOBAL_INDEX_KEPT),
    row('Regional (keyed by region):', summary.byCase.REGIONAL_KEYED),
  ];

  if (result.parseErrors.length > 0) {
    lines.push(row('Unparseable lines:', result.parseErrors.length));
  }
  if (result.translationErrors.length > 0) {
    lines.push(row('Untranslatable addresses:', result.translationErrors.length));
  }

  lines.push(
    '  ---',
    row('Moved blocks generated:', summary.movedBlocks),
    row('Confidence: template-based:', summary.byConfidence.TEMPLATE),
    row('Confidence: heuristic:', summary.byConfidence.HEURISTIC),
  );

  if (summary.byConfidence.HEURISTIC > 0) {
    lines.push(
      '',
      '  WARNING: Some moves were generated via heuristic (no template match).',
      '     Review these carefully or provide unified templates with --templates.',
    );
  }

  if (summary.issues !== null) {
    lines.push(...formatIssues(summary.issues));
  }

  lines.push(RULE);
  return lines.join('\n') + '\n';
}
