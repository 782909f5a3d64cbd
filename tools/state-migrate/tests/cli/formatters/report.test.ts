import { describe, it, expect } from 'vitest';
import { formatReport } from '../../../src/cli/formatters/report.js';
import type { MigrationResult, ValidationIssue } from '../../../src/migration/types.js';

function makeResult(overrides: Partial<MigrationResult> = {}, issues: ValidationIssue[] | null = null): MigrationResult {
  return {
    entries: [],
    parseErrors: [],
    translationErrors: [],
    pairs: [],
    issues,
    summary: {
      total: 3,
      byCase: {
        GLOBAL_INDEX_REMOVED: 1,
        GLOBAL_INDEX_KEPT: 0,
        REGIONAL_KEYED: 1,
        DATA_SOURCE_SKIPPED: 1,
      },
      byConfidence: { TEMPLATE: 2, HEURISTIC: 0, RULE: 1 },
      movedBlocks: 2,
      issues,
    },
    ...overrides,
  };
}

const RULE = '='.repeat(60);

describe('formatReport', () => {
  it('renders the summary table', () => {
    expect(formatReport(makeResult())).toBe(
      [
        RULE,
        'MIGRATION SUMMARY',
        RULE,
        '  Total addresses processed:    3',
        '  Data sources (skipped):       1',
        '  Global (index removed):       1',
        '  Global (index kept):          0',
        '  Regional (keyed by region):   1',
        '  ---',
        '  Moved blocks generated:       2',
        '  Confidence: template-based:   2',
        '  Confidence: heuristic:        0',
        RULE,
        '',
      ].join('\n'),
    );
  });

  it('warns when heuristic classifications were used', () => {
    const base = makeResult();
    const result = makeResult({
      summary: { ...base.summary, byConfidence: { TEMPLATE: 0, HEURISTIC: 2, RULE: 1 } },
    });

    const lines = formatReport(result).split('\n');

    expect(lines).toContain('  Confidence: heuristic:        2');
    expect(lines).toContain('  WARNING: Some moves were generated via heuristic (no template match).');
  });

  it('counts unparseable and untranslatable lines when present', () => {
    const result = makeResult({
      parseErrors: [{ line: 'garbage', reason: 'unrecognized address shape' }],
      translationErrors: [
        { line: 'module.legacy[0].aws_sns_topic.alerts', reason: 'No region' },
        { line: 'module.other[0].aws_sns_topic.alerts', reason: 'No region' },
      ],
    });

    const lines = formatReport(result).split('\n');

    expect(lines).toContain('  Unparseable lines:            1');
    expect(lines).toContain('  Untranslatable addresses:     2');
  });

  it('omits the validation section when validation did not run', () => {
    expect(formatReport(makeResult())).not.toContain('Validation');
  });

  it('reports a passing validation', () => {
    const lines = formatReport(makeResult({}, [])).split('\n');

    expect(lines).toContain('  Validation passed: all moves match unified state.');
  });

  it('groups validation issues by kind', () => {
    const issues: ValidationIssue[] = [
      { kind: 'NOT_COVERED', address: 'module.baseline_unified[0].aws_sns_topic.alerts' },
      { kind: 'MISSING_IN_ACTUAL', address: 'module.baseline_unified[0].aws_iam_role.ntc_config' },
    ];

    const report = formatReport(makeResult({}, issues));
    const start = report.indexOf('  VALIDATION ISSUES: 2');

    expect(start).toBeGreaterThan(0);
    expect(report.slice(start).split('\n').slice(0, 5)).toEqual([
      '  VALIDATION ISSUES: 2',
      '    [MISSING_IN_ACTUAL] Generated moved_to not found in unified state (1):',
      '      - module.baseline_unified[0].aws_iam_role.ntc_config',
      '    [NOT_COVERED] Unified resource has no moved_from mapping (1):',
      '      - module.baseline_unified[0].aws_sns_topic.alerts',
    ]);
  });
});
