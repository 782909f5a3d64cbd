import { describe, it, expect } from 'vitest';
import { buildSummary } from '../../src/migration/summary.js';
import type { MigrationEntry, ParsedAddress } from '../../src/migration/types.js';

function address(raw: string, isDataSource = false): ParsedAddress {
  return {
    raw,
    modulePath: [{ name: 'baseline_eu_central_1', index: 0 }],
    moduleRegion: 'eu-central-1',
    resourceKind: 'aws_iam_role',
    resourceName: raw,
    isDataSource,
  };
}

describe('buildSummary', () => {
  it('counts cases, confidences and moved blocks', () => {
    const entries: MigrationEntry[] = [
      {
        address: address('a'),
        classification: { case: 'GLOBAL_INDEX_REMOVED', confidence: 'TEMPLATE' },
        pair: { moved_from: 'a', moved_to: 'a2' },
      },
      {
        address: address('b'),
        classification: { case: 'REGIONAL_KEYED', confidence: 'HEURISTIC' },
        pair: { moved_from: 'b', moved_to: 'b2' },
      },
      {
        address: address('c', true),
        classification: { case: 'DATA_SOURCE_SKIPPED', confidence: 'RULE' },
      },
    ];

    expect(buildSummary(entries, null)).toEqual({
      total: 3,
      byCase: {
        GLOBAL_INDEX_REMOVED: 1,
        GLOBAL_INDEX_KEPT: 0,
        REGIONAL_KEYED: 1,
        DATA_SOURCE_SKIPPED: 1,
      },
      byConfidence: { TEMPLATE: 1, HEURISTIC: 1, RULE: 1 },
      movedBlocks: 2,
      issues: null,
    });
  });

  it('carries validation issues through', () => {
    const issues = [{ kind: 'NOT_COVERED' as const, address: 'x' }];
    expect(buildSummary([], issues).issues).toEqual(issues);
  });
});
