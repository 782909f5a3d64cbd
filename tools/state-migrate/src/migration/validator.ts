import { isParseError, parseAddress } from './address-parser.js';
import type { MovedPair, ValidationIssue } from './types.js';

function isDataSource(address: string): boolean {
  const parsed = parseAddress(address);
  return !isParseError(parsed) && parsed.isDataSource;
}

/**
 * Cross-check generated targets against the actual unified state.
 *
 * - MISSING_IN_ACTUAL: a generated moved_to the actual state does not have
 * - NOT_COVERED: an actual resource no moved_to points at (data sources excluded)
 *
 * Comparison is exact string equality. Issues come out in input order, each
 * distinct address at most once per kind.
 */
export function validate(pairs: MovedPair[], actualAddresses: string[]): ValidationIssue[] {
  const actual = new Set(actualAddresses);
  const generated = new Set(pairs.map((p) => p.moved_to));
  const issues: ValidationIssue[] = [];

  const reportedMissing = new Set<string>();
  for (const pair of pairs) {
    if (actual.has(pair.moved_to) || reportedMissing.has(pair.moved_to)) continue;
    reportedMissing.add(pair.moved_to);
    issues.push({ kind: 'MISSING_IN_ACTUAL', address: pair.moved_to });
  }

  const reportedUncovered = new Set<string>();
  for (const address of actualAddresses) {
    if (generated.has(address) || reportedUncovered.has(address)) continue;
    if (isDataSource(address)) continue;
    reportedUncovered.add(address);
    issues.push({ kind: 'NOT_COVERED', address });
  }

  return issues;
}
