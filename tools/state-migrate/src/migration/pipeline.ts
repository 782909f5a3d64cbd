import { parseAddresses } from './address-parser.js';
import { analyzeTemplates } from './template-analyzer.js';
import { classify, observeRegions } from './classifier.js';
import { translate, TranslationError, DEFAULT_UNIFIED_MODULE } from './translator.js';
import { validate } from './validator.js';
import { buildSummary } from './summary.js';
import type {
  MigrateInput,
  MigrationEntry,
  MigrationResult,
  MovedPair,
  TranslationFailure,
} from './types.js';

/**
 * Run the full migration over already-read text: parse, analyze templates,
 * classify, translate, validate and summarize.
 *
 * This is a pure logic function (no I/O).
 * The CLI wrapper handles reading inputs and formatting output.
 */
export function runMigration(input: MigrateInput): MigrationResult {
  const { addresses, mainRegion, templates, actualAddresses } = input;
  const unifiedModule = input.unifiedModule ?? DEFAULT_UNIFIED_MODULE;

  const parsed = parseAddresses(addresses);
  const lookup = templates.length > 0 ? analyzeTemplates(templates) : undefined;
  const observed = observeRegions(parsed.addresses);

  const entries: MigrationEntry[] = [];
  const translationErrors: TranslationFailure[] = [];

  for (const address of parsed.addresses) {
    const classification = classify(address, mainRegion, lookup, observed);
    if (classification.case === 'DATA_SOURCE_SKIPPED') {
      entries.push({ address, classification });
      continue;
    }

    try {
      const pair = translate(address, classification, unifiedModule);
      entries.push({ address, classification, pair });
    } catch (err) {
      if (!(err instanceof TranslationError)) throw err;
      translationErrors.push({ line: err.address, reason: err.message });
    }
  }

  const pairs = entries
    .map((e) => e.pair)
    .filter((p): p is MovedPair => p !== undefined);

  const issues = actualAddresses !== undefined ? validate(pairs, actualAddresses) : null;

  return {
    entries,
    parseErrors: parsed.errors,
    translationErrors,
    pairs,
    issues,
    summary: buildSummary(entries, issues),
  };
}
