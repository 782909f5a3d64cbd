import type { MigrationEntry } from '../../migration/types.js';

export interface MovedBlockOptions {
  /** Precede each entry with a `# <CASE> (<confidence>)` comment */
  comments: boolean;
  /** Attribute name of the list, e.g. "baseline_moved_resources" */
  attribute?: string;
}

export const DEFAULT_ATTRIBUTE = 'baseline_moved_resources';

/** Escape a value for an HCL quoted string. */
export function hclString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, '%%{');
  return `"${escaped}"`;
}

/**
 * Render the moved resources list, one object per generated pair, in input
 * order. Skipped data sources are not part of the list.
 */
export function formatMovedBlock(entries: MigrationEntry[], options: MovedBlockOptions): string {
  const attribute = options.attribute ?? DEFAULT_ATTRIBUTE;
  const lines: string[] = [`  ${attribute} = [`];

  for (const entry of entries) {
    if (!entry.pair) continue;
    if (options.comments) {
      const { case: migrationCase, confidence } = entry.classification;
      lines.push(`    # ${migrationCase} (${confidence})`);
    }
    lines.push('    {');
    lines.push(`      moved_from = ${hclString(entry.pair.moved_from)}`);
    lines.push(`      moved_to   = ${hclString(entry.pair.moved_to)}`);
    lines.push('    },');
  }

  lines.push('  ]');
  return lines.join('\n');
}

/**
 * Render skipped data sources as comment lines, or an empty string when none
 * were skipped.
 */
export function formatSkipped(entries: MigrationEntry[]): string {
  const skipped = entries.filter((e) => e.classification.case === 'DATA_SOURCE_SKIPPED');
  if (skipped.length === 0) return '';

  const lines = ['', '  # Skipped data sources (re-computed, no moved blocks needed):'];
  for (const entry of skipped) {
    lines.push(`  #   ${entry.address.raw}`);
  }
  return lines.join('\n');
}
