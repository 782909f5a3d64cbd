import type { RepetitionEntry, RepetitionMode, TemplateSource } from './types.js';

/**
 * Number of lines after a `resource` header that are searched for a
 * `for_each` or `count` argument. Arguments further down the block are not
 * seen; the header line itself is searched but does not count.
 */
export const LOOKAHEAD_LINES = 5;

const RESOURCE_DECLARATION_PATTERN = /^\s*resource\s+"(\w+)"\s+"([\w${}./-]+)"\s*\{/;

/** `for_each =` assignment, not `for_each ==` */
const KEYED_PATTERN = /\bfor_each\s*=(?!=)/;

/** `count =` assignment; `count.index` references do not match */
const INDEXED_PATTERN = /\bcount\s*=(?!=)/;

const INTERPOLATION_PATTERN = /\$\{[^}]+\}/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a declared resource name into a matcher.
 * "ntc_role__${role_name}" matches "ntc_role__admin" and "ntc_role__read-only".
 */
function compileNamePattern(nameTemplate: string): RegExp {
  const parts = nameTemplate.split(INTERPOLATION_PATTERN).map(escapeRegExp);
  return new RegExp(`^${parts.join('[\\w-]+')}$`);
}

function entryKey(kind: string, nameTemplate: string): string {
  return `${kind}\u0000${nameTemplate}`;
}

/**
 * Repetition modes of the resources declared in the unified templates.
 *
 * Recording a (kind, name) pair that is already present replaces it and moves
 * it to the end, so the most recent declaration wins both for exact names and
 * for interpolated name patterns.
 */
export class RepetitionLookup {
  private readonly byKey = new Map<string, { entry: RepetitionEntry; pattern: RegExp }>();

  record(entry: RepetitionEntry): void {
    const key = entryKey(entry.kind, entry.nameTemplate);
    this.byKey.delete(key);
    this.byKey.set(key, { entry, pattern: compileNamePattern(entry.nameTemplate) });
  }

  /** Most recently recorded entry whose kind and name match, if any. */
  find(kind: string, name: string): RepetitionEntry | undefined {
    const candidates = [...this.byKey.values()].reverse();
    const match = candidates.find((c) => c.entry.kind === kind && c.pattern.test(name));
    return match?.entry;
  }

  lookup(kind: string, name: string): RepetitionMode | undefined {
    return this.find(kind, name)?.mode;
  }

  entries(): RepetitionEntry[] {
    return [...this.byKey.values()].map((v) => v.entry);
  }

  get size(): number {
    return this.byKey.size;
  }
}

/**
 * Decide the repetition mode from a declaration window.
 * for_each wins over count when both appear.
 */
export function detectRepetition(windowLines: string[]): RepetitionMode {
  const block = windowLines.join('\n');
  if (KEYED_PATTERN.test(block)) return 'keyed';
  if (INDEXED_PATTERN.test(block)) return 'indexed';
  return 'none';
}

/**
 * Scan one template for resource declarations.
 * This is a lexical scan over a fixed line window, not a parse of the block.
 */
export function scanTemplate(source: TemplateSource): RepetitionEntry[] {
  const lines = source.text.split(/\r?\n/);
  const entries: RepetitionEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    const match = RESOURCE_DECLARATION_PATTERN.exec(lines[i]);
    if (!match) continue;

    const window = lines.slice(i, i + 1 + LOOKAHEAD_LINES);
    entries.push({
      kind: match[1],
      nameTemplate: match[2],
      mode: detectRepetition(window),
      source: source.name,
    });
  }

  return entries;
}

/**
 * Build the repetition lookup from templates, in the order given.
 * Duplicate declarations are not merged: the later one replaces the earlier.
 */
export function analyzeTemplates(sources: TemplateSource[]): RepetitionLookup {
  const lookup = new RepetitionLookup();
  for (const source of sources) {
    for (const entry of scanTemplate(source)) {
      lookup.record(entry);
    }
  }
  return lookup;
}
