import type { Classification, ModuleSegment, MovedPair, ParsedAddress } from './types.js';

export const DEFAULT_UNIFIED_MODULE = 'baseline_unified';

/** Raised when a classified address has no unified form. */
export class TranslationError extends Error {
  constructor(
    public readonly address: string,
    reason: string,
  ) {
    super(`${reason}: ${address}`);
    this.name = 'TranslationError';
  }
}

/** A numeric index is printed with its digits as written. */
function formatIndex(index: number | string | undefined, indexText?: string): string {
  if (indexText !== undefined) return `[${indexText}]`;
  if (index === undefined) return '';
  return typeof index === 'number' ? `[${index}]` : `["${index}"]`;
}

function formatModule(segment: ModuleSegment): string {
  return `module.${segment.name}${formatIndex(segment.index, segment.indexText)}`;
}

function resourceSuffix(address: ParsedAddress, classification: Classification): string {
  switch (classification.case) {
    case 'GLOBAL_INDEX_REMOVED':
      return '';
    case 'GLOBAL_INDEX_KEPT':
      return formatIndex(address.index ?? address.key, address.indexText);
    case 'REGIONAL_KEYED':
      if (address.moduleRegion === undefined) {
        throw new TranslationError(address.raw, 'No region in module name to key a regional resource by');
      }
      return `["${address.moduleRegion}"]`;
    case 'DATA_SOURCE_SKIPPED':
      throw new TranslationError(address.raw, 'Data sources are not moved');
  }
}

/**
 * Rewrite a legacy address into the unified layout.
 *
 * The first module hop becomes `module.<unifiedModule>[0]`; nested hops after
 * it are carried over unchanged.
 */
export function translate(
  address: ParsedAddress,
  classification: Classification,
  unifiedModule: string = DEFAULT_UNIFIED_MODULE,
): MovedPair {
  const modules = [
    `module.${unifiedModule}[0]`,
    ...address.modulePath.slice(1).map(formatModule),
  ];
  const base = `${modules.join('.')}.${address.resourceKind}.${address.resourceName}`;

  return { moved_from: address.raw, moved_to: `${base}${resourceSuffix(address, classification)}` };
}
