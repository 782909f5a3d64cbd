import type { RepetitionLookup } from './template-analyzer.js';
import type { Classification, ParsedAddress } from './types.js';

/** Distinct module regions each (kind, name) pair was seen under. */
export type ObservedRegions = Map<string, Set<string>>;

export function resourceId(address: Pick<ParsedAddress, 'resourceKind' | 'resourceName'>): string {
  return `${address.resourceKind}.${address.resourceName}`;
}

/**
 * Group the whole input by resource pair and collect the regions each pair
 * appears in. Data sources and addresses without a region are not counted.
 */
export function observeRegions(addresses: ParsedAddress[]): ObservedRegions {
  const observed: ObservedRegions = new Map();
  for (const address of addresses) {
    if (address.isDataSource || address.moduleRegion === undefined) continue;
    const id = resourceId(address);
    const regions = observed.get(id) ?? new Set<string>();
    regions.add(address.moduleRegion);
    observed.set(id, regions);
  }
  return observed;
}

/**
 * Decide how an address moves into the unified layout.
 *
 * Template coverage always wins. Without it:
 * - a pair seen in more than one region becomes regional (keyed by region)
 * - an indexed address in the main region loses its index
 * - anything else keeps its index
 *
 * The second heuristic rule cannot tell "index removed" from "index kept" for
 * a resource that appears once; it resolves to removal, which may be wrong.
 */
export function classify(
  address: ParsedAddress,
  mainRegion: string,
  lookup: RepetitionLookup | undefined,
  observed: ObservedRegions,
): Classification {
  if (address.isDataSource) {
    return { case: 'DATA_SOURCE_SKIPPED', confidence: 'RULE' };
  }

  const mode = lookup?.lookup(address.resourceKind, address.resourceName);
  switch (mode) {
    case 'indexed':
      return { case: 'GLOBAL_INDEX_KEPT', confidence: 'TEMPLATE' };
    case 'keyed':
      return { case: 'REGIONAL_KEYED', confidence: 'TEMPLATE' };
    case 'none':
      return { case: 'GLOBAL_INDEX_REMOVED', confidence: 'TEMPLATE' };
    case undefined:
      break;
  }

  const regions = observed.get(resourceId(address));
  if (regions !== undefined && regions.size > 1) {
    return { case: 'REGIONAL_KEYED', confidence: 'HEURISTIC' };
  }
  if (address.index !== undefined && address.moduleRegion === mainRegion) {
    return { case: 'GLOBAL_INDEX_REMOVED', confidence: 'HEURISTIC' };
  }
  return { case: 'GLOBAL_INDEX_KEPT', confidence: 'HEURISTIC' };
}
