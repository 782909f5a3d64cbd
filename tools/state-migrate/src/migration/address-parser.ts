import type { ModuleSegment, ParsedAddress, ParseError } from './types.js';

/** One `module.<name>[<index>].` hop, matched at the current position. */
const MODULE_SEGMENT_PATTERN = /module\.([A-Za-z_][\w-]*)(?:\[(\d+)\]|\["([^"]+)"\])?\./y;

/** Resource part: optional `data.`, type, name, optional `[n]` or `["key"]`. */
const RESOURCE_PATTERN = /^(data\.)?([A-Za-z_]\w*)\.([\w-]+)(?:\[(\d+)\]|\["([^"]+)"\])?$/;

/**
 * Region token embedded in a module name: `eu_central_1`, `us-gov-west-1`.
 * Must not be glued to other letters or digits on either side.
 */
const REGION_TOKEN_PATTERN = /(?<![a-z0-9])([a-z]{2}(?:[_-]gov)?[_-][a-z]+[_-]\d+)(?![a-z0-9])/i;

export function isParseError(value: ParsedAddress | ParseError): value is ParseError {
  return 'reason' in value;
}

/**
 * Extract the region from a module name, normalized to hyphens.
 *   baseline_eu_central_1 -> eu-central-1
 *   baseline_unified      -> undefined
 */
export function extractRegion(moduleName: string): string | undefined {
  const match = REGION_TOKEN_PATTERN.exec(moduleName);
  if (!match) return undefined;
  return match[1].toLowerCase().replace(/_/g, '-');
}

/**
 * Parse one state address line.
 *
 * Handles addresses like:
 *   module.baseline_eu_central_1[0].aws_iam_role.ntc_config[0]
 *   module.baseline_eu_central_1[0].data.aws_iam_policy_document.ntc_config
 *   module.baseline_unified[0].aws_config_configuration_recorder.ntc_config["eu-central-1"]
 *   data.aws_caller_identity.current
 */
export function parseAddress(line: string): ParsedAddress | ParseError {
  const raw = line.trim();
  if (raw === '') {
    return { line, reason: 'empty address' };
  }

  const modulePath: ModuleSegment[] = [];
  MODULE_SEGMENT_PATTERN.lastIndex = 0;
  let offset = 0;
  let segment = MODULE_SEGMENT_PATTERN.exec(raw);
  while (segment) {
    modulePath.push({
      name: segment[1],
      ...(segment[2] !== undefined && { index: Number(segment[2]), indexText: segment[2] }),
      ...(segment[3] !== undefined && { index: segment[3] }),
    });
    offset = MODULE_SEGMENT_PATTERN.lastIndex;
    segment = MODULE_SEGMENT_PATTERN.exec(raw);
  }

  const resource = RESOURCE_PATTERN.exec(raw.slice(offset));
  if (!resource) {
    return { line: raw, reason: 'unrecognized address shape' };
  }

  const isDataSource = resource[1] !== undefined;
  if (modulePath.length === 0 && !isDataSource) {
    return { line: raw, reason: 'address has no module path' };
  }

  let moduleRegion: string | undefined;
  for (const mod of modulePath) {
    moduleRegion = extractRegion(mod.name);
    if (moduleRegion) break;
  }

  return {
    raw,
    modulePath,
    ...(moduleRegion !== undefined && { moduleRegion }),
    resourceKind: resource[2],
    resourceName: resource[3],
    ...(resource[4] !== undefined && { index: Number(resource[4]), indexText: resource[4] }),
    ...(resource[5] !== undefined && { key: resource[5] }),
    isDataSource,
  };
}

/**
 * Parse every line, splitting results into addresses and errors.
 * One malformed line never blocks the rest.
 */
export function parseAddresses(lines: string[]): {
  addresses: ParsedAddress[];
  errors: ParseError[];
} {
  const addresses: ParsedAddress[] = [];
  const errors: ParseError[] = [];
  for (const line of lines) {
    const result = parseAddress(line);
    if (isParseError(result)) {
      errors.push(result);
    } else {
      addresses.push(result);
    }
  }
  return { addresses, errors };
}
