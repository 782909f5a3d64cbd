import { describe, it, expect } from 'vitest';
import {
  parseAddress,
  parseAddresses,
  isParseError,
  extractRegion,
} from '../../src/migration/address-parser.js';

describe('extractRegion', () => {
  it('converts an underscored region token to hyphens', () => {
    expect(extractRegion('baseline_eu_central_1')).toBe('eu-central-1');
  });

  it('finds a hyphenated token', () => {
    expect(extractRegion('baseline-us-east-1')).toBe('us-east-1');
  });

  it('handles gov regions', () => {
    expect(extractRegion('baseline_us_gov_west_1')).toBe('us-gov-west-1');
  });

  it('returns undefined when the name encodes no region', () => {
    expect(extractRegion('baseline_unified')).toBeUndefined();
  });

  it('ignores tokens glued to other letters', () => {
    expect(extractRegion('xeu_central_1')).toBeUndefined();
  });
});

describe('parseAddress', () => {
  it('parses a legacy address with module and resource indices', () => {
    const result = parseAddress('module.baseline_eu_central_1[0].aws_iam_role.ntc_config[0]');
    expect(result).toEqual({
      raw: 'module.baseline_eu_central_1[0].aws_iam_role.ntc_config[0]',
      modulePath: [{ name: 'baseline_eu_central_1', index: 0, indexText: '0' }],
      moduleRegion: 'eu-central-1',
      resourceKind: 'aws_iam_role',
      resourceName: 'ntc_config',
      index: 0,
      indexText: '0',
      isDataSource: false,
    });
  });

  it('keeps the digits of an index as written', () => {
    const result = parseAddress('module.baseline_eu_central_1[0].aws_kms_key.ntc_state_encryption[01]');
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.index).toBe(1);
    expect(result.indexText).toBe('01');
  });

  it('leaves index undefined when the resource has none', () => {
    const result = parseAddress(
      'module.baseline_us_east_1[0].aws_config_configuration_recorder.ntc_config',
    );
    expect(isParseError(result)).toBe(false);
    if (isParseError(result)) return;
    expect(result.index).toBeUndefined();
    expect(result.moduleRegion).toBe('us-east-1');
  });

  it('captures a for_each key', () => {
    const result = parseAddress(
      'module.baseline_unified[0].aws_config_configuration_recorder.ntc_config["eu-central-1"]',
    );
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.key).toBe('eu-central-1');
    expect(result.index).toBeUndefined();
    expect(result.moduleRegion).toBeUndefined();
  });

  it('accepts resource names with hyphens', () => {
    const result = parseAddress('module.baseline_eu_central_1[0].aws_s3_bucket.ntc-logs');
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.resourceName).toBe('ntc-logs');
  });

  it('marks data sources inside a module', () => {
    const result = parseAddress(
      'module.baseline_eu_central_1[0].data.aws_iam_policy_document.ntc_config[0]',
    );
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.isDataSource).toBe(true);
    expect(result.resourceKind).toBe('aws_iam_policy_document');
  });

  it('marks top-level data sources', () => {
    const result = parseAddress('data.aws_caller_identity.current');
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.isDataSource).toBe(true);
    expect(result.modulePath).toEqual([]);
  });

  it('parses nested modules and takes the region from the first that has one', () => {
    const result = parseAddress(
      'module.baseline_eu_west_1[0].module.logging["main"].aws_s3_bucket.logs',
    );
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.modulePath).toEqual([
      { name: 'baseline_eu_west_1', index: 0, indexText: '0' },
      { name: 'logging', index: 'main' },
    ]);
    expect(result.moduleRegion).toBe('eu-west-1');
  });

  it('trims surrounding whitespace into raw', () => {
    const result = parseAddress('  module.baseline_eu_central_1[0].aws_iam_role.a  ');
    if (isParseError(result)) throw new Error(result.reason);
    expect(result.raw).toBe('module.baseline_eu_central_1[0].aws_iam_role.a');
  });

  it('rejects a managed resource without a module path', () => {
    expect(parseAddress('aws_iam_role.ntc_config')).toEqual({
      line: 'aws_iam_role.ntc_config',
      reason: 'address has no module path',
    });
  });

  it('rejects an unrecognized shape', () => {
    expect(parseAddress('module.baseline_eu_central_1[0].aws_iam_role')).toEqual({
      line: 'module.baseline_eu_central_1[0].aws_iam_role',
      reason: 'unrecognized address shape',
    });
  });

  it('rejects an empty line', () => {
    expect(isParseError(parseAddress('   '))).toBe(true);
  });

  it('yields structurally equal results when parsing the same line twice', () => {
    const line = 'module.baseline_eu_central_1[0].aws_kms_key.ntc_state_encryption[0]';
    expect(parseAddress(line)).toEqual(parseAddress(line));
  });
});

describe('parseAddresses', () => {
  it('collects errors without stopping at a malformed line', () => {
    const { addresses, errors } = parseAddresses([
      'module.baseline_eu_central_1[0].aws_iam_role.a',
      'not an address',
      'module.baseline_us_east_1[0].aws_iam_role.b',
    ]);
    expect(addresses.map((a) => a.resourceName)).toEqual(['a', 'b']);
    expect(errors).toEqual([{ line: 'not an address', reason: 'unrecognized address shape' }]);
  });
});
