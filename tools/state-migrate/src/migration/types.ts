/**
 * Types for the legacy-to-unified state address migration.
 */

/** One `module.<name>[<index>]` hop in a state address. */
export interface ModuleSegment {
  name: string;
  /** Numeric count index or quoted for_each key, when the module carries one */
  index?: number | string;
  /** Digits of a numeric index as written, e.g. "01" */
  indexText?: string;
}

/**
 * A state address parsed from one input line.
 *
 * For data sources only `raw` and `isDataSource` are meaningful; they are
 * excluded from every stage except reporting.
 */
export interface ParsedAddress {
  /** The trimmed input line, verbatim */
  raw: string;
  modulePath: ModuleSegment[];
  /** Region encoded in the module name, e.g. "eu-central-1" */
  moduleRegion?: string;
  /** Resource type, e.g. "aws_iam_role" */
  resourceKind: string;
  resourceName: string;
  /** Trailing `[n]` on the resource */
  index?: number;
  /** Digits of `index` as written */
  indexText?: string;
  /** Trailing `["key"]` on the resource */
  key?: string;
  isDataSource: boolean;
}

export interface ParseError {
  line: string;
  reason: string;
}

export type RepetitionMode = 'none' | 'indexed' | 'keyed';

/** A resource declaration found in a unified template. */
export interface RepetitionEntry {
  kind: string;
  /** Declared name; may contain `${...}` interpolations */
  nameTemplate: string;
  mode: RepetitionMode;
  /** Name of the template the declaration came from */
  source: string;
}

/** A unified template file's contents. */
export interface TemplateSource {
  name: string;
  text: string;
}

export const MIGRATION_CASES = [
  'GLOBAL_INDEX_REMOVED',
  'GLOBAL_INDEX_KEPT',
  'REGIONAL_KEYED',
  'DATA_SOURCE_SKIPPED',
] as const;

export type MigrationCase = (typeof MIGRATION_CASES)[number];

/** RULE is the confidence of skipped data sources: no decision was made. */
export const CONFIDENCES = ['TEMPLATE', 'HEURISTIC', 'RULE'] as const;

export type Confidence = (typeof CONFIDENCES)[number];

export interface Classification {
  case: MigrationCase;
  confidence: Confidence;
}

export interface MovedPair {
  moved_from: string;
  moved_to: string;
}

export type ValidationIssueKind = 'MISSING_IN_ACTUAL' | 'NOT_COVERED';

export interface ValidationIssue {
  kind: ValidationIssueKind;
  address: string;
}

/**
 * One parsed input address with its classification.
 * `pair` is absent for skipped data sources.
 */
export interface MigrationEntry {
  address: ParsedAddress;
  classification: Classification;
  pair?: MovedPair;
}

/** An address that parsed and classified but has no unified form. */
export interface TranslationFailure {
  line: string;
  reason: string;
}

export interface MigrationSummary {
  total: number;
  byCase: Record<MigrationCase, number>;
  byConfidence: Record<Confidence, number>;
  movedBlocks: number;
  /** null when no actual-state listing was supplied */
  issues: ValidationIssue[] | null;
}

/**
 * Input to the migration pipeline. All text is already materialized.
 */
export interface MigrateInput {
  /** Address lines with blanks and comments already removed */
  addresses: string[];
  mainRegion: string;
  templates: TemplateSource[];
  /** Actual unified-state addresses; omit to skip validation */
  actualAddresses?: string[];
  unifiedModule?: string;
}

export interface MigrationResult {
  entries: MigrationEntry[];
  parseErrors: ParseError[];
  translationErrors: TranslationFailure[];
  pairs: MovedPair[];
  issues: ValidationIssue[] | null;
  summary: MigrationSummary;
}
