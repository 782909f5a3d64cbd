// Types
export type {
  ModuleSegment,
  ParsedAddress,
  ParseError,
  RepetitionMode,
  RepetitionEntry,
  TemplateSource,
  MigrationCase,
  Confidence,
  Classification,
  MovedPair,
  ValidationIssue,
  ValidationIssueKind,
  MigrationEntry,
  TranslationFailure,
  MigrationSummary,
  MigrateInput,
  MigrationResult,
} from './migration/types.js';
export { MIGRATION_CASES, CONFIDENCES } from './migration/types.js';

// Pipeline stages
export { parseAddress, parseAddresses, isParseError, extractRegion } from './migration/address-parser.js';
export {
  analyzeTemplates,
  scanTemplate,
  detectRepetition,
  RepetitionLookup,
  LOOKAHEAD_LINES,
} from './migration/template-analyzer.js';
export { classify, observeRegions, resourceId } from './migration/classifier.js';
export type { ObservedRegions } from './migration/classifier.js';
export { translate, TranslationError, DEFAULT_UNIFIED_MODULE } from './migration/translator.js';
export { validate } from './migration/validator.js';
export { buildSummary } from './migration/summary.js';
export { runMigration } from './migration/pipeline.js';

// Config
export { migrationConfigSchema, partialMigrationConfigSchema, mainRegionSchema } from './config/schema.js';
export type { MigrationConfig, PartialMigrationConfig } from './config/schema.js';
export { loadConfig, mergeConfigs, CONFIG_PATHS } from './config/loader.js';
export { defaultMigrationConfig } from './config/defaults.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger, LoggerDeps, LogContext } from './logger.js';

// CLI building blocks
export { formatMovedBlock, formatSkipped, hclString } from './cli/formatters/moved-block.js';
export { formatReport } from './cli/formatters/report.js';
export { readTextInput, toAddressList } from './cli/utils/input.js';
export { resolveTemplatePaths, readTemplateSources } from './cli/utils/template-paths.js';
export type { TemplateFileRule } from './cli/utils/template-paths.js';
export { generateMovedResources, NoAddressesError } from './cli/logic/generate.js';
export type { GenerateInput, GenerateOutput } from './cli/logic/generate.js';
export { describeTemplates } from './cli/logic/templates.js';
export type { TemplatesOutput } from './cli/logic/templates.js';
