import { mainRegionSchema } from '../../config/schema.js';
import { runMigration } from '../../migration/pipeline.js';
import type { MigrationResult, TemplateSource } from '../../migration/types.js';
import type { Logger } from '../../logger.js';
import { formatMovedBlock, formatSkipped } from '../formatters/moved-block.js';
import { formatReport } from '../formatters/report.js';
import { readTextInput, toAddressList, type InputDeps } from '../utils/input.js';
import {
  readTemplateSources,
  resolveTemplatePaths,
  type TemplateFileRule,
  type TemplatePathDeps,
} from '../utils/template-paths.js';

export interface GenerateInput {
  /** Legacy address list path, or "-" for stdin */
  fromFile: string;
  mainRegion: string;
  /** Directory, comma-separated list or glob; omit for heuristic mode */
  templates?: string;
  validateFile?: string;
  unifiedModule: string;
  templateFiles: TemplateFileRule;
  comments: boolean;
  showSkipped: boolean;
}

export interface GenerateOutput {
  /** The moved resources block (plus skipped comments when requested) */
  output: string;
  /** Human-readable summary for stderr */
  report: string;
  result: MigrationResult;
}

export type GenerateDeps = Partial<InputDeps> & Partial<TemplatePathDeps>;

/** Raised when the address list has no usable lines. */
export class NoAddressesError extends Error {
  constructor() {
    super('No state addresses provided');
    this.name = 'NoAddressesError';
  }
}

function loadTemplates(
  templatesArg: string | undefined,
  rule: TemplateFileRule,
  logger: Logger,
  deps: GenerateDeps,
): TemplateSource[] {
  if (!templatesArg) {
    logger.warn(
      'No templates provided; using heuristic mode. Consider --templates for accurate results.',
    );
    return [];
  }

  const paths = resolveTemplatePaths(templatesArg, rule, deps);
  if (paths.length === 0) {
    logger.warn(`No unified templates found at '${templatesArg}'; using heuristic mode.`);
    return [];
  }

  const sources = readTemplateSources(paths, deps);
  logger.info(`Parsing ${sources.length} unified templates`, {
    files: sources.map((s) => s.name),
  });
  return sources;
}

/**
 * Read the inputs, run the migration and render its outputs.
 *
 * File reads go through `deps` so tests can supply in-memory content.
 * Writing the outputs is left to the caller.
 */
export function generateMovedResources(
  input: GenerateInput,
  logger: Logger,
  deps: GenerateDeps = {},
): GenerateOutput {
  const region = mainRegionSchema.safeParse(input.mainRegion);
  if (!region.success) {
    throw new Error(
      `Invalid main region '${input.mainRegion}': ${region.error.issues.map((i) => i.message).join(', ')}`,
    );
  }

  const addresses = toAddressList(readTextInput(input.fromFile, deps));
  if (addresses.length === 0) {
    throw new NoAddressesError();
  }
  logger.info(`Read ${addresses.length} state addresses`);

  const templates = loadTemplates(input.templates, input.templateFiles, logger, deps);

  const actualAddresses = input.validateFile
    ? toAddressList(readTextInput(input.validateFile, deps))
    : undefined;

  const result = runMigration({
    addresses,
    mainRegion: input.mainRegion,
    templates,
    actualAddresses,
    unifiedModule: input.unifiedModule,
  });

  for (const error of result.parseErrors) {
    logger.warn(`Could not parse address: ${error.line}`, { reason: error.reason });
  }
  for (const error of result.translationErrors) {
    logger.warn(`Could not translate address: ${error.line}`, { reason: error.reason });
  }
  for (const entry of result.entries) {
    logger.debug(`${entry.address.raw} -> ${entry.pair?.moved_to ?? '(skipped)'}`, {
      case: entry.classification.case,
      confidence: entry.classification.confidence,
    });
  }

  let output = formatMovedBlock(result.entries, { comments: input.comments });
  if (input.showSkipped) {
    output += formatSkipped(result.entries);
  }

  return { output: output + '\n', report: formatReport(result), result };
}
