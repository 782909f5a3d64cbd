import { analyzeTemplates } from '../../migration/template-analyzer.js';
import type { RepetitionMode } from '../../migration/types.js';
import {
  readTemplateSources,
  resolveTemplatePaths,
  type TemplateFileRule,
  type TemplatePathDeps,
} from '../utils/template-paths.js';

export interface TemplateResourceRow {
  kind: string;
  name: string;
  mode: RepetitionMode;
  source: string;
}

export interface TemplatesOutput {
  files: string[];
  resources: TemplateResourceRow[];
}

/**
 * Resolve and scan unified templates, listing the repetition mode recorded
 * for each declared resource (after last-write-wins replacement).
 */
export function describeTemplates(
  templatesArg: string,
  rule: TemplateFileRule,
  deps: Partial<TemplatePathDeps> = {},
): TemplatesOutput {
  const paths = resolveTemplatePaths(templatesArg, rule, deps);
  const sources = readTemplateSources(paths, deps);
  const lookup = analyzeTemplates(sources);

  return {
    files: sources.map((s) => s.name),
    resources: lookup.entries().map((entry) => ({
      kind: entry.kind,
      name: entry.nameTemplate,
      mode: entry.mode,
      source: entry.source,
    })),
  };
}
