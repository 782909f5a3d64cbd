import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';
import type { TemplateSource } from '../../migration/types.js';

export interface TemplateFileRule {
  /** Substring a file name must contain, e.g. "unified_" */
  contains: string;
  /** Required file extension, e.g. ".tftpl" */
  extension: string;
}

export interface TemplatePathDeps {
  isDirectory: (p: string) => boolean;
  isFile: (p: string) => boolean;
  listDir: (dir: string) => string[];
  glob: (pattern: string) => string[];
  readFile: (p: string) => string;
}

function statOrNull(p: string): fs.Stats | null {
  try {
    return fs.statSync(p);
  } catch {
    return null;
  }
}

const defaultDeps: TemplatePathDeps = {
  isDirectory: (p) => statOrNull(p)?.isDirectory() ?? false,
  isFile: (p) => statOrNull(p)?.isFile() ?? false,
  listDir: (dir) => fs.readdirSync(dir),
  glob: (pattern) => fg.sync(pattern, { onlyFiles: true, absolute: true, dot: false }),
  readFile: (p) => fs.readFileSync(p, 'utf-8'),
};

/**
 * Resolve a `--templates` argument into template file paths.
 *
 * Accepts:
 * - a directory: non-recursive, file names containing `rule.contains` and
 *   ending in `rule.extension` (upload prefixes like "12345_unified_iam.tftpl"
 *   match), sorted by name
 * - a comma-separated list of paths, kept in the given order
 * - a single file
 * - a glob pattern, sorted
 *
 * A directory or glob may match nothing. An explicitly named path that is
 * not a regular file throws.
 */
export function resolveTemplatePaths(
  templatesArg: string,
  rule: TemplateFileRule,
  deps: Partial<TemplatePathDeps> = {},
): string[] {
  const { isDirectory, isFile, listDir, glob } = { ...defaultDeps, ...deps };
  const arg = templatesArg.trim();
  if (arg === '') return [];

  if (isDirectory(arg)) {
    return listDir(arg)
      .filter((name) => name.endsWith(rule.extension) && name.includes(rule.contains))
      .sort()
      .map((name) => path.join(arg, name))
      .filter((p) => isFile(p));
  }

  if (!arg.includes(',') && fg.isDynamicPattern(arg)) {
    return glob(arg)
      .sort()
      .filter((p) => isFile(p));
  }

  const listed = arg
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p !== '');
  for (const p of listed) {
    if (!isFile(p)) {
      throw new Error(`Cannot read template ${p}: not a file`);
    }
  }
  return listed;
}

/**
 * Read resolved template files, keeping their order.
 * An unreadable file fails the whole run before any analysis happens.
 */
export function readTemplateSources(
  paths: string[],
  deps: Partial<Pick<TemplatePathDeps, 'readFile'>> = {},
): TemplateSource[] {
  const { readFile } = { ...defaultDeps, ...deps };
  return paths.map((p) => {
    try {
      return { name: path.basename(p), text: readFile(p) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Cannot read template ${p}: ${message}`);
    }
  });
}
