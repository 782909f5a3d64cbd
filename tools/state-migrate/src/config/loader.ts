import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  migrationConfigSchema,
  partialMigrationConfigSchema,
  type MigrationConfig,
  type PartialMigrationConfig,
} from './schema.js';
import { defaultMigrationConfig } from './defaults.js';

export const CONFIG_PATHS = {
  globalConfig: path.join(
    process.env.HOME || process.env.USERPROFILE || '~',
    '.config',
    'state-migrate',
    'config.yaml'
  ),
  repoConfigName: '.state-migrate.yaml',
} as const;

export interface LoadConfigOptions {
  globalConfigPath?: string;
  repoPath?: string;
}

/**
 * Merge a partial config over a complete one.
 *
 * Rules:
 * - `migration` and `output` keys are MERGED (override values win, unset keys are preserved).
 * - `migration.template_files`, when set, REPLACES the base value entirely.
 */
export function mergeConfigs(
  base: MigrationConfig,
  override: PartialMigrationConfig | null
): MigrationConfig {
  if (!override) {
    return base;
  }

  return {
    migration: {
      ...base.migration,
      ...override.migration,
      template_files: override.migration?.template_files ?? base.migration.template_files,
    },
    output: {
      ...base.output,
      ...override.output,
    },
  };
}

function readPartialConfig(filePath: string, label: string): PartialMigrationConfig | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = parseYaml(raw) ?? {};
  const result = partialMigrationConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid ${label} config at ${filePath}: ${result.error.issues.map((i) => i.message).join(', ')}`
    );
  }
  return result.data;
}

/**
 * Load and merge config from the embedded default, the global file and the
 * repo file.
 *
 * Priority: repo config > global config > embedded default.
 * Validates the final merged result against the Zod schema.
 */
export function loadConfig(options: LoadConfigOptions = {}): MigrationConfig {
  const globalPath = options.globalConfigPath ?? CONFIG_PATHS.globalConfig;
  const repoPath = options.repoPath ?? process.cwd();
  const repoConfigPath = path.join(repoPath, CONFIG_PATHS.repoConfigName);

  const globalConfig = readPartialConfig(globalPath, 'global');
  const repoConfig = readPartialConfig(repoConfigPath, 'repo');

  const merged = mergeConfigs(mergeConfigs(defaultMigrationConfig, globalConfig), repoConfig);

  const result = migrationConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(
      `Invalid merged config: ${result.error.issues.map((i) => i.message).join(', ')}`
    );
  }

  return result.data;
}
