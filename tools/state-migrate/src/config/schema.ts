import { z } from 'zod';

const templateFilesSchema = z.object({
  contains: z.string().min(1),
  extension: z.string().min(1).startsWith('.'),
});

/** AWS region name as it appears in addresses, e.g. "eu-central-1". */
export const mainRegionSchema = z
  .string()
  .regex(/^[a-z]{2}(-gov)?-[a-z]+-\d+$/, { message: 'main_region must look like "eu-central-1"' });

const migrationSectionSchema = z.object({
  unified_module: z
    .string()
    .regex(/^[A-Za-z_][\w-]*$/, { message: 'unified_module must be a bare module name' }),
  main_region: mainRegionSchema.optional(),
  template_files: templateFilesSchema,
});

const outputSectionSchema = z.object({
  comments: z.boolean(),
  show_skipped: z.boolean(),
});

export const migrationConfigSchema = z.object({
  migration: migrationSectionSchema,
  output: outputSectionSchema,
});

/**
 * A repo or global config file may set any subset of keys;
 * `template_files` is replaced as a whole, never merged key by key.
 */
export const partialMigrationConfigSchema = z.object({
  migration: migrationSectionSchema.partial().optional(),
  output: outputSectionSchema.partial().optional(),
});

export type MigrationConfig = z.infer<typeof migrationConfigSchema>;
export type PartialMigrationConfig = z.infer<typeof partialMigrationConfigSchema>;
