import { z } from 'zod';

const OutputFormatSchema = z.enum(['table', 'json', 'yaml']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const SourceFoldersSchema = z
  .array(z.string().min(1))
  .min(1, 'Provide at least one source folder');

export const GenerateOptionsSchema = z.object({
  sourceFolders: SourceFoldersSchema,
  target: z.string().min(1).optional(),
  visualize: z.boolean().optional().default(false),
  format: z.enum(['console', 'json']).default('console'),
});

export const ComponentsOptionsSchema = z.object({
  sourceFolders: SourceFoldersSchema,
  format: OutputFormatSchema.default('table'),
});

/** The fields the CLI reads from its own package.json. */
export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});
