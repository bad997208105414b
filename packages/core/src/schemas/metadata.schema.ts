import { z } from 'zod';

/** Collectors write unset text fields as `null`. */
const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const ModuleInfoSchema = z.object({
  tag: z.string().min(1),
  moduleName: z.string(),
});

const ComponentInfoSchema = z.object({
  packageName: z.string().min(1),
  dependsOn: z.array(z.string()).default([]),
});

const ModuleComponentsSchema = z.object({
  moduleName: z.string(),
  components: z.array(ComponentInfoSchema).default([]),
});

export const ProjectMetadataSchema = z.object({
  tag: z.string().min(1),
  projectName: OptionalTextSchema,
  system: z.string(),
  subsystem: z.string(),
  moduleDependencies: z.record(z.string(), z.array(z.string())).nullable().optional(),
  modules: z.array(ModuleInfoSchema).default([]),
  components: z.array(ModuleComponentsSchema).default([]),
});

const HttpMethodSchema = z
  .string()
  .min(1)
  .transform((method) => method.toUpperCase());

const ProvidedApiSchema = z.object({
  packageName: z.string().min(1),
  method: HttpMethodSchema,
  path: z.string(),
});

const ConsumedApiSchema = z.object({
  packageName: z.string().min(1),
  service: OptionalTextSchema,
  method: HttpMethodSchema,
  path: z.string(),
});

export const ApiMetadataSchema = z.object({
  tag: z.string().min(1),
  serviceName: z.string().min(1),
  providedApis: z.array(ProvidedApiSchema).default([]),
  consumedApis: z.array(ConsumedApiSchema).default([]),
});

