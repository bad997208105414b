import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_EXTERNAL_SERVICE } from '../diagram/naming.js';
dotenv.config({ quiet: true });
const ConfigSchema = z.object({
  metadata: z.object({
    mavenSuffix: z.string().min(1).default('maven-collected.json'),
    apiSuffix: z.string().min(1).default('api-collected.json'),
    excludePaths: z.array(z.string()).default(['**/node_modules/**']),
  }),
  diagram: z.object({
    defaultExternalService: z.string().min(1).default(DEFAULT_EXTERNAL_SERVICE),
  }),
  plantuml: z.object({
    executable: z.string().min(1).default('plantuml'),
    jarPath: z.string().optional(),
    timeout: z.number().int().min(1000).max(600000).default(60000),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  MAVEN_METADATA_SUFFIX: 'metadata.mavenSuffix',
  API_METADATA_SUFFIX: 'metadata.apiSuffix',
  METADATA_EXCLUDE_PATHS: 'metadata.excludePaths',
  DEFAULT_EXTERNAL_SERVICE: 'diagram.defaultExternalService',
  PLANTUML_PATH: 'plantuml.executable',
  PLANTUML_JAR: 'plantuml.jarPath',
  PLANTUML_TIMEOUT: 'plantuml.timeout',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toStringArray: Coercer = (raw) =>
  raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'plantuml.timeout': toNumber,
  'metadata.excludePaths': toStringArray,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {
    metadata: {},
    diagram: {},
    plantuml: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();
