import { readdir, readFile } from 'fs/promises';
import { join, relative, sep } from 'path';
import { z } from 'zod';
import { minimatch } from 'minimatch';
import { ArchplantError, ErrorCode } from '../errors.js';
import { ApiMetadataSchema, ProjectMetadataSchema } from '../schemas/metadata.schema.js';
import { validate, validateSourceFolder } from '../utils/validation.js';
import type { ApiMetadata, ProjectMetadata } from './metadata-types.js';

export interface FindMetadataOptions {
  /** File names must end with this, e.g. `maven-collected.json`. */
  suffix: string;
  /** Glob patterns, relative to the source folder, that are never entered or returned. */
  excludePaths?: string[];
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

function isExcluded(relativePath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(toPosix(relativePath), pattern, { dot: true }));
}

/**
 * Recursively collects files under `sourceFolder` whose name ends with the
 * configured suffix. Results are sorted so that repeated runs read metadata in
 * the same order.
 */
export async function findMetadataFiles(
  sourceFolder: string,
  options: FindMetadataOptions
): Promise<string[]> {
  validateSourceFolder(sourceFolder);
  const excludePaths = options.excludePaths ?? [];
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relativePath = relative(sourceFolder, fullPath);
      if (isExcluded(relativePath, excludePaths)) continue;
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(options.suffix)) {
        found.push(fullPath);
      }
    }
  };

  await walk(sourceFolder);
  return found;
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ArchplantError(
      `Cannot read metadata file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      `Metadata file disappeared or is not readable: ${filePath}`,
      { filePath }
    );
  }
  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new ArchplantError(
      `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.METADATA_PARSE_FAILED,
      `Metadata file is not valid JSON: ${filePath}`,
      { filePath }
    );
  }
}

/**
 * Reads every file as one record or an array of records, in file order. Each
 * shape is validated on its own so that issue paths point into the record.
 */
export async function readMetadataFiles<T>(
  files: string[],
  schema: z.ZodType<T>,
  label: string
): Promise<T[]> {
  const records: T[] = [];
  for (const filePath of files) {
    const data = await readJson(filePath);
    const field = `${label} (${filePath})`;
    if (Array.isArray(data)) {
      records.push(...validate(z.array(schema), data, field));
    } else {
      records.push(validate(schema, data, field));
    }
  }
  return records;
}

export interface CollectedMetadata {
  projects: ProjectMetadata[];
  apis: ApiMetadata[];
}

export interface CollectMetadataOptions {
  mavenSuffix: string;
  apiSuffix: string;
  excludePaths?: string[];
}

/** Finds and parses both metadata kinds under every source folder. */
export async function collectMetadata(
  sourceFolders: string[],
  options: CollectMetadataOptions
): Promise<CollectedMetadata> {
  const projectFiles: string[] = [];
  const apiFiles: string[] = [];
  for (const folder of sourceFolders) {
    projectFiles.push(
      ...(await findMetadataFiles(folder, {
        suffix: options.mavenSuffix,
        excludePaths: options.excludePaths,
      }))
    );
    apiFiles.push(
      ...(await findMetadataFiles(folder, {
        suffix: options.apiSuffix,
        excludePaths: options.excludePaths,
      }))
    );
  }

  return {
    projects: await readMetadataFiles(projectFiles, ProjectMetadataSchema, 'project metadata'),
    apis: await readMetadataFiles(apiFiles, ApiMetadataSchema, 'API metadata'),
  };
}
