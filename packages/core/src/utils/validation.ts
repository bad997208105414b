import type { z } from 'zod';
import { accessSync, statSync, constants as fsConstants } from 'fs';
import type { Stats } from 'fs';
import { ArchplantError, ErrorCode } from '../errors.js';

/** A source folder must be a readable directory; it is searched for collected metadata. */
export function validateSourceFolder(folder: string): void {
  if (!folder) {
    throw new ArchplantError(
      'Source folder path is empty',
      ErrorCode.INPUT_INVALID,
      'Source folder paths must not be empty'
    );
  }

  let stats: Stats;
  try {
    accessSync(folder, fsConstants.R_OK);
    stats = statSync(folder);
  } catch {
    throw new ArchplantError(
      `Source folder is not readable: ${folder}`,
      ErrorCode.IO_DIR_NOT_FOUND,
      `Cannot read source folder: ${folder}`,
      { folder }
    );
  }

  if (!stats.isDirectory()) {
    throw new ArchplantError(
      `Source folder is a file: ${folder}`,
      ErrorCode.IO_DIR_NOT_FOUND,
      `Expected a folder of collected metadata but found a file: ${folder}`,
      { folder }
    );
  }
}

function formatIssuePath(path: readonly PropertyKey[]): string {
  return path.length > 0 ? path.map(String).join('.') : '(root)';
}

/**
 * Parses `data` against `schema`. A failure lists every issue with its path,
 * e.g. `[1.system]` for the second record of an array file.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown, subject = 'input'): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const { issues } = result.error;
  const details = issues
    .map((issue, idx) => `  ${String(idx + 1)}. [${formatIssuePath(issue.path)}] ${issue.message}`)
    .join('\n');

  throw new ArchplantError(
    `Invalid ${subject}:\n${details}`,
    ErrorCode.INPUT_INVALID,
    `Rejected ${subject}: ${String(issues.length)} issue(s) found`,
    { subject }
  );
}
