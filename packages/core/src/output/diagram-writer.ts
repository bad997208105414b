import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ArchplantError, ErrorCode } from '../errors.js';
import { splitDiagramKey } from '../diagram/naming.js';

/**
 * Writes `content` to `<targetFolder>/<extension>/<name>.<extension>` and
 * returns the written paths.
 */
export async function writeDiagramFile(
  content: string,
  name: string,
  extension: string,
  targetFolder: string
): Promise<string[]> {
  const folder = join(targetFolder, extension);
  const filePath = join(folder, `${name}.${extension}`);
  try {
    await mkdir(folder, { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new ArchplantError(
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.IO_WRITE_FAILED,
      `Could not write diagram file: ${filePath}`,
      { filePath }
    );
  }
  return [filePath];
}

/** Writes every entry of the map, splitting each key on its last `.`. */
export async function writeDiagramMap(
  diagrams: ReadonlyMap<string, string>,
  targetFolder: string
): Promise<string[]> {
  const files: string[] = [];
  for (const [key, content] of diagrams) {
    const { name, extension } = splitDiagramKey(key);
    files.push(...(await writeDiagramFile(content, name, extension, targetFolder)));
  }
  return files;
}
