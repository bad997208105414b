import { execFile } from 'child_process';
import { RenderError } from '../errors.js';
import { splitDiagramKey } from '../diagram/naming.js';
import { CONFIG } from '../utils/config.js';
import type { Config } from '../utils/config.js';
import { writeDiagramFile } from './diagram-writer.js';

const SVG_EXTENSION = 'svg';
const RENDER_ARGS = ['-tsvg', '-pipe', '-charset', 'UTF-8'];
const MAX_SVG_BYTES = 64 * 1024 * 1024;

export interface PlantUmlCommand {
  command: string;
  args: string[];
}

/** `java -jar <jar>` when a jar is configured, the plantuml executable otherwise. */
export function plantUmlCommand(config: Config['plantuml'] = CONFIG.plantuml): PlantUmlCommand {
  if (config.jarPath) {
    return { command: 'java', args: ['-jar', config.jarPath, ...RENDER_ARGS] };
  }
  return { command: config.executable, args: [...RENDER_ARGS] };
}

/** Pipes one diagram through PlantUML and resolves with the SVG text. */
export function renderSvg(diagram: string, diagramName = 'diagram'): Promise<string> {
  const { command, args } = plantUmlCommand();
  return new Promise((resolve, reject) => {
    const child = execFile(
      command,
      args,
      { timeout: CONFIG.plantuml.timeout, maxBuffer: MAX_SVG_BYTES, encoding: 'utf8' },
      (error, stdout) => {
        if (error) {
          reject(RenderError.fromProcessError(error, command, diagramName));
          return;
        }
        resolve(stdout);
      }
    );
    child.stdin?.on('error', (error) => {
      reject(RenderError.fromProcessError(error, command, diagramName));
    });
    child.stdin?.end(diagram);
  });
}

/** Renders every diagram; keys become `<name>.svg`. */
export async function renderDiagramsToSvg(
  diagrams: ReadonlyMap<string, string>
): Promise<Map<string, string>> {
  const rendered = new Map<string, string>();
  for (const [key, diagram] of diagrams) {
    const { name } = splitDiagramKey(key);
    rendered.set(`${name}.${SVG_EXTENSION}`, await renderSvg(diagram, name));
  }
  return rendered;
}

/** Renders every diagram into `<targetFolder>/svg/` and returns the written paths. */
export async function writeSvgFiles(
  diagrams: ReadonlyMap<string, string>,
  targetFolder: string
): Promise<string[]> {
  const files: string[] = [];
  for (const [key, diagram] of diagrams) {
    const { name } = splitDiagramKey(key);
    const svg = await renderSvg(diagram, name);
    files.push(...(await writeDiagramFile(svg, name, SVG_EXTENSION, targetFolder)));
  }
  return files;
}
