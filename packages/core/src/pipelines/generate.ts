import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { collectMetadata } from '../metadata/metadata-reader.js';
import type { CallDependency, DiagramMap } from '../metadata/metadata-types.js';
import { connectServices } from '../connectors/service-connector.js';
import { generateDiagrams } from '../diagram/diagram-generator.js';
import { writeDiagramMap } from '../output/diagram-writer.js';
import { renderDiagramsToSvg, writeSvgFiles } from '../output/plantuml-renderer.js';
import { CONFIG } from '../utils/config.js';
import { ArchplantError, ErrorCode } from '../errors.js';

export interface GenerateOptions {
  sourceFolders: string[];
  /** Write diagrams below this folder; omitted means in-memory only. */
  targetFolder?: string;
  /** Render every diagram to SVG through PlantUML. */
  visualize?: boolean;
}

export interface GenerateResult {
  /**
   * Diagram text keyed by output name. In memory with `visualize`, also holds
   * the rendered SVG under `<name>.svg`.
   */
  diagrams: DiagramMap;
  /** Written files, empty in memory. */
  files: string[];
  dependencyCount: number;
}

export async function runGenerate(
  options: GenerateOptions,
  progress?: ProgressReporter
): Promise<GenerateResult> {
  const p = progress ?? new SilentProgress();

  if (options.sourceFolders.length === 0) {
    throw new ArchplantError(
      'At least one source folder is required',
      ErrorCode.INPUT_INVALID,
      'Provide at least one folder containing collected metadata'
    );
  }

  p.section('Reading Collected Metadata');
  p.start('Searching metadata files');
  const { projects, apis } = await collectMetadata(options.sourceFolders, CONFIG.metadata);
  p.succeed(
    `Found ${String(projects.length)} project record(s) and ${String(apis.length)} API record(s)`
  );
  if (projects.length === 0) {
    p.warn(`No files ending in ${CONFIG.metadata.mavenSuffix} found`);
  }

  let dependencies: CallDependency[] | undefined;
  if (apis.length > 0) {
    p.start('Connecting services');
    dependencies = connectServices(apis, {
      defaultExternalService: CONFIG.diagram.defaultExternalService,
    });
    p.succeed(`Found ${String(dependencies.length)} dependencies`);
  }

  p.section('Creating Diagrams');
  const diagrams = generateDiagrams(
    projects,
    dependencies,
    { defaultExternalService: CONFIG.diagram.defaultExternalService },
    p
  );

  const files: string[] = [];
  if (options.targetFolder) {
    p.section('Writing Diagrams');
    p.start(`Writing diagram descriptions to ${options.targetFolder}`);
    files.push(...(await writeDiagramMap(diagrams, options.targetFolder)));
    p.succeed(`Wrote ${String(files.length)} diagram description(s)`);

    if (options.visualize) {
      p.start('Rendering diagrams with PlantUML');
      const svgFiles = await writeSvgFiles(diagrams, options.targetFolder);
      files.push(...svgFiles);
      p.succeed(`Rendered ${String(svgFiles.length)} SVG file(s)`);
    }
  } else if (options.visualize) {
    p.section('Rendering Diagrams');
    p.start('Rendering diagrams with PlantUML');
    const rendered = await renderDiagramsToSvg(diagrams);
    for (const [key, svg] of rendered) {
      diagrams.set(key, svg);
    }
    p.succeed(`Rendered ${String(rendered.size)} diagram(s)`);
  }

  return { diagrams, files, dependencyCount: dependencies?.length ?? 0 };
}
