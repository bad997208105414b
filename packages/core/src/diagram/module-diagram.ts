import type { DiagramMap, ProjectMetadata } from '../metadata/metadata-types.js';
import type { ProgressReporter } from '../pipelines/progress.js';
import { SilentProgress } from '../pipelines/progress.js';
import { ALL_MODULES_KEY, buildModuleNameLookup, diagramKey, serviceDisplayName } from './naming.js';
import { emptyPackage, quoted, wrapDiagram } from './plantuml.js';
import { nestInServicePackages } from './service-nesting.js';

/**
 * Body of one unit's module diagram: a package per module followed by a
 * `-->` edge per module dependency. Returns `undefined` when the unit has no
 * module dependency data.
 */
export function createModuleDiagramBody(project: ProjectMetadata): string | undefined {
  const moduleDependencies = project.moduleDependencies;
  if (!moduleDependencies) {
    return undefined;
  }

  const moduleName = buildModuleNameLookup(project);
  const lines: string[] = [];

  for (const module of Object.keys(moduleDependencies)) {
    lines.push(emptyPackage(moduleName(module)));
  }
  lines.push('\n');

  for (const [module, dependencies] of Object.entries(moduleDependencies)) {
    for (const dependency of dependencies) {
      lines.push(`${quoted(moduleName(module))} --> ${quoted(moduleName(dependency))}\n`);
    }
  }

  return lines.join('');
}

export function createModuleDiagram(
  metadata: ProjectMetadata[],
  reporter: ProgressReporter = new SilentProgress()
): DiagramMap {
  const diagramsByTag = new Map<string, string>();

  for (const project of metadata) {
    const body = createModuleDiagramBody(project);
    if (body === undefined) {
      reporter.info(`No module dependency data for ${serviceDisplayName(project)}, skipping`);
      continue;
    }
    diagramsByTag.set(project.tag, wrapDiagram(body));
  }

  const diagrams: DiagramMap = new Map();
  for (const [tag, diagram] of diagramsByTag) {
    diagrams.set(diagramKey(tag, 'modules'), diagram);
  }
  diagrams.set(ALL_MODULES_KEY, nestInServicePackages(diagramsByTag, metadata));

  return diagrams;
}
