import type { CallDependency, DiagramMap, ProjectMetadata } from '../metadata/metadata-types.js';
import type { ProgressReporter } from '../pipelines/progress.js';
import { SilentProgress } from '../pipelines/progress.js';
import type { ComponentCallEdge } from './dependency-resolver.js';
import { resolveComponentCallEdges } from './dependency-resolver.js';
import { ALL_COMPONENTS_KEY, diagramKey, serviceDisplayName } from './naming.js';
import { componentRef, quoted, wrapDiagram } from './plantuml.js';
import { nestInServicePackages } from './service-nesting.js';

/**
 * Body of one unit's component diagram. The first pass declares a package per
 * module with its components; the second emits a `use` edge for every
 * intra-unit component dependency.
 */
export function createComponentDiagramBody(project: ProjectMetadata): string {
  const lines: string[] = [];

  for (const module of project.components) {
    lines.push(`package ${quoted(module.moduleName)} { \n`);
    for (const component of module.components) {
      lines.push(`${componentRef(component.packageName)} \n`);
    }
    lines.push('}\n\n');
  }
  lines.push('\n');

  for (const module of project.components) {
    for (const component of module.components) {
      for (const dependency of component.dependsOn) {
        lines.push(
          `${componentRef(component.packageName)} ..> ${componentRef(dependency)} : use \n`
        );
      }
    }
    lines.push('\n');
  }

  return lines.join('');
}

export function formatCallEdges(edges: readonly ComponentCallEdge[]): string {
  return edges
    .map((edge) => `${componentRef(edge.caller)} ..> ${componentRef(edge.callee)} : call \n`)
    .join('');
}

export function createComponentDiagram(
  metadata: ProjectMetadata[],
  dependencies: readonly CallDependency[] | null | undefined,
  reporter: ProgressReporter = new SilentProgress()
): DiagramMap {
  const diagramsByTag = new Map<string, string>();
  for (const project of metadata) {
    if (!project.moduleDependencies) {
      reporter.info(`No module dependency data for ${serviceDisplayName(project)}, skipping`);
      continue;
    }
    diagramsByTag.set(project.tag, wrapDiagram(createComponentDiagramBody(project)));
  }

  // skipped units still own components that calls resolve to
  const edges = resolveComponentCallEdges(metadata, dependencies);
  if (edges.length === 0) {
    reporter.info('No call dependencies between components found');
  }

  const diagrams: DiagramMap = new Map();
  for (const [tag, diagram] of diagramsByTag) {
    diagrams.set(diagramKey(tag, 'components'), diagram);
  }
  diagrams.set(
    ALL_COMPONENTS_KEY,
    nestInServicePackages(diagramsByTag, metadata, formatCallEdges(edges))
  );

  return diagrams;
}
