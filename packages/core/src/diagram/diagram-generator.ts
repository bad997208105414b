import type { CallDependency, DiagramMap, ProjectMetadata } from '../metadata/metadata-types.js';
import type { ProgressReporter } from '../pipelines/progress.js';
import { SilentProgress } from '../pipelines/progress.js';
import { createComponentDiagram } from './component-diagram.js';
import { createModuleDiagram } from './module-diagram.js';
import { createServiceDiagram } from './service-diagram.js';
import type { ServiceDiagramOptions } from './service-diagram.js';
import { createSystemDiagram } from './system-diagram.js';

export type GenerateDiagramsOptions = ServiceDiagramOptions;

/**
 * Runs the four diagram builders and merges their output. Merge order is
 * modules, components, systems, services; a later key replaces an earlier one.
 */
export function generateDiagrams(
  metadata: ProjectMetadata[],
  dependencies: readonly CallDependency[] | null | undefined,
  options: GenerateDiagramsOptions = {},
  reporter: ProgressReporter = new SilentProgress()
): DiagramMap {
  const parts: DiagramMap[] = [];

  reporter.start('Creating module diagrams');
  parts.push(createModuleDiagram(metadata, reporter));
  reporter.succeed('Module diagrams created');

  reporter.start('Creating component diagrams');
  parts.push(createComponentDiagram(metadata, dependencies, reporter));
  reporter.succeed('Component diagrams created');

  reporter.start('Creating system diagram');
  parts.push(createSystemDiagram(metadata));
  reporter.succeed('System diagram created');

  reporter.start('Creating service diagram');
  parts.push(createServiceDiagram(metadata, dependencies, options, reporter));
  reporter.succeed('Service diagram created');

  const merged: DiagramMap = new Map();
  for (const part of parts) {
    for (const [key, diagram] of part) {
      merged.set(key, diagram);
    }
  }
  return merged;
}
