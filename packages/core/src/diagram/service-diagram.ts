import type { CallDependency, DiagramMap, ProjectMetadata } from '../metadata/metadata-types.js';
import type { ProgressReporter } from '../pipelines/progress.js';
import { SilentProgress } from '../pipelines/progress.js';
import { DEFAULT_EXTERNAL_SERVICE, SERVICES_KEY, serviceDisplayName } from './naming.js';
import { emptyPackage, quoted, wrapDiagram } from './plantuml.js';

export interface ServiceDiagramOptions {
  /** Callee name treated like `external` in addition to the literal. */
  defaultExternalService?: string;
}

const EXTERNAL_PACKAGE = 'external';

/** system -> subsystem -> service display names, in first-seen order */
export function groupServices(metadata: ProjectMetadata[]): Map<string, Map<string, string[]>> {
  const systems = new Map<string, Map<string, string[]>>();
  for (const project of metadata) {
    const subsystems = systems.get(project.system) ?? new Map<string, string[]>();
    const services = subsystems.get(project.subsystem) ?? [];
    services.push(serviceDisplayName(project));
    subsystems.set(project.subsystem, services);
    systems.set(project.system, subsystems);
  }
  return systems;
}

export function targetsExternalService(
  dependencies: readonly CallDependency[],
  defaultExternalService: string
): boolean {
  const markers = new Set([EXTERNAL_PACKAGE, defaultExternalService.toLowerCase()]);
  return dependencies.some((dependency) => markers.has(dependency.dependsOn.toLowerCase()));
}

function formatServiceEdge(dependency: CallDependency): string {
  return `${quoted(dependency.service)}-->${quoted(dependency.dependsOn)} : ${quoted(
    `${dependency.method} : ${dependency.path}`
  )}\n`;
}

export function createServiceDiagram(
  metadata: ProjectMetadata[],
  dependencies: readonly CallDependency[] | null | undefined,
  options: ServiceDiagramOptions = {},
  reporter: ProgressReporter = new SilentProgress()
): DiagramMap {
  const defaultExternalService = options.defaultExternalService ?? DEFAULT_EXTERNAL_SERVICE;
  const lines: string[] = [];

  for (const [system, subsystems] of groupServices(metadata)) {
    lines.push(`package ${quoted(system)} {\n`);
    for (const [subsystem, services] of subsystems) {
      lines.push(`package ${quoted(subsystem)} {\n`);
      for (const service of services) {
        lines.push(emptyPackage(service));
      }
      lines.push('}\n');
    }
    lines.push('}\n\n');
  }

  if (dependencies && dependencies.length > 0) {
    if (targetsExternalService(dependencies, defaultExternalService)) {
      lines.push(emptyPackage(EXTERNAL_PACKAGE));
    }
    for (const dependency of dependencies) {
      lines.push(formatServiceEdge(dependency));
    }
  } else {
    reporter.info('No dependencies between services found');
  }

  return new Map([[SERVICES_KEY, wrapDiagram(lines.join(''))]]);
}
