import type { DiagramMap, ProjectMetadata } from '../metadata/metadata-types.js';
import { SYSTEMS_KEY } from './naming.js';
import { emptyPackage, quoted, wrapDiagram } from './plantuml.js';

/** system -> distinct subsystems, both in first-seen order */
export function groupSubsystems(metadata: ProjectMetadata[]): Map<string, Set<string>> {
  const systems = new Map<string, Set<string>>();
  for (const project of metadata) {
    const subsystems = systems.get(project.system) ?? new Set<string>();
    subsystems.add(project.subsystem);
    systems.set(project.system, subsystems);
  }
  return systems;
}

export function createSystemDiagram(metadata: ProjectMetadata[]): DiagramMap {
  const lines: string[] = [];

  for (const [system, subsystems] of groupSubsystems(metadata)) {
    lines.push(`package ${quoted(system)} {\n`);
    for (const subsystem of subsystems) {
      lines.push(emptyPackage(subsystem));
    }
    lines.push('}\n\n');
  }

  return new Map([[SYSTEMS_KEY, wrapDiagram(lines.join(''))]]);
}
