import { ArchplantError, ErrorCode } from '../errors.js';
import type { ProjectMetadata } from '../metadata/metadata-types.js';

export type DiagramFlavor = 'modules' | 'components';

export const DIAGRAM_EXTENSION = 'txt';

export const ALL_MODULES_KEY = `all_modules.${DIAGRAM_EXTENSION}`;
export const ALL_COMPONENTS_KEY = `all_components.${DIAGRAM_EXTENSION}`;
export const SYSTEMS_KEY = `systems.${DIAGRAM_EXTENSION}`;
export const SERVICES_KEY = `services.${DIAGRAM_EXTENSION}`;

export function diagramKey(tag: string, flavor: DiagramFlavor): string {
  return `${tag}_plantUML_${flavor}.${DIAGRAM_EXTENSION}`;
}

export interface DiagramKeyParts {
  name: string;
  extension: string;
}

/**
 * Split an output key on its last `.` into file name and extension. Tags may
 * contain dots themselves; the extension appended by {@link diagramKey} never does.
 */
export function splitDiagramKey(key: string): DiagramKeyParts {
  const separator = key.lastIndexOf('.');
  if (separator <= 0 || separator === key.length - 1) {
    throw new ArchplantError(
      `Malformed diagram key: ${key}`,
      ErrorCode.INPUT_INVALID,
      `Diagram key "${key}" must have the form <name>.<extension>`,
      { key }
    );
  }
  return { name: key.slice(0, separator), extension: key.slice(separator + 1) };
}

export function serviceDisplayName(project: ProjectMetadata): string {
  return project.projectName ? project.projectName : project.tag;
}

/** Builds `tag -> "service: <name>"` once per run. */
export function buildServiceLabels(metadata: ProjectMetadata[]): Map<string, string> {
  const labels = new Map<string, string>();
  for (const project of metadata) {
    if (!labels.has(project.tag)) {
      labels.set(project.tag, `service: ${serviceDisplayName(project)}`);
    }
  }
  return labels;
}

export function serviceLabel(tag: string, labels: Map<string, string>): string {
  return labels.get(tag) ?? `service: ${tag}`;
}

/** Case-insensitive module tag lookup; the first registration of a tag wins. */
export function buildModuleNameLookup(project: ProjectMetadata): (tag: string) => string {
  const names = new Map<string, string>();
  for (const module of project.modules) {
    const key = module.tag.toLowerCase();
    if (!names.has(key)) {
      names.set(key, module.moduleName);
    }
  }
  return (tag) => names.get(tag.toLowerCase()) ?? tag;
}

/** Callee name the service connector assigns to calls leaving the collected services. */
export const EXTERNAL_SERVICE = 'EXTERNAL';
/** Marker a consumed API carries when it names no concrete provider. */
export const DEFAULT_EXTERNAL_SERVICE = 'DEFAULT_SERVICE';
