import type { CallDependency, ProjectMetadata } from '../metadata/metadata-types.js';

/** Callee placeholder for calls that no known component owns. */
export const EXTERN_COMPONENT = 'EXTERN';

export interface ComponentCallEdge {
  caller: string;
  callee: string;
}

/**
 * Every component package name in metadata, module and component order.
 * Repeated names keep their first position.
 */
export function listKnownComponents(metadata: ProjectMetadata[]): string[] {
  const names = new Set<string>();
  for (const project of metadata) {
    for (const module of project.components) {
      for (const component of module.components) {
        names.add(component.packageName);
      }
    }
  }
  return [...names];
}

/**
 * Longest known component that is a prefix of `packageName`, or
 * {@link EXTERN_COMPONENT}. Equal-length prefixes of one string are the same
 * string, so the first match is kept on ties.
 */
export function resolveOwningComponent(
  packageName: string | undefined,
  knownComponents: readonly string[]
): string {
  if (!packageName) {
    return EXTERN_COMPONENT;
  }
  let longest: string | undefined;
  for (const component of knownComponents) {
    if (packageName.startsWith(component) && component.length > (longest?.length ?? -1)) {
      longest = component;
    }
  }
  return longest ?? EXTERN_COMPONENT;
}

/**
 * Maps call dependencies onto component-level call edges.
 *
 * A call belongs to every known component that prefixes its caller package;
 * calls without such a component are dropped. Each distinct caller/callee
 * pair yields one edge, in first-seen order. Self-loops are kept.
 */
export function resolveComponentCallEdges(
  metadata: ProjectMetadata[],
  dependencies: readonly CallDependency[] | null | undefined
): ComponentCallEdge[] {
  if (!dependencies || dependencies.length === 0) {
    return [];
  }

  const knownComponents = listKnownComponents(metadata);
  const seen = new Set<string>();
  const edges: ComponentCallEdge[] = [];

  for (const dependency of dependencies) {
    const callers = knownComponents.filter((component) =>
      dependency.servicePackage.startsWith(component)
    );
    if (callers.length === 0) continue;

    const callee = resolveOwningComponent(dependency.dependsOnPackage, knownComponents);
    for (const caller of callers) {
      const pairKey = `${caller}\u0000${callee}`;
      if (seen.has(pairKey)) continue;
      seen.add(pairKey);
      edges.push({ caller, callee });
    }
  }

  return edges;
}
