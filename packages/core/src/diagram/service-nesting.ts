import type { ProjectMetadata } from '../metadata/metadata-types.js';
import { buildServiceLabels, serviceLabel } from './naming.js';
import { quoted, unwrapDiagram, wrapDiagram } from './plantuml.js';

/**
 * Combines per-unit diagrams (keyed by tag) into one diagram, each unit's
 * body nested in a `service: <name>` package. `trailer` is appended after the
 * last service package.
 */
export function nestInServicePackages(
  diagramsByTag: ReadonlyMap<string, string>,
  metadata: ProjectMetadata[],
  trailer = ''
): string {
  const labels = buildServiceLabels(metadata);
  const chunks: string[] = [];

  for (const [tag, diagram] of diagramsByTag) {
    chunks.push(`package ${quoted(serviceLabel(tag, labels))} { \n`);
    chunks.push(unwrapDiagram(diagram));
    chunks.push('}\n\n');
  }
  chunks.push(trailer);

  return wrapDiagram(chunks.join(''));
}
