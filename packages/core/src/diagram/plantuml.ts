/**
 * PlantUML boilerplate shared by every diagram flavor.
 *
 * Every diagram starts with {@link DIAGRAM_PREAMBLE} and ends with
 * {@link DIAGRAM_TERMINATOR}. Diagrams that nest other diagrams strip the
 * inner wrappers first, since only the outermost diagram may carry them.
 */
export const DIAGRAM_PREAMBLE = '@startuml\n skinparam componentStyle uml2\n\n';
export const DIAGRAM_TERMINATOR = '@enduml\n';

export function wrapDiagram(body: string): string {
  return DIAGRAM_PREAMBLE + body + DIAGRAM_TERMINATOR;
}

export function unwrapDiagram(diagram: string): string {
  let body = diagram;
  if (body.startsWith(DIAGRAM_PREAMBLE)) {
    body = body.slice(DIAGRAM_PREAMBLE.length);
  }
  if (body.endsWith(DIAGRAM_TERMINATOR)) {
    body = body.slice(0, body.length - DIAGRAM_TERMINATOR.length);
  }
  return body;
}

export function quoted(name: string): string {
  return `"${name}"`;
}

/** `package "<name>" {}` */
export function emptyPackage(name: string): string {
  return `package ${quoted(name)} {}\n`;
}

/** `["<name>"]` component reference */
export function componentRef(name: string): string {
  return `[${quoted(name)}]`;
}
