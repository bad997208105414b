/**
 * Receives status lines while metadata is read and diagrams are built.
 *
 * Diagram builders only call `info` (for example when a unit without module
 * dependency data is skipped) and `warn`. Pipelines open one `section` per
 * phase and pair every `start` with a `succeed` or `fail`.
 */
export interface ProgressReporter {
  /** A new pipeline phase: reading metadata, building diagrams, writing output. */
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  /** Something was dropped from the output, such as a call whose target is unknown. */
  warn(message: string): void;
  info(message: string): void;
}

const ignore = (_message: string): void => undefined;

/** Default reporter for library callers. The CLI passes its own. */
export class SilentProgress implements ProgressReporter {
  section = ignore;
  start = ignore;
  succeed = ignore;
  fail = ignore;
  warn = ignore;
  info = ignore;
}
