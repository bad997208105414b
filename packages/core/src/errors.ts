export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_DIR_NOT_FOUND = 'IO_DIR_NOT_FOUND',
  IO_WRITE_FAILED = 'IO_WRITE_FAILED',
  METADATA_PARSE_FAILED = 'METADATA_PARSE_FAILED',
  RENDER_TOOL_MISSING = 'RENDER_TOOL_MISSING',
  RENDER_FAILED = 'RENDER_FAILED',
  RENDER_TIMEOUT = 'RENDER_TIMEOUT',
  INPUT_INVALID = 'INPUT_INVALID',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class ArchplantError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'ArchplantError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, ArchplantError);
  }
}
export class ConfigurationError extends ArchplantError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}
export class RenderError extends ArchplantError {
  public readonly suggestions?: string[];
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    suggestions?: string[]
  ) {
    super(message, code, userMessage, context, code === ErrorCode.RENDER_TIMEOUT);
    this.name = 'RenderError';
    this.suggestions = suggestions;
  }
  static toolMissing(command: string): RenderError {
    return new RenderError(
      `PlantUML executable not found: ${command}`,
      ErrorCode.RENDER_TOOL_MISSING,
      `Could not start PlantUML (${command}). Diagram text was generated but not rendered.`,
      { command },
      [
        'Install PlantUML and make sure it is on your PATH',
        'Or point PLANTUML_PATH at the plantuml executable',
        'Or set PLANTUML_JAR to a plantuml.jar (requires java on PATH)',
        'GraphViz must be installed for component and package diagrams',
      ]
    );
  }
  static fromProcessError(error: unknown, command: string, diagramName: string): RenderError {
    if (error instanceof RenderError) {
      return error;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return RenderError.toolMissing(command);
    }
    if (error instanceof Error && 'killed' in error && error.killed === true) {
      return new RenderError(
        `PlantUML timed out while rendering ${diagramName}`,
        ErrorCode.RENDER_TIMEOUT,
        `Rendering ${diagramName} took too long. Increase PLANTUML_TIMEOUT or simplify the diagram.`,
        { command, diagramName }
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RenderError(
      message,
      ErrorCode.RENDER_FAILED,
      `PlantUML could not render ${diagramName}: ${message}`,
      { command, diagramName }
    );
  }
}
