import { ArchplantError, RenderError, ErrorCode } from '@archplant/core';
import { Logger } from './cli-helpers.js';

export const SUGGESTIONS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.IO_FILE_NOT_FOUND]: [
    'Re-run the command once metadata collection has finished writing',
    'Confirm file permissions allow reading',
  ],
  [ErrorCode.IO_DIR_NOT_FOUND]: [
    'Confirm the source folder exists',
    'Source folders are searched recursively for collected metadata files',
  ],
  [ErrorCode.IO_WRITE_FAILED]: [
    'Confirm the target folder is writable',
    'Check that there is enough disk space',
  ],
  [ErrorCode.METADATA_PARSE_FAILED]: [
    'Re-run the metadata collection for the affected project',
    'Metadata files must contain a JSON object or an array of objects',
  ],
  [ErrorCode.INPUT_INVALID]: ['Run the command with --help to see the expected arguments'],
  [ErrorCode.CONFIG_INVALID]: ['Check the environment variables and your .env file'],
};

export function suggestionsFor(error: ArchplantError): string[] {
  if (error instanceof RenderError && error.suggestions && error.suggestions.length > 0) {
    return error.suggestions;
  }
  return SUGGESTIONS[error.code] ?? [];
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof ArchplantError) {
      Logger.fail(error.userMessage);
      const details = Object.entries(error.context).filter(([, value]) => value != null);
      if (details.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of details) {
          console.error(`   ${key}: ${String(value)}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      const hints = suggestionsFor(error);
      if (hints.length > 0) {
        console.error('\n💡 Hints:');
        hints.forEach((hint) => {
          Logger.info(`• ${hint}`);
        });
      }
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof ArchplantError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
        case ErrorCode.METADATA_PARSE_FAILED:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_DIR_NOT_FOUND:
        case ErrorCode.IO_WRITE_FAILED:
          return 3;
        case ErrorCode.RENDER_TOOL_MISSING:
        case ErrorCode.RENDER_FAILED:
        case ErrorCode.RENDER_TIMEOUT:
          return 4;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    process.exit(ErrorHandler.getExitCode(error));
  },
} as const;
