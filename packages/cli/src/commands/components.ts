import { Command } from 'commander';
import { runComponents, validate } from '@archplant/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ComponentsOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter } from '../utils/cli-helpers.js';

export function createComponentsCommand(): Command {
  return new Command('components')
    .description('List every component with its module, service and resolved calls')
    .argument('<source-folders...>', 'Folders searched for collected metadata files')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (sourceFolders: string[], options: Record<string, unknown>) => {
      const validated = validate(
        ComponentsOptionsSchema,
        { ...options, sourceFolders },
        'command options'
      );

      if (validated.format === 'json' || validated.format === 'yaml') {
        try {
          const components = await runComponents({ sourceFolders: validated.sourceFolders });
          console.log(OutputFormatter.format(components, validated.format));
        } catch (error) {
          ErrorHandler.handleCliError(error);
        }
        return;
      }

      try {
        const { runComponentsApp } = await import('./components-app.js');
        await runComponentsApp({ sourceFolders: validated.sourceFolders });
      } catch (error) {
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
