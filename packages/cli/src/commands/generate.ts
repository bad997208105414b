import { Command } from 'commander';
import { runGenerate, validate } from '@archplant/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { GenerateOptionsSchema } from '../utils/command-schemas.js';

export function createGenerateCommand(): Command {
  return new Command('generate')
    .alias('gen')
    .description('Create module, component, system and service diagrams from collected metadata')
    .argument('<source-folders...>', 'Folders searched for collected metadata files')
    .option('--target <dir>', 'Write diagram files below this folder (txt/ and svg/)')
    .option('--visualize', 'Render every diagram to SVG with PlantUML', false)
    .option('--format <format>', 'Result format (console, json)', 'console')
    .action(async (sourceFolders: string[], options: Record<string, unknown>) => {
      const validated = validate(
        GenerateOptionsSchema,
        { ...options, sourceFolders },
        'command options'
      );
      const generateOptions = {
        sourceFolders: validated.sourceFolders,
        targetFolder: validated.target,
        visualize: validated.visualize,
      };

      if (validated.format === 'json') {
        try {
          const result = await runGenerate(generateOptions);
          const payload = validated.target
            ? { files: result.files }
            : { diagrams: Object.fromEntries(result.diagrams) };
          console.log(JSON.stringify(payload, null, 2));
        } catch (error) {
          ErrorHandler.handleCliError(error);
        }
        return;
      }

      try {
        const { runGenerateApp } = await import('./generate-app.js');
        await runGenerateApp(generateOptions);
      } catch (error) {
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
