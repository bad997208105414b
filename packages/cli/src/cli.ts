#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Logger } from './utils/cli-helpers.js';
import { createGenerateCommand } from './commands/generate.js';
import { createComponentsCommand } from './commands/components.js';
import { validate } from '@archplant/core';
import { PackageJsonSchema } from './utils/command-schemas.js';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down...`);
    process.exit(0);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'package.json'
);

setupSignalHandlers();

const program = new Command();
program
  .name('archplant')
  .description('PlantUML architecture diagrams from collected project and API metadata')
  .version(packageJson.version);

program.addCommand(createGenerateCommand());
program.addCommand(createComponentsCommand());

program.configureHelp({
  subcommandTerm: (cmd) => cmd.name() + (cmd.alias() ? `|${cmd.alias()}` : ''),
});

await program.parseAsync();
