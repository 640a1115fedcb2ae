#!/usr/bin/env node

/**
 * Backend Export CLI - Export APM backends to CSV
 * Provides inventory and migration reports of external call targets per application tier
 */

import { program } from 'commander';
import { ExportAdapter } from './adapters/ExportAdapter';
import { version } from '../../package.json';

interface CliFlags {
  config: string;
  output?: string;
  skipThreadTasks?: boolean;
  continueOnError?: boolean;
  quoteFields?: boolean;
  logFile?: string;
  verbose?: boolean;
  color: boolean;
}

// Create export adapter
const adapter = new ExportAdapter();

// Configure CLI
program
  .name('backend-export')
  .description('Export backends of APM applications to a CSV file')
  .version(version)
  .requiredOption('-c, --config <file>', 'Path to config file (key=value, YAML or JSON)')
  .option('-o, --output <file>', 'Output CSV file (overrides output_file)')
  .option('--skip-thread-tasks', 'Do not search thread tasks for backends')
  .option('--continue-on-error', 'Skip applications whose queries fail')
  .option('--quote-fields', 'Quote CSV fields containing commas, quotes or line breaks')
  .option('--log-file <file>', 'Also write log lines to a file')
  .option('-v, --verbose', 'Show debug information')
  .option('--no-color', 'Disable colored output')
  .action(async (options: CliFlags) => {
    await adapter.execute({
      config: options.config,
      output: options.output,
      skipThreadTasks: options.skipThreadTasks,
      continueOnError: options.continueOnError,
      quoteFields: options.quoteFields,
      logFile: options.logFile,
      verbose: options.verbose,
      // --no-color forces plain output; otherwise the logger checks the terminal
      color: options.color === false ? false : undefined,
    });
  });

// Parse arguments
program.parseAsync().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
