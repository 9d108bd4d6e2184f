#!/usr/bin/env node

import { Command } from 'commander';
import type { OptionValues } from 'commander';
import { Logger } from './utils/cli-utils';
import { createErrorHandler, setupGlobalErrorHandlers } from './utils/error-handler';

// Dynamic imports for all commands to improve startup performance

const program = new Command();

program
  .name('paramguard')
  .description('Flag named parameters that are asserted non-null but not marked @required')
  .version('0.1.0');

// Global options
program
  .option('--config <path>', 'specify config file path')
  .option('--no-config', 'ignore config file')
  .option('--cwd <path>', 'change working directory')
  .option('--verbose', 'enable verbose output')
  .option('--quiet', 'suppress output')
  .option('--no-color', 'disable colored output');

program
  .command('check')
  .description('Check TypeScript files for named parameters that should be @required')
  .argument('[paths...]', 'files or directories to check (defaults to configured include patterns)')
  .option('-j, --json', 'output results as JSON')
  .option('--tsconfig <path>', 'TypeScript config used to parse files')
  .option('--assert <names>', 'assertion functions (comma-separated)')
  .option('--max-findings <n>', 'print at most n findings')
  .action(async (paths: string[], options: OptionValues, command: Command) => {
    const { withEnvironment } = await import('./cli/cli-wrapper');
    const { checkCommand } = await import('./cli/commands/check');
    return withEnvironment(checkCommand)({ ...options, paths }, command);
  })
  .addHelpText('after', `
Examples:
  # Check the configured include patterns
  $ paramguard check

  # Check a directory and print a table
  $ paramguard check src/services --verbose

  # Treat custom helpers as assertions
  $ paramguard check --assert assert,invariant,check

  # Machine-readable output
  $ paramguard check --json

Configuration (.paramguardrc.json):
  {
    "include": ["src/**/*.ts"],
    "exclude": ["**/*.test.ts"],
    "assertionFunctions": ["assert", "invariant"]
  }
`);

program
  .command('explain')
  .description('Describe the require-non-null-named-params rule')
  .option('-j, --json', 'output rule metadata as JSON')
  .action(async (options: OptionValues, command: Command) => {
    const { withEnvironment } = await import('./cli/cli-wrapper');
    const { explainCommand } = await import('./cli/commands/explain');
    return withEnvironment(explainCommand)(options, command);
  });

const errorHandler = createErrorHandler(new Logger(process.argv.includes('--verbose')));
setupGlobalErrorHandlers(errorHandler);

program.parseAsync(process.argv).catch((error: unknown) => {
  errorHandler.handleError(errorHandler.fromUnknown(error));
});
