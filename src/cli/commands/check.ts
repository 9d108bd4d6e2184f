/**
 * Check Command
 *
 * Reports named parameters that are asserted non-null but not marked @required
 */

import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import globby from 'globby';
import type { VoidCommand } from '../../types/command';
import type { CommandEnvironment } from '../../types/environment';
import type { CheckCommandOptions, ParamguardConfig } from '../../types/required-params';
import { RequiredParamDetector } from '../../analyzers/required-param-detector';
import { FindingFormatter } from '../../utils/finding-formatter';
import { Logger, parseListOption, parsePositiveInt } from '../../utils/cli-utils';
import { createErrorHandler, ErrorCode, ErrorHandler } from '../../utils/error-handler';

const TYPESCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts'];
const DECLARATION_EXTENSIONS = ['.d.ts', '.d.mts', '.d.cts'];

export function isTypeScriptFile(filePath: string): boolean {
  return TYPESCRIPT_EXTENSIONS.some(ext => filePath.endsWith(ext)) &&
    !DECLARATION_EXTENSIONS.some(ext => filePath.endsWith(ext));
}

/**
 * Get TypeScript files to analyze: the given paths, or the configured include patterns
 */
export async function getFilesToAnalyze(
  targetPaths: string[],
  config: ParamguardConfig,
  cwd: string
): Promise<string[]> {
  if (targetPaths.length === 0) {
    const matched = await globby(config.include, { cwd, ignore: config.exclude, absolute: true });
    return matched.map(file => path.resolve(file)).sort();
  }

  const files = new Set<string>();
  for (const target of targetPaths) {
    const resolved = path.resolve(cwd, target);
    const stats = await fs.promises.stat(resolved);

    if (stats.isFile()) {
      if (isTypeScriptFile(resolved)) files.add(resolved);
      continue;
    }

    // the directory is the glob root so its own name is never read as a pattern
    const patterns = TYPESCRIPT_EXTENSIONS.map(ext => `**/*${ext}`);
    for (const file of await globby(patterns, { cwd: resolved, ignore: config.exclude, absolute: true })) {
      if (isTypeScriptFile(file)) files.add(path.resolve(file));
    }
  }

  return [...files].sort();
}

/**
 * Apply command-line overrides on top of the loaded config
 */
export function applyCommandOverrides(
  config: ParamguardConfig,
  options: CheckCommandOptions,
  cwd: string
): ParamguardConfig {
  const merged: ParamguardConfig = { ...config };
  if (options.tsconfig) {
    merged.tsconfigPath = path.resolve(cwd, options.tsconfig);
  }
  const assertionFunctions = parseListOption(options.assert);
  if (assertionFunctions) {
    merged.assertionFunctions = assertionFunctions;
  }
  return merged;
}

/**
 * Check command implementation
 */
export const checkCommand: VoidCommand<CheckCommandOptions> = (options) =>
  async (env: CommandEnvironment): Promise<void> => {
    // errors are reported even when JSON output silences the command logger
    const errorHandler: ErrorHandler = createErrorHandler(new Logger(options.verbose ?? false, false));
    const spinner = ora({ isSilent: (options.quiet ?? false) || (options.json ?? false) });

    const config = applyCommandOverrides(env.config, options, env.cwd);

    spinner.start('Finding TypeScript files...');
    let files: string[];
    try {
      files = await getFilesToAnalyze(options.paths ?? [], config, env.cwd);
    } catch (error) {
      spinner.fail('Could not read target paths');
      errorHandler.handleError(errorHandler.fromUnknown(error, ErrorCode.FILE_NOT_ACCESSIBLE));
    }

    if (files.length === 0) {
      spinner.fail('No TypeScript files found');
      errorHandler.handleError(errorHandler.createError(
        ErrorCode.NO_FILES_FOUND,
        'No TypeScript files matched the given paths',
        { paths: options.paths ?? config.include }
      ));
    }
    spinner.succeed(`Found ${files.length} TypeScript files`);

    spinner.start('Checking named parameters...');
    let detector: RequiredParamDetector;
    try {
      detector = new RequiredParamDetector(config, { logger: env.commandLogger });
    } catch (error) {
      spinner.fail('Could not load TypeScript configuration');
      errorHandler.handleError(errorHandler.fromUnknown(error, ErrorCode.TYPESCRIPT_CONFIG_ERROR));
    }
    const result = detector.analyze(files);
    spinner.succeed('Analysis complete');

    const maxFindings = parsePositiveInt(options.maxFindings);
    console.log(FindingFormatter.format(result, {
      json: options.json ?? false,
      verbose: options.verbose ?? false,
      quiet: options.quiet ?? false,
      cwd: env.cwd,
      ...(maxFindings !== undefined ? { maxFindings } : {})
    }));

    if (result.summary.total > 0) {
      process.exitCode = 1;
      if (!options.json && !options.quiet) {
        console.log(chalk.bold('\nNext steps:'));
        console.log(`  • Import ${chalk.cyan('required')} from ${chalk.cyan("'meta'")} and decorate the parameter`);
        console.log(`  • Or give the property a default value`);
        console.log(chalk.gray('  Run "paramguard explain" for examples'));
      }
    }
  };
