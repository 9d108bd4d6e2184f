import * as path from 'path';
import type { OptionValues } from 'commander';
import { ConfigManager } from '../core/config';
import type { AppEnvironment, CommandEnvironment, GlobalOptions } from '../types/environment';
import type { AsyncReader } from '../types/reader';
import type { BaseCommandOptions } from '../types/command';
import { Logger } from '../utils/cli-utils';
import { createErrorHandler } from '../utils/error-handler';

type ParentCommand = { opts(): OptionValues; parent?: { opts(): OptionValues } | null };

function readGlobalOptions(opts: OptionValues): GlobalOptions {
  const global: GlobalOptions = {};
  if (typeof opts['config'] === 'string' || opts['config'] === false) global.config = opts['config'];
  if (typeof opts['cwd'] === 'string') global.cwd = opts['cwd'];
  if (typeof opts['verbose'] === 'boolean') global.verbose = opts['verbose'];
  if (typeof opts['quiet'] === 'boolean') global.quiet = opts['quiet'];
  return global;
}

/**
 * Build the shared environment: logger, working directory and loaded config
 */
export function createAppEnvironment(global: GlobalOptions, isJsonOutput: boolean): AppEnvironment {
  const cwd = path.resolve(global.cwd ?? process.cwd());
  // JSON output must stay machine-readable, so the app logger goes quiet
  const logger = new Logger(global.verbose ?? false, (global.quiet ?? false) || isJsonOutput);

  const configManager = new ConfigManager();
  const loadOptions: { configPath?: string; searchFrom?: string; noConfig?: boolean } = {
    searchFrom: cwd,
    noConfig: global.config === false
  };
  if (typeof global.config === 'string') {
    loadOptions.configPath = path.resolve(cwd, global.config);
  }
  const config = configManager.load(loadOptions);
  const configPath = configManager.getConfigPath();
  logger.debug(configPath ? `Using config ${configPath}` : 'Using default configuration');

  return { config, configPath, logger, cwd };
}

export function createCommandEnvironment(
  appEnv: AppEnvironment,
  options: BaseCommandOptions,
  global: GlobalOptions
): CommandEnvironment {
  return {
    ...appEnv,
    commandLogger: new Logger(
      options.verbose ?? global.verbose ?? false,
      (options.quiet ?? global.quiet ?? false) || (options.json ?? false)
    )
  };
}

/**
 * Adapt a Reader-style command to a commander action handler
 */
export function withEnvironment<TOptions extends BaseCommandOptions>(
  commandReader: (options: TOptions) => AsyncReader<CommandEnvironment, void>
) {
  return async (options: TOptions, parentCommand?: ParentCommand): Promise<void> => {
    const parentOpts = parentCommand?.parent?.opts() ?? parentCommand?.opts() ?? {};
    const global = readGlobalOptions(parentOpts);
    const mergedOptions: TOptions = {
      ...options,
      verbose: options.verbose ?? global.verbose,
      quiet: options.quiet ?? global.quiet
    };
    const isJsonOutput = mergedOptions.json ?? false;

    try {
      const appEnv = createAppEnvironment(global, isJsonOutput);
      const commandEnv = createCommandEnvironment(appEnv, mergedOptions, global);
      await commandReader(mergedOptions)(commandEnv);
    } catch (error) {
      const errorHandler = createErrorHandler(new Logger(global.verbose ?? false, false));
      errorHandler.handleError(errorHandler.fromUnknown(error));
    }
  };
}
