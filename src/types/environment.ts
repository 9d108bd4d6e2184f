import type { Logger } from '../utils/cli-utils';
import type { ParamguardConfig } from './required-params';

/**
 * Application environment containing all shared dependencies
 */
export interface AppEnvironment {
  config: ParamguardConfig;
  /** Config file the settings came from, null when defaults are used */
  configPath: string | null;
  logger: Logger;
  /** Directory paths and include patterns are resolved against */
  cwd: string;
}

/**
 * Command-specific environment that extends the app environment
 */
export interface CommandEnvironment extends AppEnvironment {
  commandLogger: Logger;
}

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  /** Config file path, or false for --no-config */
  config?: string | false;
  cwd?: string;
  verbose?: boolean;
  quiet?: boolean;
}
