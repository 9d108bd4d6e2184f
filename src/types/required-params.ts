/**
 * Required Named Parameter Check Types
 */

import type { BaseCommandOptions } from './command';
import type { FunctionLikeKind } from './syntax-model';

/**
 * A named parameter asserted non-null without being marked @required
 */
export interface RequiredParamFinding {
  /** Absolute file path */
  filePath: string;
  /** Line number (1-based) */
  line: number;
  /** Column number (1-based) */
  column: number;
  /** Offset of the parameter name in the file */
  offset: number;
  rule: string;
  message: string;
  parameterName: string;
  functionDisplayName: string;
  functionKind: FunctionLikeKind;
}

/**
 * Configuration for the check
 */
export interface ParamguardConfig {
  /** Glob patterns of files to analyze */
  include: string[];
  /** Files or patterns to exclude from analysis */
  exclude: string[];
  /** Path to TypeScript config file */
  tsconfigPath?: string;
  /** Callee texts treated as assertion statements (assert, assert.ok, ...) */
  assertionFunctions: string[];
}

/**
 * User-supplied config before validation
 */
export interface UserConfig {
  include?: unknown;
  exclude?: unknown;
  tsconfigPath?: unknown;
  assertionFunctions?: unknown;
}

export interface RequiredParamSummary {
  /** Total number of findings */
  total: number;
  filesAnalyzed: number;
  functionsAnalyzed: number;
  filesWithFindings: number;
}

/**
 * Complete check result
 */
export interface RequiredParamCheckResult {
  findings: RequiredParamFinding[];
  summary: RequiredParamSummary;
  /** Configuration used */
  config: ParamguardConfig;
  /** Timestamp of the check */
  timestamp: string;
  /** Version of the rule */
  version: string;
}

/**
 * Command options for check
 */
export interface CheckCommandOptions extends BaseCommandOptions {
  /** Files or directories given on the command line */
  paths?: string[];
  tsconfig?: string;
  /** Comma-separated assertion callee names */
  assert?: string;
  /** Limit the number of findings printed */
  maxFindings?: string;
}
