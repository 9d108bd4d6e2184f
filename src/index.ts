// paramguard - required named parameter checks for TypeScript
export type * from './types/syntax-model';
export type * from './types/required-params';

export {
  analyze,
  classifyParameters,
  leadingAssertions,
  matchesNotNull,
  META_LIBRARY_NAME,
  REQUIRED_MEMBER_NAME,
  REQUIRED_NAMED_PARAM_RULE,
  RULE_NAME
} from './analyzers/required-named-param-rule';
export type { RuleMetadata } from './analyzers/required-named-param-rule';
export {
  TsSyntaxTreeBuilder,
  DEFAULT_ASSERTION_FUNCTIONS,
  getFunctionDisplayName
} from './analyzers/ts-syntax-tree-builder';
export { ImportSymbolResolver, buildImportIndex } from './analyzers/import-symbol-resolver';
export { RequiredParamDetector, DEFAULT_DETECTOR_CONFIG } from './analyzers/required-param-detector';
export { ConfigManager } from './core/config';
export { FindingFormatter } from './utils/finding-formatter';
export { ErrorCode, ErrorHandler, ConfigLoadError } from './utils/error-handler';
