/**
 * Syntax Model Types
 *
 * Read-only views over a host syntax tree. The analysis never builds or
 * mutates host nodes; a front end (see ts-syntax-tree-builder) materializes
 * these views per pass.
 */

/**
 * 1-based line/column plus absolute offset of a token
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export type ParameterKind = 'positional' | 'named';

/**
 * An annotation attached to a parameter. `handle` is whatever the host's
 * symbol resolver needs to resolve it.
 */
export interface AnnotationRef<THandle = unknown> {
  handle: THandle;
  text: string;
}

export interface ParameterNode<THandle = unknown> {
  name: string;
  kind: ParameterKind;
  hasDefaultValue: boolean;
  annotations: AnnotationRef<THandle>[];
  position: SourcePosition;
}

export type ConditionExpr =
  | { kind: 'binary-not-equal'; left: ConditionExpr; right: ConditionExpr }
  | { kind: 'null-literal' }
  | { kind: 'identifier'; name: string }
  | { kind: 'parenthesized'; expression: ConditionExpr }
  | { kind: 'other' };

export type StatementNode =
  | { kind: 'assertion'; condition: ConditionExpr }
  | { kind: 'other' };

export type FunctionBody =
  | { kind: 'block'; statements: StatementNode[] }
  | { kind: 'expression' };

export type FunctionLikeKind = 'function-literal' | 'constructor' | 'method';

export interface FunctionLikeNode<THandle = unknown> {
  kind: FunctionLikeKind;
  /** Display name, e.g. `Service.constructor` */
  name?: string;
  parameters: ParameterNode<THandle>[];
  body?: FunctionBody;
  /** Function-like nodes nested directly inside this one, in source order */
  children: FunctionLikeNode<THandle>[];
}

export interface SyntaxTree<THandle = unknown> {
  functions: FunctionLikeNode<THandle>[];
}

/**
 * Library/member pair an annotation resolves to
 */
export interface ResolvedSymbol {
  libraryName: string;
  memberName: string;
}

export interface SymbolResolver<THandle = unknown> {
  resolve(annotation: AnnotationRef<THandle>): ResolvedSymbol | undefined;
}

export interface ReportSink<THandle = unknown> {
  report(position: SourcePosition, parameter: ParameterNode<THandle>, fn: FunctionLikeNode<THandle>): void;
}
