/**
 * Required Named Parameter Rule
 *
 * Flags named parameters without a default value and without `@required`
 * whose function body opens with `assert(param != null)`.
 */

import type {
  AnnotationRef,
  ConditionExpr,
  FunctionBody,
  FunctionLikeNode,
  ParameterNode,
  ReportSink,
  SymbolResolver,
  SyntaxTree
} from '../types/syntax-model';

/** The name of the library that defines analysis annotations */
export const META_LIBRARY_NAME = 'meta';

/** The member used to mark a required named parameter */
export const REQUIRED_MEMBER_NAME = 'required';

export const RULE_NAME = 'require-non-null-named-params';

export interface RuleMetadata {
  name: string;
  description: string;
  details: string;
  group: 'style' | 'errors';
  version: string;
}

export const REQUIRED_NAMED_PARAM_RULE: RuleMetadata = {
  name: RULE_NAME,
  description: 'Use @required.',
  details: `**DO** specify \`@required\` on a named parameter without a default value
on which an \`assert(param != null)\` is done.

**GOOD:**
\`\`\`
import { required } from 'meta';

class Client {
  connect(@required { host }: Options) {
    assert(host != null);
  }

  retry({ attempts = 3 }: RetryOptions) {
    assert(attempts != null);
  }
}
\`\`\`

**BAD:**
\`\`\`
function connect({ host }: Options) {
  assert(host != null);
}
\`\`\`

NOTE: Only asserts at the start of the bodies will be taken into account.`,
  group: 'style',
  version: '1.0.0'
};

function isRequiredMarker<THandle>(
  annotation: AnnotationRef<THandle>,
  resolver: SymbolResolver<THandle>
): boolean {
  const symbol = resolver.resolve(annotation);
  return (
    symbol !== undefined &&
    symbol.memberName === REQUIRED_MEMBER_NAME &&
    symbol.libraryName === META_LIBRARY_NAME
  );
}

/**
 * Select the named parameters that are candidates for the check
 */
export function classifyParameters<THandle>(
  parameters: readonly ParameterNode<THandle>[],
  resolver: SymbolResolver<THandle>
): ParameterNode<THandle>[] {
  return (
    parameters
      // only named parameters
      .filter(p => p.kind === 'named')
      // without default value
      .filter(p => !p.hasDefaultValue)
      // without @required
      .filter(p => !p.annotations.some(a => isRequiredMarker(a, resolver)))
  );
}

function unParenthesized(expression: ConditionExpr): ConditionExpr {
  return expression.kind === 'parenthesized' ? expression.expression : expression;
}

/**
 * Conditions of the leading run of assertion statements in a body
 */
export function leadingAssertions(body: FunctionBody | undefined): ConditionExpr[] {
  if (!body || body.kind !== 'block') {
    return [];
  }

  const conditions: ConditionExpr[] = [];
  for (const statement of body.statements) {
    if (statement.kind !== 'assertion') break;
    conditions.push(unParenthesized(statement.condition));
  }
  return conditions;
}

/**
 * True for `name != null` and `null != name`
 */
export function matchesNotNull(condition: ConditionExpr, paramName: string): boolean {
  if (condition.kind !== 'binary-not-equal') {
    return false;
  }
  const operands = [condition.left, condition.right];
  return (
    operands.some(e => e.kind === 'null-literal') &&
    operands.some(e => e.kind === 'identifier' && e.name === paramName)
  );
}

function checkFunction<THandle>(
  fn: FunctionLikeNode<THandle>,
  sink: ReportSink<THandle>,
  resolver: SymbolResolver<THandle>
): void {
  const params = classifyParameters(fn.parameters, resolver);
  if (params.length === 0) return;

  const asserts = leadingAssertions(fn.body);
  if (asserts.length === 0) return;

  for (const param of params) {
    if (asserts.some(condition => matchesNotNull(condition, param.name))) {
      sink.report(param.position, param, fn);
    }
  }
}

function visit<THandle>(
  fn: FunctionLikeNode<THandle>,
  sink: ReportSink<THandle>,
  resolver: SymbolResolver<THandle>
): void {
  checkFunction(fn, sink, resolver);
  for (const child of fn.children) {
    visit(child, sink, resolver);
  }
}

/**
 * Run the rule over a whole tree, reporting in pre-order source order
 */
export function analyze<THandle>(
  tree: SyntaxTree<THandle>,
  sink: ReportSink<THandle>,
  resolver: SymbolResolver<THandle>
): void {
  for (const fn of tree.functions) {
    visit(fn, sink, resolver);
  }
}
