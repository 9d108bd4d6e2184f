/**
 * TypeScript Syntax Tree Builder
 *
 * Materializes the syntax model from a ts-morph SourceFile. Named parameters
 * are the properties of a destructured options object:
 *
 *   function connect(@required { host, port = 80 }: Options) { ... }
 *
 * introduces the named parameters `host` and `port`, both annotated with
 * the parameter's decorators.
 */

import { Node, SyntaxKind } from 'ts-morph';
import type {
  ArrowFunction,
  ConstructorDeclaration,
  Decorator,
  FunctionDeclaration,
  FunctionExpression,
  GetAccessorDeclaration,
  MethodDeclaration,
  ParameterDeclaration,
  SetAccessorDeclaration,
  SourceFile,
  Statement
} from 'ts-morph';
import type {
  AnnotationRef,
  ConditionExpr,
  FunctionBody,
  FunctionLikeKind,
  FunctionLikeNode,
  ParameterNode,
  SourcePosition,
  StatementNode,
  SyntaxTree
} from '../types/syntax-model';

export const DEFAULT_ASSERTION_FUNCTIONS = ['assert', 'assert.ok', 'invariant'];

export type TsFunctionLike =
  | FunctionDeclaration
  | FunctionExpression
  | ArrowFunction
  | ConstructorDeclaration
  | MethodDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration;

export interface TsSyntaxTreeBuilderOptions {
  /** Callee texts whose call statements count as assertions */
  assertionFunctions?: string[];
}

export function isFunctionLike(node: Node): node is TsFunctionLike {
  return Node.isFunctionDeclaration(node) ||
         Node.isFunctionExpression(node) ||
         Node.isArrowFunction(node) ||
         Node.isConstructorDeclaration(node) ||
         Node.isMethodDeclaration(node) ||
         Node.isGetAccessorDeclaration(node) ||
         Node.isSetAccessorDeclaration(node);
}

export function positionOf(node: Node): SourcePosition {
  const offset = node.getStart();
  const { line, column } = node.getSourceFile().getLineAndColumnAtPos(offset);
  return { offset, line, column };
}

/**
 * Display name of a function-like node, qualified by its class when it has one
 */
export function getFunctionDisplayName(node: TsFunctionLike): string {
  let name: string | undefined;

  if (Node.isConstructorDeclaration(node)) {
    name = 'constructor';
  } else if (Node.isFunctionDeclaration(node) || Node.isFunctionExpression(node)) {
    name = node.getName();
  } else if (Node.isMethodDeclaration(node) ||
             Node.isGetAccessorDeclaration(node) ||
             Node.isSetAccessorDeclaration(node)) {
    name = node.getName();
  }

  if (!name && (Node.isArrowFunction(node) || Node.isFunctionExpression(node))) {
    const parent = node.getParent();
    if (Node.isVariableDeclaration(parent) || Node.isPropertyAssignment(parent) ||
        Node.isPropertyDeclaration(parent)) {
      name = parent.getName();
    }
  }

  if (!name) {
    return '<anonymous>';
  }
  // only direct class members are qualified, not object-literal methods nested inside them
  const parent = node.getParent();
  const owner = Node.isPropertyDeclaration(parent) ? parent.getParent() : parent;
  const className = Node.isClassDeclaration(owner) ? owner.getName() : undefined;
  return className ? `${className}.${name}` : name;
}

export class TsSyntaxTreeBuilder {
  private assertionFunctions: Set<string>;

  constructor(options: TsSyntaxTreeBuilderOptions = {}) {
    this.assertionFunctions = new Set(options.assertionFunctions ?? DEFAULT_ASSERTION_FUNCTIONS);
  }

  build(sourceFile: SourceFile): SyntaxTree<Decorator> {
    const functions: FunctionLikeNode<Decorator>[] = [];
    this.collect(sourceFile, functions);
    return { functions };
  }

  private collect(node: Node, into: FunctionLikeNode<Decorator>[]): void {
    node.forEachChild(child => {
      if (isFunctionLike(child)) {
        const fn = this.toFunctionLike(child);
        into.push(fn);
        this.collect(child, fn.children);
      } else {
        this.collect(child, into);
      }
    });
  }

  private toFunctionLike(node: TsFunctionLike): FunctionLikeNode<Decorator> {
    const fn: FunctionLikeNode<Decorator> = {
      kind: this.getKind(node),
      name: getFunctionDisplayName(node),
      parameters: node.getParameters().flatMap(p => this.toParameters(p)),
      children: []
    };
    const body = this.toBody(node);
    if (body) {
      fn.body = body;
    }
    return fn;
  }

  private getKind(node: TsFunctionLike): FunctionLikeKind {
    if (Node.isConstructorDeclaration(node)) return 'constructor';
    if (Node.isMethodDeclaration(node) ||
        Node.isGetAccessorDeclaration(node) ||
        Node.isSetAccessorDeclaration(node)) return 'method';
    return 'function-literal';
  }

  private toParameters(param: ParameterDeclaration): ParameterNode<Decorator>[] {
    const annotations: AnnotationRef<Decorator>[] = param.getDecorators().map(decorator => ({
      handle: decorator,
      text: decorator.getText()
    }));
    const nameNode = param.getNameNode();

    if (Node.isIdentifier(nameNode)) {
      return [{
        name: nameNode.getText(),
        kind: 'positional',
        hasDefaultValue: param.hasInitializer(),
        annotations,
        position: positionOf(nameNode)
      }];
    }

    if (!Node.isObjectBindingPattern(nameNode)) {
      return [];
    }

    const named: ParameterNode<Decorator>[] = [];
    for (const element of nameNode.getElements()) {
      // rest elements collect the remaining properties, they do not name one
      if (element.getDotDotDotToken()) continue;
      const local = element.getNameNode();
      if (!Node.isIdentifier(local)) continue;
      named.push({
        name: local.getText(),
        kind: 'named',
        hasDefaultValue: element.getInitializer() !== undefined,
        annotations,
        position: positionOf(local)
      });
    }
    return named;
  }

  private toBody(node: TsFunctionLike): FunctionBody | undefined {
    const body = node.getBody();
    if (!body) return undefined;
    if (Node.isBlock(body)) {
      return { kind: 'block', statements: body.getStatements().map(s => this.toStatement(s)) };
    }
    return { kind: 'expression' };
  }

  private toStatement(statement: Statement): StatementNode {
    if (!Node.isExpressionStatement(statement)) {
      return { kind: 'other' };
    }
    const expression = statement.getExpression();
    if (!Node.isCallExpression(expression)) {
      return { kind: 'other' };
    }
    const callee = expression.getExpression().getText();
    const [condition] = expression.getArguments();
    if (!this.assertionFunctions.has(callee) || condition === undefined) {
      return { kind: 'other' };
    }
    return { kind: 'assertion', condition: this.toCondition(condition) };
  }

  private toCondition(node: Node): ConditionExpr {
    if (Node.isParenthesizedExpression(node)) {
      return { kind: 'parenthesized', expression: this.toCondition(node.getExpression()) };
    }
    if (Node.isBinaryExpression(node) &&
        node.getOperatorToken().getKind() === SyntaxKind.ExclamationEqualsToken) {
      return {
        kind: 'binary-not-equal',
        left: this.toCondition(node.getLeft()),
        right: this.toCondition(node.getRight())
      };
    }
    if (node.getKind() === SyntaxKind.NullKeyword) {
      return { kind: 'null-literal' };
    }
    if (Node.isIdentifier(node)) {
      return { kind: 'identifier', name: node.getText() };
    }
    return { kind: 'other' };
  }
}
