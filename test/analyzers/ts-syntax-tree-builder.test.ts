import { describe, it, expect, beforeEach } from 'vitest';
import { Decorator, Project } from 'ts-morph';
import { TsSyntaxTreeBuilder } from '../../src/analyzers/ts-syntax-tree-builder';
import type { FunctionLikeNode, SyntaxTree } from '../../src/types/syntax-model';

function summarize(fn: FunctionLikeNode<Decorator>): unknown {
  return {
    kind: fn.kind,
    name: fn.name,
    parameters: fn.parameters.map(p => `${p.kind}:${p.name}${p.hasDefaultValue ? '=' : ''}`),
    body: fn.body?.kind,
    children: fn.children.map(summarize)
  };
}

describe('TsSyntaxTreeBuilder', () => {
  let project: Project;
  let builder: TsSyntaxTreeBuilder;
  let fileCounter = 0;

  function build(source: string): SyntaxTree<Decorator> {
    fileCounter++;
    const sourceFile = project.createSourceFile(`/src/file${fileCounter}.ts`, source);
    return builder.build(sourceFile);
  }

  beforeEach(() => {
    project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        experimentalDecorators: true,
        skipLibCheck: true
      }
    });
    builder = new TsSyntaxTreeBuilder();
  });

  describe('parameters', () => {
    it('maps destructured properties to named parameters and identifiers to positional ones', () => {
      const tree = build(
        'function connect({ host, port = 80, key: alias, nested: { inner }, ...rest }: Options, retries: number, timeout = 5) {}'
      );

      expect(tree.functions[0].parameters.map(p => [p.name, p.kind, p.hasDefaultValue])).toEqual([
        ['host', 'named', false],
        ['port', 'named', true],
        ['alias', 'named', false],
        ['retries', 'positional', false],
        ['timeout', 'positional', true]
      ]);
    });

    it('does not give properties a default from a default on the whole pattern', () => {
      const tree = build('function f({ a }: { a?: string } = {}) {}');

      expect(tree.functions[0].parameters.map(p => [p.name, p.hasDefaultValue])).toEqual([['a', false]]);
    });

    it('skips array binding patterns', () => {
      const tree = build('function f([first, second]: string[]) {}');

      expect(tree.functions[0].parameters).toEqual([]);
    });

    it('anchors the position at the local binding name', () => {
      const source = [
        "import { required } from 'meta';",
        'function connect({ host, key: alias }: Options) {}'
      ].join('\n');
      const tree = build(source);
      const [host, alias] = tree.functions[0].parameters;

      expect(host.position).toEqual({
        offset: source.indexOf('host'),
        line: 2,
        column: source.split('\n')[1].indexOf('host') + 1
      });
      expect(alias.position.offset).toBe(source.indexOf('alias'));
    });

    it('attaches a parameter decorator to every named parameter it introduces', () => {
      const tree = build([
        "import { required } from 'meta';",
        'class Client {',
        '  connect(@required { host, port }: Options, @required() id: string) {}',
        '}'
      ].join('\n'));
      const params = tree.functions[0].parameters;

      expect(params.map(p => [p.name, p.annotations.map(a => a.text)])).toEqual([
        ['host', ['@required']],
        ['port', ['@required']],
        ['id', ['@required()']]
      ]);
      expect(params[0].annotations[0].handle).toBe(params[1].annotations[0].handle);
    });
  });

  describe('function-like nodes', () => {
    it('classifies functions, constructors, methods and accessors', () => {
      const tree = build([
        'function top() {}',
        'const arrow = () => 1;',
        'const expr = function named() {};',
        'class Service {',
        '  constructor({ a }: O) {}',
        '  run() {}',
        '  get value() { return 1; }',
        '  set value(v: number) {}',
        '  handler = ({ b }: O) => {};',
        '}'
      ].join('\n'));

      expect(tree.functions.map(fn => [fn.kind, fn.name])).toEqual([
        ['function-literal', 'top'],
        ['function-literal', 'arrow'],
        ['function-literal', 'named'],
        ['constructor', 'Service.constructor'],
        ['method', 'Service.run'],
        ['method', 'Service.value'],
        ['method', 'Service.value'],
        ['function-literal', 'Service.handler']
      ]);
    });

    it('qualifies only direct class members with the class name', () => {
      const tree = build([
        'class Service {',
        '  handlers() {',
        '    return { open({ path }: O) { assert(path != null); } };',
        '  }',
        '}',
        'const Anonymous = class {',
        '  run() {}',
        '};'
      ].join('\n'));

      expect(tree.functions.map(summarize)).toEqual([
        {
          kind: 'method',
          name: 'Service.handlers',
          parameters: [],
          body: 'block',
          children: [
            { kind: 'method', name: 'open', parameters: ['named:path'], body: 'block', children: [] }
          ]
        },
        { kind: 'method', name: 'run', parameters: [], body: 'block', children: [] }
      ]);
    });

    it('nests function-like nodes found inside another one', () => {
      const tree = build([
        'function outer({ a }: O) {',
        '  const helper = ({ b }: O) => {',
        '    return [1].map(function ({ c }: O) { return c; });',
        '  };',
        '}',
        'function sibling() {}'
      ].join('\n'));

      expect(tree.functions.map(summarize)).toEqual([
        {
          kind: 'function-literal',
          name: 'outer',
          parameters: ['named:a'],
          body: 'block',
          children: [
            {
              kind: 'function-literal',
              name: 'helper',
              parameters: ['named:b'],
              body: 'block',
              children: [
                {
                  kind: 'function-literal',
                  name: '<anonymous>',
                  parameters: ['named:c'],
                  body: 'block',
                  children: []
                }
              ]
            }
          ]
        },
        { kind: 'function-literal', name: 'sibling', parameters: [], body: 'block', children: [] }
      ]);
    });

    it('leaves the body absent for overloads and abstract members', () => {
      const tree = build([
        'function f({ a }: O): void;',
        'function f({ a }: O) {}',
        'abstract class Base {',
        '  abstract run({ b }: O): void;',
        '}',
        'const g = ({ c }: O) => c;'
      ].join('\n'));

      expect(tree.functions.map(fn => fn.body?.kind)).toEqual([undefined, 'block', undefined, 'expression']);
    });
  });

  describe('statements', () => {
    it('recognizes assertion calls and maps their conditions', () => {
      const tree = build([
        'function f({ a, b }: O) {',
        '  assert(a != null);',
        '  assert.ok((null != b));',
        '  invariant(a !== null);',
        '  assert();',
        '  console.log(a);',
        '  if (a == null) throw new Error();',
        '}'
      ].join('\n'));

      const body = tree.functions[0].body;
      expect(body).toEqual({
        kind: 'block',
        statements: [
          {
            kind: 'assertion',
            condition: {
              kind: 'binary-not-equal',
              left: { kind: 'identifier', name: 'a' },
              right: { kind: 'null-literal' }
            }
          },
          {
            kind: 'assertion',
            condition: {
              kind: 'parenthesized',
              expression: {
                kind: 'binary-not-equal',
                left: { kind: 'null-literal' },
                right: { kind: 'identifier', name: 'b' }
              }
            }
          },
          { kind: 'assertion', condition: { kind: 'other' } },
          { kind: 'other' },
          { kind: 'other' },
          { kind: 'other' }
        ]
      });
    });

    it('only treats the configured callees as assertions', () => {
      builder = new TsSyntaxTreeBuilder({ assertionFunctions: ['check'] });
      const tree = build([
        'function f({ a }: O) {',
        '  check(a != null);',
        '  assert(a != null);',
        '}'
      ].join('\n'));

      const body = tree.functions[0].body;
      expect(body?.kind === 'block' ? body.statements.map(s => s.kind) : []).toEqual(['assertion', 'other']);
    });
  });
});
