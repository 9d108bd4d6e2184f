import { Node } from 'ts-morph';
import type { Decorator, SourceFile } from 'ts-morph';
import type { AnnotationRef, ResolvedSymbol, SymbolResolver } from '../types/syntax-model';

export type ImportRecord = {
  module: string;
  kind: 'namespace' | 'named' | 'default';
  local: string;      // local (alias) name
  imported?: string;  // exported name; "default" for default imports
};

/**
 * Index a file's value imports by their local name
 */
export function buildImportIndex(sf: SourceFile): Map<string, ImportRecord> {
  const map = new Map<string, ImportRecord>();

  for (const imp of sf.getImportDeclarations()) {
    // type-only imports cannot be used as decorators
    if (imp.isTypeOnly()) continue;
    const mod = imp.getModuleSpecifierValue();

    // import * as name from 'module'
    const ns = imp.getNamespaceImport();
    if (ns) {
      const local = ns.getText();
      map.set(local, { module: mod, kind: 'namespace', local });
    }

    // import name from 'module'
    const def = imp.getDefaultImport();
    if (def) {
      const local = def.getText();
      map.set(local, { module: mod, kind: 'default', local, imported: 'default' });
    }

    // import { name1, name2 as alias } from 'module'
    for (const n of imp.getNamedImports()) {
      if (n.isTypeOnly()) continue;
      const local = n.getAliasNode()?.getText() ?? n.getNameNode().getText();
      const imported = n.getNameNode().getText();
      map.set(local, { module: mod, kind: 'named', local, imported });
    }
  }

  return map;
}

/**
 * Resolves decorators to the library member they were imported from.
 * Identifiers that are not imports resolve to undefined.
 */
export class ImportSymbolResolver implements SymbolResolver<Decorator> {
  private indexes = new Map<SourceFile, Map<string, ImportRecord>>();

  resolve(annotation: AnnotationRef<Decorator>): ResolvedSymbol | undefined {
    const decorator = annotation.handle;
    const index = this.getImportIndex(decorator.getSourceFile());

    let expression: Node = decorator.getExpression();
    // @required() resolves through its callee
    if (Node.isCallExpression(expression)) {
      expression = expression.getExpression();
    }

    if (Node.isIdentifier(expression)) {
      const record = index.get(expression.getText());
      if (!record || record.kind === 'namespace' || record.imported === undefined) {
        return undefined;
      }
      return { libraryName: record.module, memberName: record.imported };
    }

    if (Node.isPropertyAccessExpression(expression)) {
      const target = expression.getExpression();
      if (!Node.isIdentifier(target)) return undefined;
      const record = index.get(target.getText());
      if (!record || record.kind !== 'namespace') return undefined;
      return { libraryName: record.module, memberName: expression.getName() };
    }

    return undefined;
  }

  private getImportIndex(sf: SourceFile): Map<string, ImportRecord> {
    let index = this.indexes.get(sf);
    if (!index) {
      index = buildImportIndex(sf);
      this.indexes.set(sf, index);
    }
    return index;
  }
}
