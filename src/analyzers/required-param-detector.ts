/**
 * Required Named Parameter Detector
 *
 * Runs the require-non-null-named-params rule over TypeScript files using
 * ts-morph. Files are parsed only; no type checking is done.
 */

import { Project } from 'ts-morph';
import type { Decorator, SourceFile } from 'ts-morph';
import { minimatch } from 'minimatch';
import type {
  ParamguardConfig,
  RequiredParamCheckResult,
  RequiredParamFinding,
  RequiredParamSummary
} from '../types/required-params';
import type { FunctionLikeNode, ReportSink, SyntaxTree } from '../types/syntax-model';
import { analyze, REQUIRED_NAMED_PARAM_RULE } from './required-named-param-rule';
import { DEFAULT_ASSERTION_FUNCTIONS, TsSyntaxTreeBuilder } from './ts-syntax-tree-builder';
import { ImportSymbolResolver } from './import-symbol-resolver';
import { Logger } from '../utils/cli-utils';

/**
 * Default configuration for the check
 */
export const DEFAULT_DETECTOR_CONFIG: ParamguardConfig = {
  include: ['src/**/*.ts', 'src/**/*.tsx'],
  exclude: [
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/*.d.ts'
  ],
  assertionFunctions: [...DEFAULT_ASSERTION_FUNCTIONS]
};

export interface DetectorOptions {
  /** Analyze an existing project instead of creating one */
  project?: Project;
  logger?: Logger;
}

function countFunctions(functions: FunctionLikeNode<Decorator>[]): number {
  return functions.reduce((sum, fn) => sum + 1 + countFunctions(fn.children), 0);
}

export function formatFindingMessage(parameterName: string): string {
  return `Named parameter '${parameterName}' is asserted non-null; mark it with @required.`;
}

export class RequiredParamDetector {
  private project: Project;
  private config: ParamguardConfig;
  private builder: TsSyntaxTreeBuilder;
  private resolver = new ImportSymbolResolver();
  private logger: Logger;
  private functionsAnalyzed = 0;

  constructor(config: Partial<ParamguardConfig> = {}, options: DetectorOptions = {}) {
    this.config = { ...DEFAULT_DETECTOR_CONFIG, ...config };
    this.logger = options.logger ?? new Logger();
    this.builder = new TsSyntaxTreeBuilder({ assertionFunctions: this.config.assertionFunctions });
    this.project = options.project ?? new Project({
      ...(this.config.tsconfigPath ? { tsConfigFilePath: this.config.tsconfigPath } : {}),
      skipAddingFilesFromTsConfig: true,
      compilerOptions: {
        isolatedModules: true,
        skipLibCheck: true,
        noResolve: true,
        noLib: true
      }
    });
  }

  /**
   * Load and analyze files from disk
   */
  analyze(filePaths: string[]): RequiredParamCheckResult {
    const sourceFiles: SourceFile[] = [];

    for (const filePath of filePaths) {
      if (this.shouldExclude(filePath)) {
        this.logger.debug(`Excluded ${filePath}`);
        continue;
      }
      try {
        sourceFiles.push(this.project.addSourceFileAtPath(filePath));
      } catch (error) {
        // Skip files that can't be read
        this.logger.warn(
          `Failed to load ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return this.analyzeSourceFiles(sourceFiles);
  }

  /**
   * Analyze source files already present in the project
   */
  analyzeSourceFiles(sourceFiles: SourceFile[]): RequiredParamCheckResult {
    this.functionsAnalyzed = 0;
    const findings: RequiredParamFinding[] = [];
    let filesAnalyzed = 0;

    for (const sourceFile of sourceFiles) {
      if (this.shouldExclude(sourceFile.getFilePath())) {
        continue;
      }
      findings.push(...this.analyzeSourceFile(sourceFile));
      filesAnalyzed++;
    }

    findings.sort((a, b) => {
      if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
      return a.offset - b.offset;
    });

    return this.createResult(findings, filesAnalyzed);
  }

  /**
   * Analyze a single source file
   */
  analyzeSourceFile(sourceFile: SourceFile): RequiredParamFinding[] {
    const filePath = sourceFile.getFilePath();
    const tree: SyntaxTree<Decorator> = this.builder.build(sourceFile);
    this.functionsAnalyzed += countFunctions(tree.functions);

    const findings: RequiredParamFinding[] = [];
    const sink: ReportSink<Decorator> = {
      report: (position, parameter, fn) => {
        findings.push({
          filePath,
          line: position.line,
          column: position.column,
          offset: position.offset,
          rule: REQUIRED_NAMED_PARAM_RULE.name,
          message: formatFindingMessage(parameter.name),
          parameterName: parameter.name,
          functionDisplayName: fn.name ?? '<anonymous>',
          functionKind: fn.kind
        });
      }
    };

    analyze(tree, sink, this.resolver);
    this.logger.debug(`${filePath}: ${findings.length} finding(s)`);
    return findings;
  }

  /**
   * Check if path should be excluded
   */
  private shouldExclude(filePath: string): boolean {
    return this.config.exclude.some(pattern => minimatch(filePath, pattern, { dot: true }));
  }

  private createResult(findings: RequiredParamFinding[], filesAnalyzed: number): RequiredParamCheckResult {
    const summary: RequiredParamSummary = {
      total: findings.length,
      filesAnalyzed,
      functionsAnalyzed: this.functionsAnalyzed,
      filesWithFindings: new Set(findings.map(f => f.filePath)).size
    };

    return {
      findings,
      summary,
      config: this.config,
      timestamp: new Date().toISOString(),
      version: REQUIRED_NAMED_PARAM_RULE.version
    };
  }
}
