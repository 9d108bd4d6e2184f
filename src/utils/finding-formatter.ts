/**
 * Required Parameter Finding Formatter
 *
 * Formats check results for terminal or JSON output
 */

import chalk from 'chalk';
import { table } from 'table';
import * as path from 'path';
import type { RequiredParamCheckResult, RequiredParamFinding } from '../types/required-params';

export interface FormatOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Print at most this many findings */
  maxFindings?: number;
  /** Base directory for displayed paths */
  cwd?: string;
}

export class FindingFormatter {
  /**
   * Format results based on output options
   */
  static format(result: RequiredParamCheckResult, options: FormatOptions = {}): string {
    if (options.json) {
      return JSON.stringify(result, null, 2);
    }

    if (options.quiet) {
      return this.formatQuiet(result);
    }

    return this.formatReport(result, options);
  }

  /**
   * Single-line summary
   */
  static formatQuiet(result: RequiredParamCheckResult): string {
    const { summary } = result;
    return `Findings: ${summary.total}, Files: ${summary.filesAnalyzed}, Functions: ${summary.functionsAnalyzed}`;
  }

  /**
   * `file:line:column  message  [rule]`
   */
  static formatFindingLine(finding: RequiredParamFinding, cwd: string = process.cwd()): string {
    const location = `${this.formatPath(finding.filePath, cwd)}:${finding.line}:${finding.column}`;
    return `  ${location}  ${finding.message}  ${chalk.gray(`[${finding.rule}]`)}`;
  }

  private static formatReport(result: RequiredParamCheckResult, options: FormatOptions): string {
    const cwd = options.cwd ?? process.cwd();
    const output: string[] = [];

    output.push(chalk.bold('\nRequired Named Parameter Report'));
    output.push('='.repeat(60));

    const shown = options.maxFindings !== undefined
      ? result.findings.slice(0, options.maxFindings)
      : result.findings;

    if (shown.length > 0) {
      output.push('');
      output.push(options.verbose
        ? this.formatFindingsTable(shown, cwd)
        : shown.map(f => this.formatFindingLine(f, cwd)).join('\n'));
    }

    const hidden = result.findings.length - shown.length;
    if (hidden > 0) {
      output.push(chalk.gray(`  ... and ${hidden} more`));
    }

    output.push('\n' + chalk.bold('Summary:'));
    output.push(this.formatSummary(result));

    return output.join('\n');
  }

  private static formatFindingsTable(findings: RequiredParamFinding[], cwd: string): string {
    const headers = ['File', 'Line', 'Function', 'Parameter'];
    const rows = findings.map(f => [
      this.formatPath(f.filePath, cwd),
      `${f.line}:${f.column}`,
      f.functionDisplayName,
      f.parameterName
    ]);

    const tableConfig = {
      columns: {
        0: { width: 40 },
        1: { width: 9, alignment: 'right' as const },
        2: { width: 30 },
        3: { width: 20 }
      }
    };

    return table([headers, ...rows], tableConfig);
  }

  private static formatSummary(result: RequiredParamCheckResult): string {
    const { summary } = result;
    const total = summary.total > 0 ? chalk.red(String(summary.total)) : chalk.green('0');
    return [
      `  Findings: ${total}`,
      `  Files with findings: ${summary.filesWithFindings}`,
      `  Files analyzed: ${summary.filesAnalyzed}`,
      `  Functions analyzed: ${summary.functionsAnalyzed}`
    ].join('\n');
  }

  static formatPath(filePath: string, cwd: string): string {
    const relative = path.relative(cwd, filePath);
    return relative.startsWith('..') ? filePath : relative;
  }
}
