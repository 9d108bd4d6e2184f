/**
 * Explain Command
 *
 * Prints the rule's description and examples
 */

import chalk from 'chalk';
import type { VoidCommand } from '../../types/command';
import type { CommandEnvironment } from '../../types/environment';
import { REQUIRED_NAMED_PARAM_RULE, type RuleMetadata } from '../../analyzers/required-named-param-rule';

export function formatRuleExplanation(rule: RuleMetadata): string {
  return [
    `${chalk.bold(rule.name)} ${chalk.gray(`(${rule.group}, v${rule.version})`)}`,
    rule.description,
    '',
    rule.details
  ].join('\n');
}

export const explainCommand: VoidCommand<{ json?: boolean }> = (options) =>
  async (env: CommandEnvironment): Promise<void> => {
    if (options.json) {
      console.log(JSON.stringify(REQUIRED_NAMED_PARAM_RULE, null, 2));
      return;
    }
    env.commandLogger.log(formatRuleExplanation(REQUIRED_NAMED_PARAM_RULE));
  };
