/**
 * Targets command - list supported platforms and architectures.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { ARCH_ALIASES, ARCH_RULE_LIST, OS_ALIASES, OS_RULE_LIST } from '../../core/detect/rules.js';

interface TargetsOptions {
  json?: boolean;
}

interface TargetEntry {
  name: string;
  aliases: string[];
  pattern: string;
}

function entries(
  rules: readonly { name: string; match: RegExp }[],
  aliases: Readonly<Record<string, string>>
): TargetEntry[] {
  return rules.map((rule) => ({
    name: rule.name,
    aliases: Object.keys(aliases).filter((alias) => aliases[alias] === rule.name),
    pattern: rule.match.source,
  }));
}

export function listTargets(): { platforms: TargetEntry[]; arches: TargetEntry[] } {
  return {
    platforms: entries(OS_RULE_LIST, OS_ALIASES),
    arches: entries(ARCH_RULE_LIST, ARCH_ALIASES),
  };
}

function formatSection(title: string, items: TargetEntry[]): string[] {
  const lines = [chalk.bold(title)];
  for (const item of items) {
    const aliases = item.aliases.length > 0 ? chalk.dim(` (alias: ${item.aliases.join(', ')})`) : '';
    lines.push(`  ${item.name}${aliases}`);
  }
  return lines;
}

/**
 * Create the targets command.
 */
export function createTargetsCommand(): Command {
  return new Command('targets')
    .description('List supported platforms and architectures')
    .option('--json', 'Output as JSON')
    .action((options: TargetsOptions) => {
      const targets = listTargets();
      if (options.json) {
        console.log(JSON.stringify(targets, null, 2));
        return;
      }
      console.log(
        [...formatSection('Platforms', targets.platforms), '', ...formatSection('Architectures', targets.arches)].join('\n')
      );
    });
}
