/**
 * Analyze command - inspect a repository's latest release and suggest a tool entry.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { GitHubClient } from '../../core/github/client.js';
import { analyzeRelease, type ReleaseAnalysis } from '../../core/analyze/analyze.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';

interface AnalyzeOptions {
  name?: string;
  json?: boolean;
}

function formatGroups(title: string, groups: Record<string, string[]>): string[] {
  const lines = [chalk.blue(title)];
  for (const [key, names] of Object.entries(groups)) {
    lines.push(`  ${chalk.bold(key)}`);
    for (const name of names) lines.push(`    - ${name}`);
  }
  return lines;
}

export function formatAnalysis(analysis: ReleaseAnalysis): string {
  const toolName = analysis.suggestion.binary_name;
  return [
    chalk.green(`Latest release: ${analysis.tag}`),
    '',
    ...formatGroups('Assets by platform:', analysis.platforms),
    '',
    ...formatGroups('Assets by architecture:', analysis.arches),
    '',
    chalk.blue('Suggested configuration:'),
    stringifyYaml({ tools: { [toolName]: analysis.suggestion } }).trimEnd(),
  ].join('\n');
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze the latest release of a GitHub repository')
    .argument('<repo>', 'Repository as owner/repo')
    .option('-n, --name <name>', 'Tool name (default: repository name)')
    .option('--json', 'Output as JSON')
    .action(async (repo: string, options: AnalyzeOptions) => {
      try {
        const release = await new GitHubClient().getLatestRelease(repo);
        const analysis = analyzeRelease(repo, release, options.name);
        console.log(options.json ? JSON.stringify(analysis, null, 2) : formatAnalysis(analysis));
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
