/**
 * Resolve command - pick the release asset of configured tools for each target.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, selectTools } from '../../core/config/loader.js';
import type { Config, ToolConfig } from '../../core/config/types.js';
import { GitHubClient } from '../../core/github/client.js';
import type { Release } from '../../core/github/types.js';
import { selectAsset } from '../../core/assets/select.js';
import { currentPlatform, type Target } from '../../core/platform/current.js';
import { logger } from '../../utils/logger.js';
import { BinpickError, errorMessage } from '../../utils/errors.js';

interface ResolveOptions {
  config?: string;
  platform?: string;
  arch?: string;
  current?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export interface ResolvedRow {
  tool: string;
  platform: string;
  arch: string;
  version: string | null;
  asset: string | null;
  url: string | null;
  method: 'pattern' | 'auto' | null;
  note?: string;
  error?: string;
}

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Resolve the release asset of configured tools for each target')
    .argument('[tools...]', 'Tools to resolve (default: all configured tools)')
    .option('-c, --config <path>', 'Path to config file')
    .option('-p, --platform <platform>', 'Only this platform')
    .option('-a, --arch <arch>', 'Only this architecture')
    .option('--current', 'Only the platform and architecture of this machine')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show detection details')
    .action(async (tools: string[], options: ResolveOptions) => {
      try {
        await runResolve(tools, options);
      } catch (error) {
        reportFailure(error, options);
        process.exit(1);
      }
    });
}

/**
 * Report an error that stopped the run. `--json` silences the logger, so the
 * error goes to stderr as JSON there.
 */
export function reportFailure(error: unknown, options: Pick<ResolveOptions, 'json'>): void {
  if (options.json) {
    const detail = error instanceof BinpickError ? error.toJSON() : { message: errorMessage(error) };
    console.error(JSON.stringify({ error: detail }, null, 2));
    return;
  }
  logger.error(errorMessage(error));
}

/**
 * Targets to resolve, after applying the platform/arch filters.
 */
export function targetsToResolve(
  platforms: Config['platforms'],
  options: Pick<ResolveOptions, 'platform' | 'arch' | 'current'>
): Target[] {
  if (options.current) {
    return [currentPlatform()];
  }
  const targets: Target[] = [];
  for (const [platform, arches] of Object.entries(platforms)) {
    if (options.platform && platform !== options.platform) continue;
    for (const arch of arches) {
      if (options.arch && arch !== options.arch) continue;
      targets.push({ platform, arch });
    }
  }
  if (targets.length === 0 && options.platform && options.arch) {
    targets.push({ platform: options.platform, arch: options.arch });
  }
  return targets;
}

/** Where releases come from; a GitHubClient in practice. */
export type ReleaseSource = Pick<GitHubClient, 'getLatestRelease'>;

export async function resolveTool(
  client: ReleaseSource,
  tool: ToolConfig,
  targets: readonly Target[]
): Promise<ResolvedRow[]> {
  const log = logger.child(tool.name);
  let release: Release;
  try {
    release = await client.getLatestRelease(tool.repo);
  } catch (error) {
    log.error(errorMessage(error));
    return targets.map(({ platform, arch }) => ({
      tool: tool.name, platform, arch, version: null, asset: null, url: null, method: null,
      error: errorMessage(error),
    }));
  }

  const version = release.tag_name;
  return targets.map(({ platform, arch }) => {
    try {
      const selection = selectAsset(tool, release, platform, arch);
      if (!selection) {
        return { tool: tool.name, platform, arch, version, asset: null, url: null, method: null, error: 'no asset selected' };
      }
      const row: ResolvedRow = {
        tool: tool.name,
        platform,
        arch,
        version,
        asset: selection.asset.name,
        url: selection.asset.browser_download_url,
        method: selection.method,
      };
      if (selection.note) row.note = selection.note;
      return row;
    } catch (error) {
      log.error(errorMessage(error));
      return { tool: tool.name, platform, arch, version, asset: null, url: null, method: null, error: errorMessage(error) };
    }
  });
}

export function formatResolveHuman(rows: readonly ResolvedRow[]): string {
  return rows
    .map((row) => {
      const label = `${chalk.bold(row.tool)} ${chalk.dim(`${row.platform}/${row.arch}`)}`;
      if (!row.asset) {
        return `${chalk.red('✗')} ${label}: ${row.error ?? 'no asset selected'}`;
      }
      const suffix = row.note ? chalk.yellow(` (${row.note})`) : '';
      return `${chalk.green('✓')} ${label}: ${row.asset} ${chalk.dim(`[${row.method}]`)}${suffix}`;
    })
    .join('\n');
}

export async function runResolve(names: string[], options: ResolveOptions): Promise<void> {
  if (options.verbose) logger.setLevel('debug');
  else if (options.json) logger.setLevel('silent');
  else logger.setLevel('warn');

  const config = await loadConfig(options.config);
  const tools = selectTools(config, names);
  if (tools.length === 0) {
    logger.warn('No tools configured.');
    return;
  }

  const targets = targetsToResolve(config.platforms, options);
  const client = new GitHubClient();
  const rows = (await Promise.all(tools.map((tool) => resolveTool(client, tool, targets)))).flat();

  console.log(options.json ? JSON.stringify(rows, null, 2) : formatResolveHuman(rows));
  if (rows.some((row) => !row.asset)) {
    process.exitCode = 1;
  }
}
