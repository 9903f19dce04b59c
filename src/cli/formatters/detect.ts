/**
 * Output for the detect command.
 */
import chalk from 'chalk';
import { toDetectTuple, type DetectResult } from '../../core/detect/types.js';
import type { Target } from '../../core/platform/current.js';
import type { AmbiguityResolution } from '../../core/assets/select.js';

export function formatDetectHuman(
  result: DetectResult,
  target: Target,
  picked?: AmbiguityResolution | null
): string {
  const label = chalk.bold(`${target.platform}/${target.arch}`);
  if (result.kind === 'resolved') {
    return `${chalk.green('✓')} ${label}: ${result.asset}`;
  }

  const lines: string[] = [];
  const marker = result.kind === 'ambiguous' ? chalk.yellow('?') : chalk.red('✗');
  lines.push(`${marker} ${label}: ${result.reason}`);
  for (const candidate of result.candidates) {
    lines.push(`  - ${candidate}`);
  }
  if (picked) {
    lines.push(`${chalk.cyan('→')} selected ${picked.asset}`);
  }
  return lines.join('\n');
}

export function formatDetectJson(
  result: DetectResult,
  target: Target,
  picked?: AmbiguityResolution | null
): string {
  const [chosen, candidates, error] = toDetectTuple(result);
  return JSON.stringify(
    {
      platform: target.platform,
      arch: target.arch,
      status: result.kind,
      chosen: picked ? picked.asset : chosen,
      candidates,
      error,
    },
    null,
    2
  );
}
