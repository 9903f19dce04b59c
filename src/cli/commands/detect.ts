/**
 * Detect command - classify a list of asset names for one target.
 */
import { Command, Option } from 'commander';
import { createDetector, resolvePreferences } from '../../core/detect/factory.js';
import { resolveAmbiguity } from '../../core/assets/select.js';
import { formatDetectHuman, formatDetectJson } from '../formatters/detect.js';
import { collect, preferencesFromFlags, resolveTarget } from '../options.js';
import { logger } from '../../utils/logger.js';

interface DetectOptions {
  platform?: string;
  arch?: string;
  libc?: string;
  preferAppimage?: boolean;
  asset: string[];
  exclude: string[];
  pick?: boolean;
  json?: boolean;
}

/** Exit status when no single asset was chosen. */
export const EXIT_UNRESOLVED = 2;

/**
 * Create the detect command.
 */
export function createDetectCommand(): Command {
  return new Command('detect')
    .description('Pick the asset matching a platform and architecture from a list of asset names')
    .argument('<assets...>', 'Asset file names, as published on the release')
    .option('-p, --platform <platform>', 'Target platform (default: this machine)')
    .option('-a, --arch <arch>', 'Target architecture (default: this machine)')
    .addOption(new Option('--libc <libc>', 'Preferred libc for Linux assets').choices(['glibc', 'musl']))
    .option('--prefer-appimage', 'Prefer AppImage files on Linux')
    .option('--no-prefer-appimage', 'Rank AppImage files last on Linux')
    .option('--asset <substring>', 'Only consider assets containing this text (repeatable)', collect, [])
    .option('--exclude <substring>', 'Skip assets containing this text (repeatable)', collect, [])
    .option('--pick', 'Settle platform+arch ties by taking the first candidate in sorted order')
    .option('--json', 'Output as JSON')
    .action((assets: string[], options: DetectOptions) => {
      try {
        runDetect(assets, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export function runDetect(assets: string[], options: DetectOptions): void {
  const target = resolveTarget(options.platform, options.arch);
  const preferences = preferencesFromFlags(target.platform, options.libc, options.preferAppimage);
  const detector = createDetector(target.platform, target.arch, preferences, {
    assets: options.asset,
    exclude: options.exclude,
  });

  const result = detector.detect(assets);
  const picked =
    options.pick && result.kind !== 'resolved'
      ? resolveAmbiguity(result, resolvePreferences(preferences, target.platform, target.arch))
      : null;

  console.log(
    options.json
      ? formatDetectJson(result, target, picked)
      : formatDetectHuman(result, target, picked)
  );
  if (result.kind !== 'resolved' && !picked) {
    process.exitCode = EXIT_UNRESOLVED;
  }
}
