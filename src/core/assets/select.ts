/**
 * Pick the release asset for a tool and target.
 */
import { createDetector, resolvePreferences, type CreateDetectorOptions } from '../detect/factory.js';
import { isAppImage } from '../detect/prioritize.js';
import type { DetectResult, Preferences, TargetPreferences } from '../detect/types.js';
import type { ToolConfig } from '../config/types.js';
import { releaseVersion, type Release, type ReleaseAsset } from '../github/types.js';
import { buildAssetPattern, compileAssetPattern, findMatchingAsset } from './pattern.js';
import { logger } from '../../utils/logger.js';

export type SelectionMethod = 'pattern' | 'auto';

export interface AssetSelection<T extends { name: string } = ReleaseAsset> {
  asset: T;
  method: SelectionMethod;
  /** Set when an ambiguity was settled by policy rather than by the rules. */
  note?: string;
}

export interface AmbiguityResolution {
  asset: string;
  note?: string;
}

/**
 * Standard recovery for a detection result.
 *
 * Ties at the platform+arch tiers (`... matches found`) fall back to the first
 * candidate in sorted order, skipping refused AppImages while anything else
 * is left. Anything else is left for the user to settle.
 */
export function resolveAmbiguity(result: DetectResult, prefs: TargetPreferences = {}): AmbiguityResolution | null {
  if (result.kind === 'resolved') {
    return { asset: result.asset };
  }
  if (result.kind === 'ambiguous' && result.reason.endsWith('matches found')) {
    const accepted =
      prefs.preferAppImage === false ? result.candidates.filter((c) => !isAppImage(c)) : result.candidates;
    const [first] = [...(accepted.length > 0 ? accepted : result.candidates)].sort();
    return { asset: first, note: `${result.reason}, selected ${first}` };
  }
  return null;
}

/**
 * Run the classifier over release assets and apply the recovery policy.
 * @throws UnsupportedTargetError
 */
export function autoDetectAsset<T extends { name: string }>(
  assets: readonly T[],
  platform: string,
  arch: string,
  preferences?: Preferences,
  options?: CreateDetectorOptions
): AssetSelection<T> | null {
  logger.info(`Auto-detecting asset for ${platform}/${arch}`);
  const detector = createDetector(platform, arch, preferences, options);
  const names = assets.map((a) => a.name);
  const result = detector.detect(names);
  const resolution = resolveAmbiguity(result, resolvePreferences(preferences, platform, arch));

  if (result.kind !== 'resolved') {
    if (!resolution) {
      if (result.candidates.length > 0) {
        logger.info(`Found multiple candidates, select one manually: ${result.candidates.join(', ')}`);
      }
      logger.error(`Error detecting asset: ${result.reason}`);
      return null;
    }
    logger.info(`Found multiple candidates, selecting ${resolution.asset}`);
    logger.debug('Candidates', { candidates: result.candidates });
  }
  if (!resolution) return null;

  const asset = assets[names.indexOf(resolution.asset)];
  logger.success(`Found asset: ${asset.name}`);
  return resolution.note === undefined
    ? { asset, method: 'auto' }
    : { asset, method: 'auto', note: resolution.note };
}

/**
 * Pick the asset for one tool and target: the tool's pattern when it has one
 * for this target, auto-detection otherwise.
 */
export function selectAsset(
  tool: ToolConfig,
  release: Release,
  platform: string,
  arch: string
): AssetSelection | null {
  const pattern = tool.assetPatterns[platform]?.[arch] ?? null;
  if (pattern === null) {
    return autoDetectAsset(release.assets, platform, arch, tool.preferences);
  }

  const regex = compileAssetPattern(
    buildAssetPattern(pattern, {
      version: releaseVersion(release),
      platform: tool.platformMap[platform] ?? platform,
      arch: tool.archMap[arch] ?? arch,
    })
  );
  logger.info(`Looking for asset with pattern: ${regex.source}`);
  const asset = findMatchingAsset(regex, release.assets);
  if (!asset) {
    logger.warn(`No asset matching '${regex.source}' found for ${tool.name}`);
    return null;
  }
  logger.success(`Found matching asset: ${asset.name}`);
  return { asset, method: 'pattern' };
}
