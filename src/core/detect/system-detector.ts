/**
 * Platform + architecture detector.
 *
 * Tiers, most specific first: priority matches, OS+arch matches, OS-only
 * matches, then every asset. The first tier holding anything decides.
 */
import { matchArch, matchOs, type ArchRule, type OsRule } from './rules.js';
import { preferredAsset, rankAssets } from './prioritize.js';
import {
  ambiguous,
  notFound,
  resolved,
  type AssetName,
  type DetectResult,
  type Detector,
  type TargetPreferences,
} from './types.js';

const CHECKSUM_SUFFIXES = ['.sha256', '.sha256sum'];

interface Tiers {
  priority: AssetName[];
  matches: AssetName[];
  candidates: AssetName[];
  all: AssetName[];
}

export class SystemDetector implements Detector {
  constructor(
    readonly os: OsRule,
    readonly arch: ArchRule,
    readonly preferences: TargetPreferences = {}
  ) {}

  detect(assets: readonly AssetName[]): DetectResult {
    const tiers = this.partition(assets);

    if (tiers.priority.length > 0) {
      return this.resolveTier(tiers.priority, 'priority matches found', true);
    }
    if (tiers.matches.length > 0) {
      return this.resolveTier(tiers.matches, 'matches found', true);
    }
    if (tiers.candidates.length > 0) {
      return this.resolveTier(tiers.candidates, 'candidates found (unsure architecture)', false);
    }
    if (tiers.all.length === 1) {
      return resolved(tiers.all[0]);
    }
    return notFound('no candidates found', tiers.all);
  }

  private partition(assets: readonly AssetName[]): Tiers {
    const tiers: Tiers = { priority: [], matches: [], candidates: [], all: [] };
    for (const asset of assets) {
      // checksums are verified elsewhere, never picked
      if (CHECKSUM_SUFFIXES.some((suffix) => asset.endsWith(suffix))) continue;

      const { isMatch, isPriority } = matchOs(this.os, asset);
      if (isPriority) tiers.priority.push(asset);
      if (isMatch && matchArch(this.arch, asset)) tiers.matches.push(asset);
      if (isMatch) tiers.candidates.push(asset);
      tiers.all.push(asset);
    }
    return tiers;
  }

  private resolveTier(tier: AssetName[], label: string, usePreferences: boolean): DetectResult {
    if (tier.length === 1) {
      return resolved(tier[0]);
    }
    const ranked = rankAssets(tier, this.os.name, this.preferences);
    if (ranked.length === 1) {
      return resolved(ranked[0].asset);
    }
    if (usePreferences) {
      const preferred = preferredAsset(ranked, this.preferences);
      if (preferred !== undefined) {
        return resolved(preferred);
      }
    }
    const prioritized = ranked.map((r) => r.asset);
    if (prioritized.length === 0) {
      // every entry was a sidecar file
      return ambiguous(tier, `${tier.length} ${label}`);
    }
    return ambiguous(prioritized, `${prioritized.length} ${label}`);
  }
}

/**
 * Build a detector for an OS and architecture rule pair.
 */
export function detectSystem(os: OsRule, arch: ArchRule, preferences?: TargetPreferences): Detector {
  return new SystemDetector(os, arch, preferences);
}
