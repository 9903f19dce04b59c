/**
 * Release analysis: group assets by detected target and suggest a tool entry.
 */
import { ARCH_RULE_LIST, OS_RULE_LIST, matchArch, matchOs } from '../detect/rules.js';
import { createDetector } from '../detect/factory.js';
import { resolveAmbiguity } from '../assets/select.js';
import { releaseVersion, type Release } from '../github/types.js';

export interface SuggestedToolConfig {
  repo: string;
  binary_name: string;
  arch_map?: Record<string, string>;
  asset_patterns?: Record<string, string>;
}

export interface ReleaseAnalysis {
  repo: string;
  tag: string;
  /** Asset names per OS rule, rules without assets omitted. */
  platforms: Record<string, string[]>;
  /** Asset names per arch rule, rules without assets omitted. */
  arches: Record<string, string[]>;
  suggestion: SuggestedToolConfig;
}

// Platforms a suggested entry gets explicit patterns for.
const PATTERN_PLATFORMS = ['linux', 'macos'] as const;

function escapePatternText(text: string): string {
  return text.replace(/[*+?^$()|[\]\\]/g, '\\$&');
}

function groupBy<R extends { name: string }>(
  names: readonly string[],
  rules: readonly R[],
  test: (rule: R, name: string) => boolean
): Record<string, string[]> {
  const groups: Record<string, string[]> = {};
  for (const rule of rules) {
    const matching = names.filter((name) => test(rule, name));
    if (matching.length > 0) groups[rule.name] = matching;
  }
  return groups;
}

/**
 * Turn a concrete asset name into a pattern: the version becomes `{version}`
 * and the first architecture spelling found becomes `{arch}`.
 */
export function templatizeAssetName(name: string, version: string, archSpelling?: string): string {
  const placeholders: Array<[string, string]> = [];
  if (version) placeholders.push([version, '{version}']);
  if (archSpelling) placeholders.push([archSpelling, '{arch}']);

  let parts = [name];
  for (const [literal, placeholder] of placeholders) {
    parts = parts.flatMap((part) => {
      if (part.startsWith('{') && part.endsWith('}')) return [part];
      const pieces = part.split(literal);
      return pieces.flatMap((piece, i) => (i === 0 ? [piece] : [placeholder, piece]));
    });
  }
  return parts
    .map((part) => (part.startsWith('{') && part.endsWith('}') ? part : escapePatternText(part)))
    .join('');
}

export function analyzeRelease(repo: string, release: Release, toolName?: string): ReleaseAnalysis {
  const names = release.assets.map((a) => a.name);
  const version = releaseVersion(release);
  const name = toolName ?? repo.split('/').pop() ?? repo;

  const suggestion: SuggestedToolConfig = { repo, binary_name: name };

  const archMap: Record<string, string> = {};
  if (names.some((n) => n.includes('x86_64'))) archMap.amd64 = 'x86_64';
  if (names.some((n) => n.includes('aarch64'))) archMap.arm64 = 'aarch64';
  if (Object.keys(archMap).length > 0) suggestion.arch_map = archMap;

  // {arch} is filled through arch_map
  const spelling = archMap.amd64 ?? 'amd64';
  const patterns: Record<string, string> = {};
  for (const platform of PATTERN_PLATFORMS) {
    const picked = resolveAmbiguity(createDetector(platform, 'amd64').detect(names));
    if (!picked || !picked.asset.includes(spelling)) continue;
    patterns[platform] = templatizeAssetName(picked.asset, version, spelling);
  }
  if (Object.keys(patterns).length === PATTERN_PLATFORMS.length) {
    suggestion.asset_patterns = patterns;
  }

  return {
    repo,
    tag: release.tag_name,
    platforms: groupBy(names, OS_RULE_LIST, (rule, n) => matchOs(rule, n).isMatch),
    arches: groupBy(names, ARCH_RULE_LIST, matchArch),
    suggestion,
  };
}
