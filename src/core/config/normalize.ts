/**
 * Turn the raw YAML shape into the config the rest of binpick reads.
 */
import { aliasKey, canonicalArch, canonicalOs } from '../detect/rules.js';
import type { LibcPreference, PlatformPreferences, PreferenceSettings, Preferences } from '../detect/types.js';
import type { RawAssetPatterns, RawToolConfig } from './schema.js';
import type { AssetPatterns, ToolConfig } from './types.js';

export interface Normalized<T> {
  value: T;
  issues: string[];
}

function ensureList(value: string | string[] | undefined, fallback: string[] = []): string[] {
  if (value === undefined) return fallback;
  return Array.isArray(value) ? value : [value];
}

/**
 * Expand asset patterns to `{ platform: { arch: pattern | null } }` over the
 * configured platforms. Entries for platforms or arches that are not
 * configured are reported and skipped.
 */
export function normalizeAssetPatterns(
  toolName: string,
  patterns: RawAssetPatterns | null | undefined,
  platforms: Record<string, string[]>
): Normalized<AssetPatterns> {
  const normalized: AssetPatterns = {};
  for (const [platform, arches] of Object.entries(platforms)) {
    normalized[platform] = Object.fromEntries(arches.map((arch) => [arch, null]));
  }
  const issues: string[] = [];

  if (!patterns) return { value: normalized, issues };

  if (typeof patterns === 'string') {
    for (const byArch of Object.values(normalized)) {
      for (const arch of Object.keys(byArch)) byArch[arch] = patterns;
    }
    return { value: normalized, issues };
  }

  for (const [platform, value] of Object.entries(patterns)) {
    const byArch = normalized[platform];
    if (!byArch) {
      issues.push(`Tool ${toolName}: 'asset_patterns' uses unknown platform '${platform}'`);
      continue;
    }
    if (value === null || typeof value === 'string') {
      for (const arch of Object.keys(byArch)) byArch[arch] = value;
      continue;
    }
    for (const [arch, pattern] of Object.entries(value)) {
      if (!(arch in byArch)) {
        issues.push(`Tool ${toolName}: 'asset_patterns' uses unknown arch '${arch}'`);
        continue;
      }
      byArch[arch] = pattern;
    }
  }
  return { value: normalized, issues };
}

type MutablePlatformPreferences = PreferenceSettings & {
  [arch: string]: PreferenceSettings | LibcPreference | boolean | undefined;
};

function mergePlatform(base: PlatformPreferences | undefined, override: PlatformPreferences): PlatformPreferences {
  const merged: MutablePlatformPreferences = {};
  if (base) {
    for (const [key, value] of Object.entries(base)) merged[key] = value;
  }
  for (const [key, value] of Object.entries(override)) {
    if (typeof value !== 'object') {
      merged[key] = value;
      continue;
    }
    const archKey = aliasKey(Object.keys(merged), key, canonicalArch) ?? key;
    const current = merged[archKey];
    merged[archKey] = typeof current === 'object' ? { ...current, ...value } : value;
  }
  return merged;
}

/**
 * Tool settings win over global ones field by field, per arch entry too.
 * Platform and arch keys written as aliases merge into the global entry.
 */
export function mergePreferences(global: Preferences, tool: Preferences | undefined): Preferences {
  if (!tool) return global;
  const merged: Record<string, PlatformPreferences> = { ...global };
  for (const [platform, prefs] of Object.entries(tool)) {
    const key = aliasKey(Object.keys(merged), platform, canonicalOs) ?? platform;
    merged[key] = mergePlatform(merged[key], prefs);
  }
  return merged;
}

export function buildToolConfig(
  name: string,
  raw: string | RawToolConfig,
  platforms: Record<string, string[]>,
  globalPreferences: Preferences = {}
): Normalized<ToolConfig> {
  const data: RawToolConfig = typeof raw === 'string'
    ? { repo: raw, platform_map: {}, arch_map: {} }
    : raw;
  const { value: assetPatterns, issues } = normalizeAssetPatterns(name, data.asset_patterns, platforms);

  const tool: ToolConfig = {
    name,
    repo: data.repo,
    binaryName: ensureList(data.binary_name, [name]),
    binaryPath: ensureList(data.binary_path),
    extractBinary: data.extract_binary ?? null,
    assetPatterns,
    platformMap: data.platform_map,
    archMap: data.arch_map,
    preferences: mergePreferences(globalPreferences, data.preferences),
  };

  if (tool.binaryPath.length > 0 && tool.binaryName.length !== tool.binaryPath.length) {
    issues.push(
      `Tool ${name}: 'binary_name' and 'binary_path' must have the same length if both are specified as lists`
    );
  }
  return { value: tool, issues };
}

/**
 * Problems with the configured targets: names the rule tables do not know.
 */
export function validatePlatforms(platforms: Record<string, string[]>): string[] {
  const issues: string[] = [];
  for (const [platform, arches] of Object.entries(platforms)) {
    if (canonicalOs(platform) === undefined) {
      issues.push(`Unknown platform '${platform}'`);
    }
    for (const arch of arches) {
      if (canonicalArch(arch) === undefined) {
        issues.push(`Unknown architecture '${arch}' for platform '${platform}'`);
      }
    }
  }
  return issues;
}
