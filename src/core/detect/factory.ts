/**
 * Preference-aware detector construction.
 */
import { aliasKey, canonicalArch, canonicalOs, resolveArchRule, resolveOsRule, withoutPriority } from './rules.js';
import { SystemDetector } from './system-detector.js';
import { detectSingleAsset } from './single-asset.js';
import { chainDetectors } from './chain.js';
import type { Detector, PlatformPreferences, PreferenceSettings, Preferences, TargetPreferences } from './types.js';

export interface CreateDetectorOptions {
  /** Substrings an asset name must contain, applied in order before OS/arch matching. */
  assets?: readonly string[];
  /** Substrings an asset name must not contain. */
  exclude?: readonly string[];
}

function archEntry(platform: PlatformPreferences, arch: string): PreferenceSettings | undefined {
  if (!Object.prototype.hasOwnProperty.call(platform, arch)) return undefined;
  const entry = platform[arch];
  return typeof entry === 'object' ? entry : undefined;
}

/**
 * Collapse platform-wide and per-arch preferences into the settings for one
 * target. Keys may be given by name or alias (`macos` serves `darwin`); a key
 * spelled as asked for wins over an alias.
 */
export function resolvePreferences(
  preferences: Preferences | undefined,
  osName: string,
  archName: string
): TargetPreferences {
  if (!preferences) return {};

  const platformKey = aliasKey(Object.keys(preferences), osName, canonicalOs);
  const platform = platformKey === undefined ? undefined : preferences[platformKey];
  if (!platform) return {};

  const archKey = aliasKey(Object.keys(platform), archName, canonicalArch);
  const arch = archKey === undefined ? undefined : archEntry(platform, archKey);
  const libc = arch?.libc ?? platform.libc;
  const preferAppImage = arch?.prefer_appimage ?? platform.prefer_appimage;

  const resolved: TargetPreferences = {};
  if (libc !== undefined) resolved.libc = libc;
  if (preferAppImage !== undefined) resolved.preferAppImage = preferAppImage;
  return resolved;
}

/**
 * Build the detector for a platform/arch target.
 *
 * Refusing AppImages also drops the Linux AppImage priority rule, otherwise
 * the refused file would still win its tier.
 *
 * @throws UnsupportedTargetError when the platform or architecture is unknown
 */
export function createDetector(
  osName: string,
  archName: string,
  preferences?: Preferences,
  options: CreateDetectorOptions = {}
): Detector {
  const osRule = resolveOsRule(osName);
  const archRule = resolveArchRule(archName);
  const prefs = resolvePreferences(preferences, osName, archName);

  const system = new SystemDetector(
    prefs.preferAppImage === false ? withoutPriority(osRule) : osRule,
    archRule,
    prefs
  );

  const preFilters = [
    ...(options.assets ?? []).map((asset) => detectSingleAsset(asset)),
    ...(options.exclude ?? []).map((asset) => detectSingleAsset(asset, { anti: true })),
  ];
  return preFilters.length > 0 ? chainDetectors(preFilters, system) : system;
}
