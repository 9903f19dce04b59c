/**
 * Explicit asset patterns with `{version}`, `{platform}` and `{arch}` placeholders.
 */
import { DetectionError, ErrorCodes } from '../../utils/errors.js';

export interface PatternValues {
  version?: string;
  platform?: string;
  arch?: string;
}

const PLACEHOLDER = /\{(version|platform|arch)\}/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Fill the placeholders of a pattern. Values are inserted literally and
 * placeholders without a value become `.*`. The rest of the pattern is a
 * regular expression as written, so quantifiers like `\d{2}` are left alone.
 */
export function buildAssetPattern(pattern: string, values: PatternValues): string {
  return pattern.replace(PLACEHOLDER, (_placeholder: string, key: keyof PatternValues) => {
    const value = values[key];
    return value === undefined ? '.*' : escapeRegExp(value);
  });
}

/**
 * Compile a filled-in pattern.
 * @throws DetectionError when it is not a valid regular expression
 */
export function compileAssetPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new DetectionError(
      ErrorCodes.INVALID_PATTERN,
      `Invalid asset pattern '${pattern}': ${error instanceof Error ? error.message : 'Unknown error'}`,
      { pattern }
    );
  }
}

/**
 * First asset whose name the pattern finds a match in.
 */
export function findMatchingAsset<T extends { name: string }>(pattern: RegExp, assets: readonly T[]): T | null {
  return assets.find((asset) => pattern.test(asset.name)) ?? null;
}
