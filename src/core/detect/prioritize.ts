/**
 * File-type ranking of asset names within a detection tier.
 *
 * Order, highest first:
 * 1. AppImages (Linux only, unless explicitly refused)
 * 2. Files with no extension
 * 3. Files carrying the preferred libc in their name
 * 4. Archives (.tar.gz, .zip, ...)
 * 5. Everything else
 * 6. Package formats (.deb, .rpm, ...)
 * 7. Refused AppImages
 * Checksums, signatures and other sidecars are dropped.
 */
import type { AssetName, LibcPreference, TargetPreferences } from './types.js';

export type AssetBucket =
  | 'appimage'
  | 'no-extension'
  | 'libc'
  | 'archive'
  | 'other'
  | 'package'
  | 'refused-appimage';

export const BUCKET_ORDER: readonly AssetBucket[] = [
  'appimage',
  'no-extension',
  'libc',
  'archive',
  'other',
  'package',
  'refused-appimage',
];

export const IGNORED_EXTENSIONS: readonly string[] = ['.sig', '.sha256', '.sha256sum', '.sbom', '.pem'];
export const ARCHIVE_EXTENSIONS: readonly string[] = [
  '.tar.gz', '.tgz', '.zip', '.tar.bz2', '.tbz2', '.tar.xz', '.txz', '.7z', '.tar',
];
export const PACKAGE_EXTENSIONS: readonly string[] = ['.deb', '.rpm', '.apk', '.pkg'];

const LIBC_TERMS: Record<LibcPreference, readonly string[]> = {
  glibc: ['gnu', 'glibc'],
  musl: ['musl'],
};

export interface RankedAsset {
  asset: AssetName;
  bucket: AssetBucket;
}

/** Final path segment of an asset name. */
export function basename(asset: string): string {
  const idx = Math.max(asset.lastIndexOf('/'), asset.lastIndexOf('\\'));
  return idx === -1 ? asset : asset.slice(idx + 1);
}

export function isAppImage(asset: string): boolean {
  return basename(asset).toLowerCase().endsWith('.appimage');
}

function endsWithAny(name: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => name.endsWith(ext));
}

export function hasLibc(asset: string, libc: LibcPreference): boolean {
  const lower = basename(asset).toLowerCase();
  return LIBC_TERMS[libc].some((term) => lower.includes(term));
}

function bucketOf(asset: string, targetOs: string, prefs: TargetPreferences): AssetBucket | undefined {
  const name = basename(asset);
  const lower = name.toLowerCase();

  if (endsWithAny(lower, IGNORED_EXTENSIONS)) return undefined;

  if (targetOs === 'linux' && isAppImage(asset)) {
    return prefs.preferAppImage === false ? 'refused-appimage' : 'appimage';
  }

  const dot = name.lastIndexOf('.');
  if (dot <= 0) return 'no-extension';

  const isPackage = endsWithAny(lower, PACKAGE_EXTENSIONS);
  if (prefs.libc && !isPackage && hasLibc(asset, prefs.libc)) return 'libc';
  if (endsWithAny(lower, ARCHIVE_EXTENSIONS)) return 'archive';
  if (isPackage) return 'package';
  return 'other';
}

/**
 * Rank assets by bucket. Sidecar files are left out; order inside a bucket
 * follows the input.
 */
export function rankAssets(
  assets: readonly AssetName[],
  targetOs: string,
  prefs: TargetPreferences = {}
): RankedAsset[] {
  const buckets = new Map<AssetBucket, AssetName[]>(BUCKET_ORDER.map((b) => [b, []]));
  for (const asset of assets) {
    const bucket = bucketOf(asset, targetOs, prefs);
    if (bucket) buckets.get(bucket)?.push(asset);
  }
  return BUCKET_ORDER.flatMap((bucket) =>
    (buckets.get(bucket) ?? []).map((asset) => ({ asset, bucket }))
  );
}

export function prioritizeAssets(
  assets: readonly AssetName[],
  targetOs: string,
  prefs: TargetPreferences = {}
): AssetName[] {
  return rankAssets(assets, targetOs, prefs).map((r) => r.asset);
}

/**
 * The asset a stated preference singles out, if any.
 *
 * Either the top non-empty bucket is an explicitly preferred AppImage or a
 * libc match and it is alone there, or AppImages were refused and exactly
 * one other asset is left.
 */
export function preferredAsset(ranked: readonly RankedAsset[], prefs: TargetPreferences): AssetName | undefined {
  if (ranked.length === 0) return undefined;

  const top = ranked[0].bucket;
  const wanted = (top === 'appimage' && prefs.preferAppImage === true) || (top === 'libc' && prefs.libc !== undefined);
  if (wanted) {
    const inTop = ranked.filter((r) => r.bucket === top);
    if (inTop.length === 1) return inTop[0].asset;
  }

  if (prefs.preferAppImage === false) {
    const accepted = ranked.filter((r) => r.bucket !== 'refused-appimage');
    if (accepted.length === 1 && accepted.length < ranked.length) return accepted[0].asset;
  }
  return undefined;
}
