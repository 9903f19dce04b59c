/**
 * Shared types for asset detection.
 */

/** A bare release asset filename. */
export type AssetName = string;

/** Detection outcome. Ambiguity and misses are reportable results, not exceptions. */
export type DetectResult =
  | { kind: 'resolved'; asset: AssetName }
  | { kind: 'ambiguous'; candidates: AssetName[]; reason: string }
  | { kind: 'not-found'; candidates: AssetName[]; reason: string };

/**
 * Anything that narrows a list of asset names down to one.
 */
export interface Detector {
  detect(assets: readonly AssetName[]): DetectResult;
}

export type LibcPreference = 'glibc' | 'musl';

/** Preferences for one resolved platform/arch target. */
export interface TargetPreferences {
  libc?: LibcPreference;
  preferAppImage?: boolean;
}

export function resolved(asset: AssetName): DetectResult {
  return { kind: 'resolved', asset };
}

export function ambiguous(candidates: AssetName[], reason: string): DetectResult {
  return { kind: 'ambiguous', candidates, reason };
}

export function notFound(reason: string, candidates: AssetName[] = []): DetectResult {
  return { kind: 'not-found', candidates, reason };
}

/** Candidates carried by a result, empty when it resolved. */
export function candidatesOf(result: DetectResult): AssetName[] {
  return result.kind === 'resolved' ? [] : result.candidates;
}

/**
 * Flatten a result into the `(chosen, candidates, error)` triple.
 * Resolved results carry no candidates or error; the others an empty choice.
 */
export function toDetectTuple(
  result: DetectResult
): [chosen: string, candidates: AssetName[] | null, error: string | null] {
  if (result.kind === 'resolved') {
    return [result.asset, null, null];
  }
  return ['', result.candidates.length > 0 ? result.candidates : null, result.reason];
}

/** Preference fields as written in configuration. */
export interface PreferenceSettings {
  libc?: LibcPreference;
  prefer_appimage?: boolean;
}

/**
 * Platform-wide preference fields, plus per-architecture overrides keyed by
 * architecture name.
 */
export type PlatformPreferences = PreferenceSettings & {
  readonly [arch: string]: PreferenceSettings | LibcPreference | boolean | undefined;
};

/** Preferences keyed by platform name. */
export type Preferences = Readonly<Record<string, PlatformPreferences>>;
