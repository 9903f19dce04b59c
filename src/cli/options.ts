/**
 * Option parsing shared by commands.
 */
import { currentPlatform, type Target } from '../core/platform/current.js';
import type { LibcPreference, Preferences } from '../core/detect/types.js';

/** Commander reducer for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function isLibcPreference(value: string): value is LibcPreference {
  return value === 'glibc' || value === 'musl';
}

/**
 * Fill a missing platform or arch from the running machine.
 */
export function resolveTarget(platform?: string, arch?: string): Target {
  const current = currentPlatform();
  return { platform: platform ?? current.platform, arch: arch ?? current.arch };
}

/**
 * Preferences given as flags, scoped to the one platform being detected.
 */
export function preferencesFromFlags(
  platform: string,
  libc: string | undefined,
  preferAppImage: boolean | undefined
): Preferences | undefined {
  if (libc === undefined && preferAppImage === undefined) return undefined;
  if (libc !== undefined && !isLibcPreference(libc)) {
    throw new Error(`Invalid libc preference '${libc}', expected glibc or musl`);
  }
  return {
    [platform]: {
      ...(libc !== undefined ? { libc } : {}),
      ...(preferAppImage !== undefined ? { prefer_appimage: preferAppImage } : {}),
    },
  };
}
