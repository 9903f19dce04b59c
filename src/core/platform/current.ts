/**
 * Host platform detection, mapped onto rule-table names.
 */
import * as os from 'node:os';

export interface Target {
  platform: string;
  arch: string;
}

const PLATFORM_NAMES: Record<string, string> = {
  darwin: 'macos',
  win32: 'windows',
  sunos: 'solaris',
};

const ARCH_NAMES: Record<string, string> = {
  x64: 'amd64',
  ia32: '386',
};

/**
 * The platform and architecture of the running machine.
 * Names without a mapping pass through unchanged.
 */
export function currentPlatform(
  platform: string = process.platform,
  arch: string = os.arch()
): Target {
  return {
    platform: PLATFORM_NAMES[platform] ?? platform,
    arch: ARCH_NAMES[arch] ?? arch,
  };
}
