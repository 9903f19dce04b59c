import { describe, it, expect } from 'vitest';
import {
  OS_RULES,
  ARCH_RULES,
  ARCH_RULE_LIST,
  OS_RULE_LIST,
  matchOs,
  matchArch,
  resolveOsRule,
  resolveArchRule,
  canonicalOs,
  canonicalArch,
  withoutPriority,
  aliasKey,
} from '../../../../src/core/detect/rules.js';
import { UnsupportedTargetError } from '../../../../src/utils/errors.js';

describe('matchOs', () => {
  const linux = OS_RULES.linux;

  it('should match linux asset names', () => {
    expect(matchOs(linux, 'app-linux-amd64.tar.gz')).toEqual({ isMatch: true, isPriority: false });
    expect(matchOs(linux, 'app-ubuntu-22.04.deb')).toEqual({ isMatch: true, isPriority: false });
  });

  it('should never match when the anti pattern matches', () => {
    for (const name of ['app-linux-android-arm64.tar.gz', 'app-Android.apk', 'android-linux.AppImage']) {
      expect(matchOs(linux, name)).toEqual({ isMatch: false, isPriority: false });
    }
  });

  it('should flag AppImages as priority matches', () => {
    expect(matchOs(linux, 'app-linux.appimage')).toEqual({ isMatch: true, isPriority: true });
    expect(matchOs(linux, 'app-x86_64-linux.AppImage')).toEqual({ isMatch: true, isPriority: true });
  });

  it('should not flag a priority match without a main match', () => {
    expect(matchOs(linux, 'app-x86_64.AppImage')).toEqual({ isMatch: false, isPriority: false });
  });

  it('should not confuse darwin with windows', () => {
    expect(matchOs(OS_RULES.windows, 'app-darwin-amd64.zip').isMatch).toBe(false);
    expect(matchOs(OS_RULES.windows, 'app-windows-amd64.zip').isMatch).toBe(true);
    expect(matchOs(OS_RULES.windows, 'app-x86_64-pc-win64.zip').isMatch).toBe(true);
  });

  it('should match the common macOS spellings', () => {
    for (const name of ['app-darwin.tar.gz', 'app-macos.zip', 'app-mac-os.zip', 'app-osx.tar.gz']) {
      expect(matchOs(OS_RULES.darwin, name).isMatch).toBe(true);
    }
  });
});

describe('matchArch', () => {
  it('should match amd64 spellings', () => {
    for (const name of ['app-amd64', 'app-x86_64', 'app-x86-64', 'app-x64.zip']) {
      expect(matchArch(ARCH_RULES.amd64, name)).toBe(true);
    }
  });

  it('should match arm64 spellings', () => {
    for (const name of ['app-arm64', 'app-aarch64', 'app-armv8.tar.gz']) {
      expect(matchArch(ARCH_RULES.arm64, name)).toBe(true);
    }
  });

  it('should not match arm64 names with the 32-bit arm rule', () => {
    expect(matchArch(ARCH_RULES.arm, 'app-linux-arm64.tar.gz')).toBe(false);
    expect(matchArch(ARCH_RULES.arm, 'app-linux-arm.tar.gz')).toBe(true);
    expect(matchArch(ARCH_RULES.arm, 'app-linux-armv6.tar.gz')).toBe(true);
  });

  it('should match 386 spellings', () => {
    expect(matchArch(ARCH_RULES['386'], 'app-linux-i386.tar.gz')).toBe(true);
    expect(matchArch(ARCH_RULES['386'], 'app-linux-386.tar.gz')).toBe(true);
  });
});

describe('rule lookup', () => {
  it('should resolve aliases', () => {
    expect(resolveOsRule('macos').name).toBe('darwin');
    expect(resolveArchRule('aarch64').name).toBe('arm64');
    expect(resolveArchRule('x86_64').name).toBe('amd64');
    expect(canonicalOs('macos')).toBe('darwin');
    expect(canonicalArch('i386')).toBe('386');
  });

  it('should return undefined for unknown names', () => {
    expect(canonicalOs('beos')).toBeUndefined();
    expect(canonicalArch('sparc')).toBeUndefined();
    expect(canonicalOs('toString')).toBeUndefined();
  });

  it('should find the key naming the same target', () => {
    expect(aliasKey(['macos', 'linux'], 'darwin', canonicalOs)).toBe('macos');
    expect(aliasKey(['macos', 'darwin'], 'darwin', canonicalOs)).toBe('darwin');
    expect(aliasKey(['libc', 'x86_64'], 'amd64', canonicalArch)).toBe('x86_64');
    expect(aliasKey(['libc'], 'sparc', canonicalArch)).toBeUndefined();
  });

  it('should throw UnsupportedTargetError for unknown OS', () => {
    expect(() => resolveOsRule('invalid-os')).toThrow(UnsupportedTargetError);
    expect(() => resolveOsRule('invalid-os')).toThrow('unsupported target OS: invalid-os');
  });

  it('should throw UnsupportedTargetError for unknown arch', () => {
    expect(() => resolveArchRule('sparc')).toThrow('unsupported target arch: sparc');
  });

  it('should keep the rule tables frozen', () => {
    expect(Object.isFrozen(OS_RULES)).toBe(true);
    expect(Object.isFrozen(ARCH_RULES)).toBe(true);
    expect(Object.isFrozen(OS_RULES.linux)).toBe(true);
  });

  it('should keep the rule lists in listing order', () => {
    expect(ARCH_RULE_LIST.map((rule) => rule.name)).toEqual(['amd64', '386', 'arm', 'arm64', 'riscv64']);
    expect(OS_RULE_LIST[0]).toBe(OS_RULES.darwin);
    expect(OS_RULE_LIST.map((rule) => rule.name)).toHaveLength(10);
  });
});

describe('withoutPriority', () => {
  it('should drop the priority pattern but keep anti', () => {
    const rule = withoutPriority(OS_RULES.linux);
    expect(rule.priority).toBeUndefined();
    expect(matchOs(rule, 'app-linux.AppImage')).toEqual({ isMatch: true, isPriority: false });
    expect(matchOs(rule, 'app-linux-android.AppImage').isMatch).toBe(false);
  });
});
