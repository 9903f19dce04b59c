/**
 * Platform and architecture rule tables.
 *
 * Every rule is plain data searched against the whole asset name. Release
 * artifacts follow no common grammar, so nothing here parses names into parts.
 */
import { UnsupportedTargetError } from '../../utils/errors.js';

export interface OsRule {
  readonly name: string;
  readonly match: RegExp;
  /** When this matches the OS never does. */
  readonly anti?: RegExp;
  /** Flags a match that wins over ordinary scoring (AppImage on Linux). */
  readonly priority?: RegExp;
}

export interface ArchRule {
  readonly name: string;
  readonly match: RegExp;
}

export interface OsMatch {
  isMatch: boolean;
  isPriority: boolean;
}

function byName<R extends { name: string }>(rules: readonly R[]): Readonly<Record<string, R>> {
  return Object.freeze(Object.fromEntries(rules.map((rule) => [rule.name, rule])));
}

// None of these patterns are global, so `test` keeps no lastIndex state.
const DARWIN: OsRule = Object.freeze({ name: 'darwin', match: /(darwin|mac.?(os)?|osx)/i });
const WINDOWS: OsRule = Object.freeze({ name: 'windows', match: /([^r]win|windows)/i });
const LINUX: OsRule = Object.freeze({
  name: 'linux',
  match: /(linux|ubuntu)/i,
  anti: /(android)/i,
  priority: /\.appimage$/i,
});

/** OS rules in listing order. */
export const OS_RULE_LIST: readonly OsRule[] = Object.freeze([
  DARWIN,
  WINDOWS,
  LINUX,
  Object.freeze({ name: 'netbsd', match: /(netbsd)/i }),
  Object.freeze({ name: 'freebsd', match: /(freebsd)/i }),
  Object.freeze({ name: 'openbsd', match: /(openbsd)/i }),
  Object.freeze({ name: 'android', match: /(android)/i }),
  Object.freeze({ name: 'illumos', match: /(illumos)/i }),
  Object.freeze({ name: 'solaris', match: /(solaris)/i }),
  Object.freeze({ name: 'plan9', match: /(plan9)/i }),
]);

// Lookup only: integer-like keys such as '386' enumerate first, so iterate the lists.
export const OS_RULES: Readonly<Record<string, OsRule>> = byName(OS_RULE_LIST);

export const OS_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  macos: 'darwin',
});

const AMD64: ArchRule = Object.freeze({ name: 'amd64', match: /(x64|amd64|x86(-|_)?64)/i });
const I386: ArchRule = Object.freeze({ name: '386', match: /(x32|amd32|x86(-|_)?32|i?386)/i });
const ARM64: ArchRule = Object.freeze({ name: 'arm64', match: /(arm64|armv8|aarch64)/i });

/** Architecture rules in listing order. */
export const ARCH_RULE_LIST: readonly ArchRule[] = Object.freeze([
  AMD64,
  I386,
  Object.freeze({ name: 'arm', match: /(arm32|armv6|arm\b)/i }),
  ARM64,
  Object.freeze({ name: 'riscv64', match: /(riscv64)/i }),
]);

export const ARCH_RULES: Readonly<Record<string, ArchRule>> = byName(ARCH_RULE_LIST);

export const ARCH_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  aarch64: 'arm64',
  x86_64: 'amd64',
  i386: '386',
});

/**
 * Classify an asset name for an OS.
 * A name that trips `anti` never matches; `priority` only counts on a match.
 */
export function matchOs(rule: OsRule, asset: string): OsMatch {
  if (rule.anti && rule.anti.test(asset)) {
    return { isMatch: false, isPriority: false };
  }
  const isMatch = rule.match.test(asset);
  if (rule.priority) {
    return { isMatch, isPriority: isMatch && rule.priority.test(asset) };
  }
  return { isMatch, isPriority: false };
}

export function matchArch(rule: ArchRule, asset: string): boolean {
  return rule.match.test(asset);
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/** Canonical OS name for a name or alias, undefined when unknown. */
export function canonicalOs(name: string): string | undefined {
  const key = lookup(OS_ALIASES, name) ?? name;
  return lookup(OS_RULES, key) ? key : undefined;
}

/** Canonical architecture name for a name or alias, undefined when unknown. */
export function canonicalArch(name: string): string | undefined {
  const key = lookup(ARCH_ALIASES, name) ?? name;
  return lookup(ARCH_RULES, key) ? key : undefined;
}

/**
 * The key among `keys` naming the same target as `name`: the key as written
 * first, then any alias of it.
 */
export function aliasKey(
  keys: readonly string[],
  name: string,
  canonical: (name: string) => string | undefined
): string | undefined {
  if (keys.includes(name)) return name;
  const target = canonical(name);
  if (target === undefined) return undefined;
  return keys.find((key) => canonical(key) === target);
}

/**
 * Look up the OS rule for a name or alias.
 * @throws UnsupportedTargetError
 */
export function resolveOsRule(name: string): OsRule {
  const key = canonicalOs(name);
  const rule = key === undefined ? undefined : lookup(OS_RULES, key);
  if (!rule) {
    throw new UnsupportedTargetError('os', name);
  }
  return rule;
}

/**
 * Look up the architecture rule for a name or alias.
 * @throws UnsupportedTargetError
 */
export function resolveArchRule(name: string): ArchRule {
  const key = canonicalArch(name);
  const rule = key === undefined ? undefined : lookup(ARCH_RULES, key);
  if (!rule) {
    throw new UnsupportedTargetError('arch', name);
  }
  return rule;
}

/** Copy of an OS rule without its priority override. */
export function withoutPriority(rule: OsRule): OsRule {
  return Object.freeze({ name: rule.name, match: rule.match, anti: rule.anti });
}
