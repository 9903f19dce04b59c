import { describe, it, expect } from 'vitest';
import { analyzeRelease, templatizeAssetName } from '../../../../src/core/analyze/analyze.js';
import type { Release } from '../../../../src/core/github/types.js';

function release(tag: string, names: string[]): Release {
  return {
    tag_name: tag,
    assets: names.map((name) => ({ name, browser_download_url: `https://example.invalid/${name}` })),
  };
}

const LINUX_MUSL = 'ripgrep-14.1.0-x86_64-unknown-linux-musl.tar.gz';
const LINUX_SUM = 'ripgrep-14.1.0-x86_64-unknown-linux-musl.tar.gz.sha256';
const LINUX_ARM = 'ripgrep-14.1.0-aarch64-unknown-linux-gnu.tar.gz';
const DARWIN_X86 = 'ripgrep-14.1.0-x86_64-apple-darwin.tar.gz';
const DARWIN_ARM = 'ripgrep-14.1.0-aarch64-apple-darwin.tar.gz';
const WINDOWS = 'ripgrep-14.1.0-x86_64-pc-windows-msvc.zip';
const DEB = 'ripgrep_14.1.0-1_amd64.deb';

describe('templatizeAssetName', () => {
  it('should replace the version and arch', () => {
    expect(templatizeAssetName(LINUX_MUSL, '14.1.0', 'x86_64')).toBe(
      'ripgrep-{version}-{arch}-unknown-linux-musl.tar.gz'
    );
  });

  it('should escape regex syntax outside placeholders', () => {
    expect(templatizeAssetName('app-1.2.3+build-x86_64.tar.gz', '1.2.3', 'x86_64')).toBe(
      'app-{version}\\+build-{arch}.tar.gz'
    );
  });

  it('should keep the name when nothing is found', () => {
    expect(templatizeAssetName('tool.zip', '2.0.0')).toBe('tool.zip');
  });
});

describe('analyzeRelease', () => {
  const analysis = analyzeRelease(
    'BurntSushi/ripgrep',
    release('14.1.0', [LINUX_MUSL, LINUX_SUM, LINUX_ARM, DARWIN_X86, DARWIN_ARM, WINDOWS, DEB]),
    'rg'
  );

  it('should group assets by platform', () => {
    expect(analysis.platforms).toEqual({
      darwin: [DARWIN_X86, DARWIN_ARM],
      windows: [WINDOWS],
      linux: [LINUX_MUSL, LINUX_SUM, LINUX_ARM],
    });
  });

  it('should group assets by architecture', () => {
    expect(analysis.arches).toEqual({
      amd64: [LINUX_MUSL, LINUX_SUM, DARWIN_X86, WINDOWS, DEB],
      arm64: [LINUX_ARM, DARWIN_ARM],
    });
  });

  it('should suggest a tool entry with patterns', () => {
    expect(analysis.tag).toBe('14.1.0');
    expect(analysis.suggestion).toEqual({
      repo: 'BurntSushi/ripgrep',
      binary_name: 'rg',
      arch_map: { amd64: 'x86_64', arm64: 'aarch64' },
      asset_patterns: {
        linux: 'ripgrep-{version}-{arch}-unknown-linux-musl.tar.gz',
        macos: 'ripgrep-{version}-{arch}-apple-darwin.tar.gz',
      },
    });
  });

  it('should skip patterns when asset names carry no architecture', () => {
    const plain = analyzeRelease('acme/tool', release('v1.0.0', ['tool-linux.tar.gz', 'tool-macos.tar.gz']));

    expect(plain.suggestion).toEqual({ repo: 'acme/tool', binary_name: 'tool' });
  });
});
