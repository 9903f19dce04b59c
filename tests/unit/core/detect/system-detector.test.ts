import { describe, it, expect } from 'vitest';
import { SystemDetector, detectSystem } from '../../../../src/core/detect/system-detector.js';
import { OS_RULES, ARCH_RULES } from '../../../../src/core/detect/rules.js';
import { toDetectTuple, type DetectResult } from '../../../../src/core/detect/types.js';

const linuxAmd64 = detectSystem(OS_RULES.linux, ARCH_RULES.amd64);

describe('SystemDetector', () => {
  describe('resolution tiers', () => {
    it('should pick the single platform+arch match', () => {
      const result = linuxAmd64.detect([
        'app-linux-amd64.tar.gz',
        'app-darwin-amd64.tar.gz',
        'app-windows-amd64.exe',
      ]);

      expect(result).toEqual({ kind: 'resolved', asset: 'app-linux-amd64.tar.gz' });
      expect(toDetectTuple(result)).toEqual(['app-linux-amd64.tar.gz', null, null]);
    });

    it('should report ties between platform+arch matches', () => {
      const result = linuxAmd64.detect([
        'app-linux-amd64.tar.gz',
        'app-linux-x86_64.tar.gz',
        'app-darwin-amd64.tar.gz',
      ]);

      expect(toDetectTuple(result)).toEqual([
        '',
        ['app-linux-amd64.tar.gz', 'app-linux-x86_64.tar.gz'],
        '2 matches found',
      ]);
    });

    it('should let a priority match win outright', () => {
      const result = linuxAmd64.detect(['app-linux-amd64.tar.gz', 'app-linux.appimage']);

      expect(result).toEqual({ kind: 'resolved', asset: 'app-linux.appimage' });
    });

    it('should report several priority matches', () => {
      const result = linuxAmd64.detect(['app-linux-x86_64.AppImage', 'app-linux-aarch64.AppImage']);

      expect(result).toEqual({
        kind: 'ambiguous',
        candidates: ['app-linux-x86_64.AppImage', 'app-linux-aarch64.AppImage'],
        reason: '2 priority matches found',
      });
    });

    it('should fall back to a single platform-only match', () => {
      expect(linuxAmd64.detect(['app-linux.tar.gz', 'app-darwin.tar.gz'])).toEqual({
        kind: 'resolved',
        asset: 'app-linux.tar.gz',
      });
    });

    it('should report several platform-only matches', () => {
      expect(linuxAmd64.detect(['app-linux.deb', 'app-linux.tar.gz', 'app-darwin.tar.gz'])).toEqual({
        kind: 'ambiguous',
        candidates: ['app-linux.tar.gz', 'app-linux.deb'],
        reason: '2 candidates found (unsure architecture)',
      });
    });

    it('should take the only asset when nothing matches the platform', () => {
      expect(linuxAmd64.detect(['app.tar.gz'])).toEqual({ kind: 'resolved', asset: 'app.tar.gz' });
    });

    it('should report no candidates with the full list', () => {
      expect(linuxAmd64.detect(['a.tar.gz', 'b.tar.gz'])).toEqual({
        kind: 'not-found',
        candidates: ['a.tar.gz', 'b.tar.gz'],
        reason: 'no candidates found',
      });
    });

    it('should report no candidates for an empty list', () => {
      expect(toDetectTuple(linuxAmd64.detect([]))).toEqual(['', null, 'no candidates found']);
    });
  });

  describe('checksums and sidecars', () => {
    it('should never return checksum files', () => {
      const assets = [
        'app-linux-amd64.tar.gz.sha256',
        'app-linux-amd64.tar.gz',
        'app-linux-amd64.tar.gz.sha256sum',
      ];
      expect(linuxAmd64.detect(assets)).toEqual({ kind: 'resolved', asset: 'app-linux-amd64.tar.gz' });
    });

    it('should leave checksum files out of every candidate list', () => {
      const result = linuxAmd64.detect(['a.sha256', 'b.zip', 'c.zip', 'd.sha256sum']);
      expect(result).toEqual({ kind: 'not-found', candidates: ['b.zip', 'c.zip'], reason: 'no candidates found' });
    });

    it('should resolve when only a signature competes with the asset', () => {
      expect(linuxAmd64.detect(['app-linux-amd64.tar.gz', 'app-linux-amd64.tar.gz.sig'])).toEqual({
        kind: 'resolved',
        asset: 'app-linux-amd64.tar.gz',
      });
    });
  });

  describe('preferences', () => {
    const gnu = 'app-x86_64-unknown-linux-gnu.tar.gz';
    const musl = 'app-x86_64-unknown-linux-musl.tar.gz';

    it('should settle a platform+arch tie by libc', () => {
      const detector = new SystemDetector(OS_RULES.linux, ARCH_RULES.amd64, { libc: 'musl' });
      expect(detector.detect([gnu, musl])).toEqual({ kind: 'resolved', asset: musl });
    });

    it('should not promote a lower tier through a preference', () => {
      const detector = new SystemDetector(OS_RULES.linux, ARCH_RULES.amd64, { libc: 'musl' });
      expect(detector.detect(['app-linux-amd64-gnu.tar.gz', 'app-linux-arm64-musl.tar.gz'])).toEqual({
        kind: 'resolved',
        asset: 'app-linux-amd64-gnu.tar.gz',
      });
    });

    it('should only rank, not pick, in the platform-only tier', () => {
      const detector = new SystemDetector(OS_RULES.linux, ARCH_RULES.amd64, { libc: 'musl' });
      expect(detector.detect(['app-linux-gnu.tar.gz', 'app-linux-musl.tar.gz'])).toEqual({
        kind: 'ambiguous',
        candidates: ['app-linux-musl.tar.gz', 'app-linux-gnu.tar.gz'],
        reason: '2 candidates found (unsure architecture)',
      });
    });
  });

  it('should return the same result on repeated runs', () => {
    const assets = ['app-linux-amd64.tar.gz', 'app-linux-x86_64.zip', 'app-linux-amd64.deb'];
    const first: DetectResult = linuxAmd64.detect(assets);
    const second: DetectResult = linuxAmd64.detect(assets);

    expect(second).toEqual(first);
    expect(first).toEqual({
      kind: 'ambiguous',
      candidates: ['app-linux-amd64.tar.gz', 'app-linux-x86_64.zip', 'app-linux-amd64.deb'],
      reason: '3 matches found',
    });
  });

  it('should not modify its input', () => {
    const assets = ['b-linux-amd64.deb', 'a-linux-amd64.zip'];
    linuxAmd64.detect(assets);
    expect(assets).toEqual(['b-linux-amd64.deb', 'a-linux-amd64.zip']);
  });
});
