/**
 * Tests for the analyze command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createAnalyzeCommand, formatAnalysis } from '../../../../src/cli/commands/analyze.js';
import { logger } from '../../../../src/utils/logger.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    blue: (s: string) => s,
    green: (s: string) => s,
  },
}));

const RELEASE = {
  tag_name: 'v1.0.0',
  assets: ['tool-linux-amd64.tar.gz', 'tool-darwin-amd64.tar.gz'].map((name) => ({
    name,
    browser_download_url: `https://example.invalid/${name}`,
  })),
};

describe('formatAnalysis', () => {
  it('should print groups and a config snippet', () => {
    expect(
      formatAnalysis({
        repo: 'acme/tool',
        tag: 'v1.0.0',
        platforms: { linux: ['tool-linux.tar.gz'] },
        arches: {},
        suggestion: { repo: 'acme/tool', binary_name: 'tool' },
      })
    ).toBe(
      [
        'Latest release: v1.0.0',
        '',
        'Assets by platform:',
        '  linux',
        '    - tool-linux.tar.gz',
        '',
        'Assets by architecture:',
        '',
        'Suggested configuration:',
        'tools:',
        '  tool:',
        '    repo: acme/tool',
        '    binary_name: tool',
      ].join('\n')
    );
  });
});

describe('analyze command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should print the analysis as JSON', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify(RELEASE), { status: 200 }));

    await createAnalyzeCommand().parseAsync(['acme/tool', '--json', '-n', 'tl'], { from: 'user' });

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output.tag).toBe('v1.0.0');
    expect(output.suggestion).toEqual({
      repo: 'acme/tool',
      binary_name: 'tl',
      asset_patterns: {
        linux: 'tool-linux-{arch}.tar.gz',
        macos: 'tool-darwin-{arch}.tar.gz',
      },
    });
  });

  it('should exit when the release cannot be fetched', async () => {
    fetchMock.mockResolvedValue(new Response('{}', { status: 404 }));

    await expect(createAnalyzeCommand().parseAsync(['acme/none'], { from: 'user' })).rejects.toThrow(
      'process.exit called'
    );
    expect(logger.error).toHaveBeenCalledWith('Repository acme/none not found or has no releases');
  });
});
