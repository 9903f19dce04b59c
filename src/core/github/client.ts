/**
 * GitHub API client for fetching release information.
 */
import { GitHubError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatZodError } from '../../utils/yaml.js';
import { ReleaseSchema, type Release } from './types.js';

const GITHUB_API_BASE = 'https://api.github.com';
const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

export interface GitHubClientOptions {
  /** API token; falls back to GITHUB_TOKEN. */
  token?: string;
  baseUrl?: string;
}

export class GitHubClient {
  private readonly token?: string;
  private readonly baseUrl: string;
  private readonly cache = new Map<string, Promise<Release>>();

  constructor(options: GitHubClientOptions = {}) {
    this.token = options.token ?? (process.env.GITHUB_TOKEN || undefined);
    this.baseUrl = options.baseUrl ?? GITHUB_API_BASE;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github.v3+json',
      'User-Agent': 'binpick',
    };

    if (this.token) {
      headers['Authorization'] = `token ${this.token}`;
    }

    return headers;
  }

  /**
   * Get the latest release for an `owner/repo`. Repeated calls share one request.
   */
  getLatestRelease(repo: string): Promise<Release> {
    if (!REPO_PATTERN.test(repo)) {
      return Promise.reject(
        new GitHubError(ErrorCodes.API_ERROR, `Invalid repository "${repo}", expected owner/repo`, { repo })
      );
    }
    const cached = this.cache.get(repo);
    if (cached) return cached;

    // failed lookups are not cached
    const pending = this.fetchLatestRelease(repo).catch((error: unknown) => {
      this.cache.delete(repo);
      throw error;
    });
    this.cache.set(repo, pending);
    return pending;
  }

  private async fetchLatestRelease(repo: string): Promise<Release> {
    const url = `${this.baseUrl}/repos/${repo}/releases/latest`;
    logger.debug(`Fetching latest release from ${url}`);
    const response = await fetch(url, { headers: this.getHeaders() });

    if (!response.ok) {
      if (response.status === 404) {
        throw new GitHubError(
          ErrorCodes.RELEASE_NOT_FOUND,
          `Repository ${repo} not found or has no releases`,
          { repo, status: response.status }
        );
      }
      if (response.status === 403 || response.status === 429) {
        throw new GitHubError(ErrorCodes.RATE_LIMITED, 'GitHub API rate limit exceeded', {
          repo,
          status: response.status,
        });
      }
      throw new GitHubError(
        ErrorCodes.API_ERROR,
        `GitHub API error: ${response.status} ${response.statusText}`,
        { repo, status: response.status }
      );
    }

    const parsed = ReleaseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GitHubError(
        ErrorCodes.API_ERROR,
        `Unexpected release payload for ${repo}: ${formatZodError(parsed.error)}`,
        { repo }
      );
    }
    return parsed.data;
  }
}
