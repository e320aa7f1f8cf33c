import type { VersionSpec } from '../../../types/index.js';
import { VersionResolutionError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';
import { ListingVersionProvider, versionFromTag, type VersionCandidate } from './listing-provider.js';

export interface GitHubProviderOptions {
  token?: string;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
}

interface GitHubRelease {
  tag_name: string;
  draft: boolean;
  prerelease: boolean;
}

function isGitHubRelease(value: unknown): value is GitHubRelease {
  return value !== null
    && typeof value === 'object'
    && 'tag_name' in value && typeof value.tag_name === 'string'
    && 'draft' in value && typeof value.draft === 'boolean'
    && 'prerelease' in value && typeof value.prerelease === 'boolean';
}

/**
 * GitHub releases of `github_repo`:
 *
 *   [version]
 *   source = "github"
 *   github_repo = "cli/cli"
 *   tag_prefix = "v"      # optional
 */
export class GitHubVersionProvider extends ListingVersionProvider {
  readonly source = 'github';

  private readonly token?: string;
  private readonly apiBaseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitHubProviderOptions = {}) {
    super();
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  protected async listVersions(spec: VersionSpec, signal?: AbortSignal): Promise<VersionCandidate[]> {
    const repo = spec.github_repo;
    if (typeof repo !== 'string' || !/^[^/\s]+\/[^/\s]+$/.test(repo)) {
      throw new VersionResolutionError('invalid_constraint', `version.github_repo must be 'owner/name'`, { repo });
    }
    const prefix = typeof spec.tag_prefix === 'string' ? spec.tag_prefix : undefined;

    const releases = await this.fetchReleases(repo, signal);
    const candidates: VersionCandidate[] = [];
    for (const release of releases) {
      if (release.draft) {
        continue;
      }
      const version = versionFromTag(release.tag_name, prefix);
      if (version !== undefined) {
        candidates.push({ version, tag: release.tag_name, prerelease: release.prerelease });
      }
    }
    return candidates;
  }

  private async fetchReleases(repo: string, signal?: AbortSignal): Promise<GitHubRelease[]> {
    const url = `${this.apiBaseUrl}/repos/${repo}/releases?per_page=100`;
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'quiver'
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      logger.debug(`Fetching releases: ${url}`);
      response = await this.fetchImpl(url, { headers, signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new VersionResolutionError('network', `Failed to reach GitHub for ${repo}: ${error instanceof Error ? error.message : String(error)}`, { repo });
    }

    if (response.status === 404) {
      throw new VersionResolutionError('not_found', `GitHub repository '${repo}' not found`, { repo });
    }
    if (!response.ok) {
      throw new VersionResolutionError('network', `GitHub returned HTTP ${response.status} for ${repo}`, { repo, status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new VersionResolutionError('network', `GitHub returned malformed JSON for ${repo}`, { repo, error });
    }
    if (!Array.isArray(body)) {
      throw new VersionResolutionError('network', `Unexpected GitHub response for ${repo}`, { repo });
    }
    return body.filter(isGitHubRelease);
  }
}
