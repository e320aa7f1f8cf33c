import type { StepParams } from '../../../types/index.js';
import { CompositeAction } from '../base-action.js';
import type { ActionStep } from '../types.js';
import { ParamError, baseName, binariesToParam, requireBinaries, requireString } from '../params.js';

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

/**
 * Release asset URL. The tag stays a `{version_tag}` placeholder and is
 * filled in by variable substitution.
 */
export function githubReleaseAssetUrl(params: StepParams): string {
  const repo = requireString(params, 'repo');
  if (!REPO_PATTERN.test(repo)) {
    throw new ParamError(`'repo' must be 'owner/name', got '${repo}'`);
  }
  const asset = requireString(params, 'asset_pattern');
  if (asset.includes('*')) {
    throw new ParamError(`'asset_pattern' must name a single asset; wildcards are not supported`);
  }
  return `https://github.com/${repo}/releases/download/{version_tag}/${asset}`;
}

/**
 * A release archive on GitHub; expands to download_archive.
 */
export class GitHubArchiveAction extends CompositeAction {
  readonly name = 'github_archive';

  decompose(params: StepParams): ActionStep[] {
    const { repo: _repo, asset_pattern: _asset, ...rest } = params;
    return [{ action: 'download_archive', params: { ...rest, url: githubReleaseAssetUrl(params) } }];
  }
}

/**
 * A single executable released as a bare file.
 */
export class GitHubFileAction extends CompositeAction {
  readonly name = 'github_file';

  decompose(params: StepParams): ActionStep[] {
    const url = githubReleaseAssetUrl(params);
    const asset = baseName(url);
    const binaries = requireBinaries(params).map(binary => ({ src: asset, dest: binary.dest }));

    const download: StepParams = { url, dest: asset };
    if (typeof params.checksum === 'string') {
      download.checksum = params.checksum;
    }

    return [
      { action: 'download_file', params: download },
      { action: 'chmod', params: { files: [asset] } },
      { action: 'install_binaries', params: { binaries: binariesToParam(binaries) } }
    ];
  }
}
