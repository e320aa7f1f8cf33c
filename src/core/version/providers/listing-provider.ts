import * as semver from 'semver';
import type { VersionSpec } from '../../../types/index.js';
import { VersionResolutionError } from '../../../utils/errors.js';
import { classifyConstraint } from '../constraint.js';
import type { ResolvedVersion, VersionProvider } from '../version-resolver.js';

export interface VersionCandidate extends ResolvedVersion {
  /** Flagged upstream as a pre-release, whatever its version string says */
  prerelease?: boolean;
}

/**
 * Split a tag into its version. With a configured prefix only tags carrying
 * it count; without one an optional leading `v` is dropped.
 */
export function versionFromTag(tag: string, prefix?: string): string | undefined {
  if (prefix !== undefined && prefix !== '') {
    return tag.startsWith(prefix) ? tag.slice(prefix.length) : undefined;
  }
  return tag.replace(/^v(?=\d)/, '');
}

function toSemver(version: string): string | null {
  return semver.valid(version, { loose: true });
}

/**
 * Base for providers that can list every available version; picking a
 * version from the list is shared.
 */
export abstract class ListingVersionProvider implements VersionProvider {
  abstract readonly source: string;

  protected abstract listVersions(spec: VersionSpec, signal?: AbortSignal): Promise<VersionCandidate[]>;

  async resolve(spec: VersionSpec, constraint: string, signal?: AbortSignal): Promise<ResolvedVersion> {
    const trimmed = constraint.trim();
    const wantsLatest = trimmed === '' || trimmed.toLowerCase() === 'latest';
    const exact = classifyConstraint(trimmed) === 'exact';

    if (!wantsLatest && !exact && semver.validRange(trimmed, { loose: true }) === null) {
      throw new VersionResolutionError('invalid_constraint', `Invalid version constraint '${constraint}'`, { constraint });
    }

    const candidates = await this.listVersions(spec, signal);
    const picked = wantsLatest
      ? pickLatest(candidates)
      : exact
        ? pickExact(candidates, trimmed)
        : pickInRange(candidates, trimmed);

    if (!picked) {
      throw new VersionResolutionError(
        'not_found',
        `No version of source '${this.source}' matches '${constraint || 'latest'}'`,
        { constraint, available: candidates.slice(0, 20).map(candidate => candidate.version) }
      );
    }
    return { version: picked.version, tag: picked.tag };
  }
}

function pickExact(candidates: VersionCandidate[], constraint: string): VersionCandidate | undefined {
  const wanted = constraint.replace(/^v(?=\d)/, '');
  return candidates.find(candidate => candidate.version === wanted || candidate.tag === constraint);
}

function stableSorted(candidates: VersionCandidate[], includePrerelease: boolean): VersionCandidate[] {
  return candidates
    .filter(candidate => {
      const parsed = toSemver(candidate.version);
      if (!parsed) {
        return false;
      }
      return includePrerelease || (!candidate.prerelease && semver.prerelease(parsed) === null);
    })
    .sort((a, b) => semver.rcompare(a.version, b.version, { loose: true }));
}

function pickLatest(candidates: VersionCandidate[]): VersionCandidate | undefined {
  return stableSorted(candidates, false)[0];
}

function pickInRange(candidates: VersionCandidate[], range: string): VersionCandidate | undefined {
  return stableSorted(candidates, false).find(candidate => semver.satisfies(candidate.version, range, { loose: true }));
}
