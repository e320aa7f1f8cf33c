import type { VersionSpec } from '../../../types/index.js';
import { VersionResolutionError } from '../../../utils/errors.js';
import { ListingVersionProvider, versionFromTag, type VersionCandidate } from './listing-provider.js';

/**
 * Versions listed in the recipe itself:
 *
 *   [version]
 *   source = "static"
 *   versions = ["v1.4.0", "v1.3.2"]
 */
export class StaticVersionProvider extends ListingVersionProvider {
  readonly source = 'static';

  protected async listVersions(spec: VersionSpec): Promise<VersionCandidate[]> {
    const versions = spec.versions;
    if (!Array.isArray(versions) || versions.length === 0) {
      throw new VersionResolutionError('not_found', `Static version source lists no versions`);
    }
    const prefix = typeof spec.tag_prefix === 'string' ? spec.tag_prefix : undefined;

    const candidates: VersionCandidate[] = [];
    for (const entry of versions) {
      if (typeof entry !== 'string') {
        throw new VersionResolutionError('invalid_constraint', `Static versions must be strings`);
      }
      const version = versionFromTag(entry, prefix);
      if (version !== undefined) {
        candidates.push({ version, tag: entry });
        continue;
      }
      // Entry written without the configured prefix
      candidates.push({ version: entry, tag: `${prefix ?? ''}${entry}` });
    }
    return candidates;
  }
}
