import type { VersionSpec } from '../../types/index.js';
import { VersionResolutionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ResolvedVersion {
  /** Normalized version, no tag prefix: "2.40.0" */
  version: string;
  /** Upstream tag: "v2.40.0" */
  tag: string;
}

/**
 * Resolves a constraint against one kind of version source. Providers are
 * the only part of generation that touches the network for versions.
 */
export interface VersionProvider {
  readonly source: string;
  resolve(spec: VersionSpec, constraint: string, signal?: AbortSignal): Promise<ResolvedVersion>;
}

/**
 * Dispatches to the provider registered for a recipe's `version.source`.
 */
export class VersionResolver {
  private readonly providers = new Map<string, VersionProvider>();

  constructor(providers: VersionProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  register(provider: VersionProvider): void {
    this.providers.set(provider.source, provider);
  }

  async resolveVersion(spec: VersionSpec, constraint: string, signal?: AbortSignal): Promise<ResolvedVersion> {
    const provider = this.providers.get(spec.source);
    if (!provider) {
      throw new VersionResolutionError(
        'unknown_source',
        `Unknown version source '${spec.source}' (known: ${[...this.providers.keys()].sort().join(', ') || 'none'})`,
        { source: spec.source }
      );
    }

    const resolved = await provider.resolve(spec, constraint, signal);
    logger.debug(`Resolved '${constraint || 'latest'}' to ${resolved.version}`, { source: spec.source, tag: resolved.tag });
    return resolved;
  }
}
