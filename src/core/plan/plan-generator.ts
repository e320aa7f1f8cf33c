import type { DependencyNode, InstallationPlan, Platform, ResolvedStep, VersionSpec } from '../../types/index.js';
import { MAX_PLAN_DEPENDENCIES, PLAN_FORMAT_VERSION } from '../../constants/index.js';
import { GenerationError } from '../../utils/errors.js';
import { normalizeChecksum } from '../../utils/hash.js';
import { logger } from '../../utils/logger.js';
import type { Downloader } from '../download/downloader.js';
import type { LoadedRecipe } from '../recipe/recipe-loader.js';
import {
  createResolutionState,
  resolveDependencyTree,
  type DependencyResolverDeps
} from '../dependencies/dependency-resolver.js';
import { versionFromTag } from '../version/providers/listing-provider.js';
import { decomposeSteps } from './decomposer.js';
import { freezePlan } from './plan-serializer.js';
import {
  lookupCachedPlan,
  shouldConsultCache,
  storePlanSafely,
  validateCachedPlan,
  type PlanStore
} from './plan-cache.js';

export { computePlanContentHash } from './plan-serializer.js';

/**
 * Supplies tools that composite actions need on the generating machine
 * (npm for npm_install, go for go_install). Nothing it installs ends up in
 * the plan.
 */
export interface EvalDependencyHandler {
  isSatisfied(tool: string): Promise<boolean>;
  /** Install or otherwise make `tools` available; may ask the user unless `autoAccept` */
  provide(tools: string[], autoAccept: boolean): Promise<void>;
}

export interface GeneratePlanOptions extends DependencyResolverDeps {
  downloader: Downloader;
  signal?: AbortSignal;
  evalDependencies?: EvalDependencyHandler;
  autoAcceptEvalDependencies?: boolean;
  now?: () => Date;
}

async function ensureEvalDependencies(tools: string[], options: GeneratePlanOptions, tool: string): Promise<void> {
  if (tools.length === 0) {
    return;
  }
  const handler = options.evalDependencies;
  if (!handler) {
    throw new GenerationError(
      `Generating a plan for '${tool}' requires ${tools.join(', ')} on this machine, and no handler was provided to supply ${tools.length === 1 ? 'it' : 'them'}`,
      { tool, evalDependencies: tools }
    );
  }

  const missing: string[] = [];
  for (const dep of tools) {
    if (!(await handler.isSatisfied(dep))) {
      missing.push(dep);
    }
  }
  if (missing.length === 0) {
    return;
  }

  logger.info(`Providing eval-time dependencies for ${tool}: ${missing.join(', ')}`);
  await handler.provide(missing, options.autoAcceptEvalDependencies ?? false);

  const stillMissing: string[] = [];
  for (const dep of missing) {
    if (!(await handler.isSatisfied(dep))) {
      stillMissing.push(dep);
    }
  }
  if (stillMissing.length > 0) {
    throw new GenerationError(`Eval-time dependencies not available: ${stillMissing.join(', ')}`, {
      tool,
      evalDependencies: stillMissing
    });
  }
}

async function captureChecksums(
  owner: string,
  steps: ResolvedStep[],
  downloader: Downloader,
  signal?: AbortSignal
): Promise<ResolvedStep[]> {
  const captured: ResolvedStep[] = [];
  for (const [index, step] of steps.entries()) {
    if (step.action !== 'download_file') {
      captured.push(step);
      continue;
    }

    const url = step.url ?? (typeof step.params.url === 'string' ? step.params.url : undefined);
    if (!url) {
      throw new GenerationError(`${owner} step ${index} (download_file) has no url`, { tool: owner, stepIndex: index });
    }

    signal?.throwIfAborted();
    const result = await downloader.fetch(url, { signal });
    const pinned = step.params.checksum;
    if (typeof pinned === 'string' && normalizeChecksum(pinned) !== result.checksum) {
      throw new GenerationError(
        `${owner} step ${index}: ${url} does not match the checksum pinned in the recipe (expected ${normalizeChecksum(pinned)}, got ${result.checksum})`,
        { tool: owner, stepIndex: index, url }
      );
    }

    captured.push({ ...step, url, checksum: result.checksum, size: result.size });
  }
  return captured;
}

/**
 * Build a fresh installation plan. Everything that touches the network
 * (version lookup, downloads for checksums) happens here, so the plan can
 * later run without re-resolving anything. Any failure aborts; no partial
 * plan is ever returned.
 */
export async function generatePlan(
  loaded: LoadedRecipe,
  constraint: string,
  platform: Platform,
  options: GeneratePlanOptions
): Promise<InstallationPlan> {
  const { recipe } = loaded;
  const tool = recipe.metadata.name;
  const { signal } = options;

  const resolved = await options.versions.resolveVersion(recipe.version, constraint, signal);
  logger.debug(`Generating plan for ${tool}@${resolved.version}`, { platform });

  const decomposition = decomposeSteps(
    recipe.steps,
    { tool, version: resolved.version, versionTag: resolved.tag, platform },
    options.registry
  );
  await ensureEvalDependencies(decomposition.evalDependencies, options, tool);

  signal?.throwIfAborted();
  const state = createResolutionState(platform, signal);
  const resolution = await resolveDependencyTree({ tool, recipe, decomposition }, options, state);
  if (resolution.nodes.length > MAX_PLAN_DEPENDENCIES) {
    throw new GenerationError(
      `${tool} has ${resolution.nodes.length} dependencies; the limit is ${MAX_PLAN_DEPENDENCIES}`,
      { tool, count: resolution.nodes.length }
    );
  }
  await ensureEvalDependencies(
    resolution.evalDependencies.filter(dep => !decomposition.evalDependencies.includes(dep)),
    options,
    tool
  );

  const dependencies: DependencyNode[] = [];
  for (const node of resolution.nodes) {
    dependencies.push({ ...node, steps: await captureChecksums(node.tool, node.steps, options.downloader, signal) });
  }
  const steps = await captureChecksums(tool, decomposition.steps, options.downloader, signal);

  const deterministic = [...steps, ...dependencies.flatMap(node => node.steps)].every(step => step.deterministic);
  const now = options.now ?? (() => new Date());

  const plan: InstallationPlan = {
    format_version: PLAN_FORMAT_VERSION,
    tool,
    version: resolved.version,
    platform: { ...platform },
    generated_at: now().toISOString(),
    recipe_hash: loaded.hash,
    recipe_source: loaded.source,
    deterministic,
    steps,
    dependencies
  };
  if (recipe.verify) {
    plan.verify = { ...recipe.verify };
  }

  signal?.throwIfAborted();
  logger.debug(`Generated plan for ${tool}@${resolved.version}`, {
    steps: steps.length,
    dependencies: dependencies.length,
    deterministic
  });
  return freezePlan(plan);
}

export interface CachedGenerationOptions extends GeneratePlanOptions {
  store: PlanStore;
  /** Regenerate even when a valid stored plan exists (`install --fresh`) */
  forceRefresh?: boolean;
  /** Leave storing a fresh plan to the caller, which stores it under the install lock */
  storeGenerated?: boolean;
}

export interface CachedGenerationResult {
  plan: InstallationPlan;
  fromCache: boolean;
}

/**
 * Cache key version for an exact constraint, before any provider is asked.
 * A full tag carrying the recipe's `tag_prefix` maps to its version the way
 * the providers split tags.
 */
function exactVersionKey(constraint: string, spec: VersionSpec): string {
  const trimmed = constraint.trim();
  const prefix = typeof spec.tag_prefix === 'string' ? spec.tag_prefix : undefined;
  return versionFromTag(trimmed, prefix) ?? trimmed.replace(/^v(?=\d)/, '');
}

/**
 * Install semantics: reuse a stored plan for an exact constraint when it is
 * still valid for this recipe and platform, otherwise generate and store.
 */
export async function generatePlanWithCache(
  loaded: LoadedRecipe,
  constraint: string,
  platform: Platform,
  options: CachedGenerationOptions
): Promise<CachedGenerationResult> {
  const tool = loaded.recipe.metadata.name;

  if (shouldConsultCache({ constraint, forceRefresh: options.forceRefresh })) {
    const version = exactVersionKey(constraint, loaded.recipe.version);
    const record = await lookupCachedPlan(options.store, tool, version);
    if (record) {
      const validity = validateCachedPlan(record.plan, { recipeHash: loaded.hash, platform });
      if (validity.valid) {
        logger.debug(`Reusing cached plan for ${tool}@${version}`);
        return { plan: record.plan, fromCache: true };
      }
      logger.info(`Cached plan for ${tool}@${version} is stale (${validity.reason}); regenerating`);
    }
  }

  const plan = await generatePlan(loaded, constraint, platform, options);
  if (options.storeGenerated ?? true) {
    await storePlanSafely(options.store, plan);
  }
  return { plan, fromCache: false };
}
