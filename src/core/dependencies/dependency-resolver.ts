import type { DependencyNode, Platform, Recipe } from '../../types/index.js';
import { DependencyCycleError, MissingDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ActionRegistry } from '../actions/registry.js';
import type { RecipeLoader } from '../recipe/recipe-loader.js';
import type { VersionResolver } from '../version/version-resolver.js';
import { parseToolSpec } from '../version/constraint.js';
import { decomposeSteps, type DecompositionResult } from '../plan/decomposer.js';

export interface DependencyResolverDeps {
  loader: RecipeLoader;
  versions: VersionResolver;
  registry: ActionRegistry;
}

/**
 * Per-generation state. Created fresh for every plan and passed down
 * explicitly; nothing here outlives one generation.
 */
export interface ResolutionState {
  platform: Platform;
  signal?: AbortSignal;
  /** Finished nodes keyed by `tool@version` */
  memo: Map<string, DependencyNode>;
  /** Tools currently being resolved, for cycle detection */
  visiting: Set<string>;
  /** Same tools in resolution order, for error messages */
  chain: string[];
  /** Leaves-first output */
  ordered: DependencyNode[];
  evalDependencies: string[];
}

export interface DependencyResolution {
  /** Flat, leaves-first; each node appears after all of its dependencies */
  nodes: DependencyNode[];
  /** `tool@version` keys of the root's direct dependencies */
  direct: string[];
  /** Eval-time dependencies declared anywhere in the tree, first-seen order */
  evalDependencies: string[];
}

export function dependencyKey(tool: string, version: string): string {
  return `${tool}@${version}`;
}

/**
 * The ordered dependency set of one recipe: explicit metadata dependencies,
 * then those of steps that survived filtering, then implicit ones from
 * primitives. A spec repeating an earlier tool is dropped, and a tool never
 * implicitly depends on itself.
 */
export function collectDependencySpecs(tool: string, recipe: Recipe, decomposition: DecompositionResult): string[] {
  const specs: string[] = [];
  const seen = new Set<string>();
  const add = (spec: string) => {
    const name = parseToolSpec(spec).tool;
    if (!name || seen.has(name)) {
      return;
    }
    seen.add(name);
    specs.push(spec);
  };

  recipe.metadata.dependencies.forEach(add);
  for (const step of decomposition.activeSteps) {
    step.dependencies.forEach(add);
  }
  decomposition.implicitDependencies.filter(name => name !== tool).forEach(add);
  return specs;
}

export function createResolutionState(platform: Platform, signal?: AbortSignal): ResolutionState {
  return {
    platform,
    signal,
    memo: new Map(),
    visiting: new Set(),
    chain: [],
    ordered: [],
    evalDependencies: []
  };
}

/**
 * Resolve the dependency tree under an already decomposed root recipe.
 */
export async function resolveDependencyTree(
  root: { tool: string; recipe: Recipe; decomposition: DecompositionResult },
  deps: DependencyResolverDeps,
  state: ResolutionState
): Promise<DependencyResolution> {
  state.visiting.add(root.tool);
  state.chain.push(root.tool);
  try {
    const direct = await resolveSpecs(root.tool, collectDependencySpecs(root.tool, root.recipe, root.decomposition), deps, state);
    return { nodes: [...state.ordered], direct, evalDependencies: [...state.evalDependencies] };
  } finally {
    state.visiting.delete(root.tool);
    state.chain.pop();
  }
}

async function resolveSpecs(
  parent: string,
  specs: string[],
  deps: DependencyResolverDeps,
  state: ResolutionState
): Promise<string[]> {
  const keys: string[] = [];

  for (const spec of specs) {
    state.signal?.throwIfAborted();
    const { tool, constraint } = parseToolSpec(spec);

    if (state.visiting.has(tool)) {
      const cycle = state.chain.slice(state.chain.indexOf(tool));
      throw new DependencyCycleError(tool, cycle);
    }

    const loaded = await deps.loader.load(tool);
    if (!loaded) {
      throw new MissingDependencyError(tool, parent);
    }

    const resolved = await deps.versions.resolveVersion(loaded.recipe.version, constraint, state.signal);
    const key = dependencyKey(tool, resolved.version);
    if (!keys.includes(key)) {
      keys.push(key);
    }

    if (state.memo.has(key)) {
      logger.debug(`Reusing resolved dependency ${key}`, { requiredBy: parent });
      continue;
    }

    state.visiting.add(tool);
    state.chain.push(tool);
    try {
      const decomposition = decomposeSteps(
        loaded.recipe.steps,
        { tool, version: resolved.version, versionTag: resolved.tag, platform: state.platform },
        deps.registry
      );
      for (const evalDep of decomposition.evalDependencies) {
        if (!state.evalDependencies.includes(evalDep)) {
          state.evalDependencies.push(evalDep);
        }
      }

      const childKeys = await resolveSpecs(tool, collectDependencySpecs(tool, loaded.recipe, decomposition), deps, state);
      const node: DependencyNode = {
        tool,
        version: resolved.version,
        recipe_hash: loaded.hash,
        steps: decomposition.steps,
        dependencies: childKeys
      };
      state.memo.set(key, node);
      state.ordered.push(node);
      logger.debug(`Resolved dependency ${key}`, { requiredBy: parent, dependencies: childKeys });
    } finally {
      state.visiting.delete(tool);
      state.chain.pop();
    }
  }

  return keys;
}
