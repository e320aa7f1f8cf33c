/**
 * Library entry point: plan generation, plan execution and the stores
 * around them, without the CLI.
 */

export * from '../types/index.js';
export type { ExecutionContext, CommandRunner, CommandOptions, CommandOutput } from '../types/execution-context.js';
export * from '../utils/errors.js';

export { getQuiverDirectories, ensureQuiverDirectories, getToolInstallDirectory } from './directory.js';
export { ConfigManager, DEFAULT_CONFIG, parseConfig } from './config.js';
export { detectHostPlatform, matchesWhen, platformsEqual, formatPlatform } from './platforms.js';

export { parseRecipe, validateRecipe, computeRecipeHash } from './recipe/recipe-parser.js';
export { FileRecipeLoader, MemoryRecipeLoader, loadRecipeFile } from './recipe/recipe-loader.js';
export type { LoadedRecipe, RecipeLoader } from './recipe/recipe-loader.js';

export { PrimitiveAction, CompositeAction } from './actions/base-action.js';
export type { Action } from './actions/base-action.js';
export { ActionRegistry, BUILTIN_ACTIONS, createBuiltinRegistry } from './actions/registry.js';
export type { BuiltinActionName } from './actions/registry.js';

export { classifyConstraint, isExactConstraint, parseToolSpec } from './version/constraint.js';
export { VersionResolver } from './version/version-resolver.js';
export type { ResolvedVersion, VersionProvider } from './version/version-resolver.js';
export { StaticVersionProvider } from './version/providers/static-provider.js';
export { GitHubVersionProvider } from './version/providers/github-provider.js';

export { decomposeSteps } from './plan/decomposer.js';
export type { DecompositionContext, DecompositionResult } from './plan/decomposer.js';
export { resolveDependencyTree, createResolutionState } from './dependencies/dependency-resolver.js';
export { HttpDownloader } from './download/downloader.js';
export type { Downloader, DownloadResult } from './download/downloader.js';

export { serializePlan, parsePlan } from './plan/plan-serializer.js';
export {
  FilePlanStore,
  MemoryPlanStore,
  validateCachedPlan,
  shouldConsultCache
} from './plan/plan-cache.js';
export type { PlanStore, StoredPlanRecord, PlanValidity } from './plan/plan-cache.js';
export { generatePlan, generatePlanWithCache, computePlanContentHash } from './plan/plan-generator.js';
export type { EvalDependencyHandler, GeneratePlanOptions, CachedGenerationOptions } from './plan/plan-generator.js';
export { PlanExecutor, executePlan, validatePlan } from './plan/plan-executor.js';
export type { ExecutionState, ExecutionSummary, PlanExecutorOptions } from './plan/plan-executor.js';

export { runInstallPipeline, runEvalPipeline, createPipelineServices } from './install/install-pipeline.js';
export type { PipelineServices } from './install/install-pipeline.js';
