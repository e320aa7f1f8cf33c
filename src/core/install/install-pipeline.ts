import type {
  CommandResult,
  InstallationPlan,
  Platform,
  QuiverConfig,
  QuiverDirectories
} from '../../types/index.js';
import type { CommandRunner } from '../../types/execution-context.js';
import { GenerationError } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getDownloadCacheDirectory } from '../directory.js';
import { detectHostPlatform } from '../platforms.js';
import { createBuiltinRegistry, type ActionRegistry } from '../actions/registry.js';
import { HttpDownloader, type Downloader } from '../download/downloader.js';
import { FileRecipeLoader, loadRecipeFile, type LoadedRecipe, type RecipeLoader } from '../recipe/recipe-loader.js';
import { VersionResolver } from '../version/version-resolver.js';
import { StaticVersionProvider } from '../version/providers/static-provider.js';
import { GitHubVersionProvider } from '../version/providers/github-provider.js';
import { parseToolSpec } from '../version/constraint.js';
import { FilePlanStore, storePlanSafely, type PlanStore } from '../plan/plan-cache.js';
import { generatePlan, generatePlanWithCache, type EvalDependencyHandler } from '../plan/plan-generator.js';
import { executePlan, type ExecutionState, type ExecutionSummary } from '../plan/plan-executor.js';
import { parsePlan } from '../plan/plan-serializer.js';
import { resolveOutput, type OutputPort } from '../ports/index.js';
import { withInstallLock } from './install-lock.js';

/**
 * Collaborators shared by the eval and install pipelines. The CLI builds
 * them with createPipelineServices; tests pass fakes.
 */
export interface PipelineServices {
  dirs: QuiverDirectories;
  config: QuiverConfig;
  loader: RecipeLoader;
  versions: VersionResolver;
  registry: ActionRegistry;
  downloader: Downloader;
  store: PlanStore;
  /** Detected when omitted */
  host?: Platform;
  runCommand?: CommandRunner;
  output?: OutputPort;
  evalDependencies?: EvalDependencyHandler;
}

export function createPipelineServices(
  dirs: QuiverDirectories,
  config: QuiverConfig,
  extras: Pick<PipelineServices, 'output' | 'evalDependencies'> = {}
): PipelineServices {
  return {
    dirs,
    config,
    loader: new FileRecipeLoader([...config.recipeDirs, dirs.recipes]),
    versions: new VersionResolver([
      new StaticVersionProvider(),
      new GitHubVersionProvider({ token: config.githubToken })
    ]),
    registry: createBuiltinRegistry(),
    downloader: new HttpDownloader({ cacheDir: getDownloadCacheDirectory(dirs) }),
    store: new FilePlanStore(dirs),
    ...extras
  };
}

async function resolveHost(services: PipelineServices): Promise<Platform> {
  return services.host ?? detectHostPlatform();
}

async function loadRootRecipe(tool: string, services: PipelineServices, recipeFile?: string): Promise<LoadedRecipe> {
  if (recipeFile) {
    const loaded = await loadRecipeFile(recipeFile);
    if (tool && loaded.recipe.metadata.name !== tool) {
      logger.warn(`Recipe file ${recipeFile} is for '${loaded.recipe.metadata.name}', not '${tool}'`);
    }
    return loaded;
  }
  const loaded = await services.loader.load(tool);
  if (!loaded) {
    throw new GenerationError(`No recipe found for '${tool}'`, { tool });
  }
  return loaded;
}

export interface EvalPipelineOptions {
  /** `tool` or `tool@constraint` */
  spec: string;
  /** Overrides the constraint in `spec` */
  version?: string;
  /** Dimensions to use instead of the host's */
  platform?: Partial<Platform>;
  recipeFile?: string;
  autoAcceptEvalDependencies?: boolean;
  signal?: AbortSignal;
}

/**
 * Target platform for eval: the host, with any overridden dimension
 * replacing it. Changing os away from linux drops family and libc unless
 * they were overridden too.
 */
export function resolveTargetPlatform(host: Platform, overrides: Partial<Platform> = {}): Platform {
  const os = overrides.os ?? host.os;
  const platform: Platform = { os, arch: overrides.arch ?? host.arch };
  const inherit = os === host.os;
  const family = overrides.linux_family ?? (inherit ? host.linux_family : undefined);
  const libc = overrides.libc ?? (inherit ? host.libc : undefined);
  if (family) {
    platform.linux_family = family;
  }
  if (libc) {
    platform.libc = libc;
  }
  return platform;
}

/**
 * Eval semantics: always a fresh plan, never read from or written to the
 * plan store.
 */
export async function runEvalPipeline(
  options: EvalPipelineOptions,
  services: PipelineServices
): Promise<CommandResult<InstallationPlan>> {
  const { tool, constraint } = parseToolSpec(options.spec);
  const loaded = await loadRootRecipe(tool, services, options.recipeFile);
  const platform = resolveTargetPlatform(await resolveHost(services), options.platform);

  const plan = await generatePlan(loaded, options.version ?? constraint, platform, {
    loader: services.loader,
    versions: services.versions,
    registry: services.registry,
    downloader: services.downloader,
    signal: options.signal,
    evalDependencies: services.evalDependencies,
    autoAcceptEvalDependencies: options.autoAcceptEvalDependencies ?? services.config.autoInstallEvalDeps
  });
  return { success: true, data: plan };
}

export interface InstallPipelineOptions {
  /** `tool` or `tool@constraint`; ignored with `planFile` */
  spec?: string;
  /** Regenerate even when a valid stored plan exists */
  fresh?: boolean;
  /** Install from a plan produced by `eval` instead of generating one */
  planFile?: string;
  signal?: AbortSignal;
  onStateChange?: (state: ExecutionState) => void;
}

export interface InstallPipelineResult {
  plan: InstallationPlan;
  fromCache: boolean;
  summary: ExecutionSummary;
}

/**
 * Install semantics: obtain a plan (stored, regenerated, or from a file),
 * execute it under the (tool, version) lock, then record the installation.
 */
export async function runInstallPipeline(
  options: InstallPipelineOptions,
  services: PipelineServices
): Promise<CommandResult<InstallPipelineResult>> {
  const output = resolveOutput(services);
  const host = await resolveHost(services);

  let plan: InstallationPlan;
  let fromCache = false;
  if (options.planFile) {
    plan = parsePlan(await readTextFile(options.planFile));
    logger.debug(`Installing from plan file ${options.planFile}`, { tool: plan.tool, version: plan.version });
  } else {
    if (!options.spec) {
      throw new GenerationError('Nothing to install: pass a tool name or --plan <file>');
    }
    const { tool, constraint } = parseToolSpec(options.spec);
    const loaded = await loadRootRecipe(tool, services);
    const spinner = output.spinner();
    spinner.start(`Planning ${options.spec}`);
    try {
      const generated = await generatePlanWithCache(loaded, constraint, host, {
        loader: services.loader,
        versions: services.versions,
        registry: services.registry,
        downloader: services.downloader,
        store: services.store,
        forceRefresh: options.fresh,
        storeGenerated: false,
        signal: options.signal,
        evalDependencies: services.evalDependencies,
        autoAcceptEvalDependencies: services.config.autoInstallEvalDeps
      });
      plan = generated.plan;
      fromCache = generated.fromCache;
    } finally {
      spinner.stop(`Planned ${options.spec}`);
    }
  }

  const summary = await withInstallLock(
    services.dirs.locks,
    plan.tool,
    plan.version,
    { timeoutMs: services.config.lockTimeoutMs, signal: options.signal },
    async () => {
      if (!fromCache && !options.planFile) {
        await storePlanSafely(services.store, plan);
      }
      const result = await executePlan(plan, {
        dirs: services.dirs,
        registry: services.registry,
        downloader: services.downloader,
        host,
        runCommand: services.runCommand,
        output,
        signal: options.signal,
        onStateChange: options.onStateChange,
        verify: true
      });
      // A plan file is stored only once it has installed successfully
      if (options.planFile) {
        await storePlanSafely(services.store, plan);
      }
      try {
        await services.store.markInstalled(plan.tool, plan.version);
      } catch (error) {
        logger.warn(`Could not record installation of ${plan.tool}@${plan.version}`, { error });
      }
      return result;
    }
  );

  output.success(`Installed ${plan.tool}@${plan.version}${fromCache ? ' (cached plan)' : ''}`);
  return { success: true, data: { plan, fromCache, summary } };
}
