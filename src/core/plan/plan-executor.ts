import { promises as fs } from 'fs';
import { delimiter, join } from 'path';
import { randomBytes } from 'crypto';
import type { InstallationPlan, Platform, QuiverDirectories, ResolvedStep } from '../../types/index.js';
import type { CommandRunner, ExecutionContext } from '../../types/execution-context.js';
import { MAX_PLAN_DEPENDENCIES, PLAN_FORMAT_VERSION, WORK_DIR_MODE } from '../../constants/index.js';
import { ChecksumMismatchError, ExecutionError, PlanValidationError } from '../../utils/errors.js';
import { ensureDir, exists, remove } from '../../utils/fs.js';
import { normalizeChecksum, sha256File } from '../../utils/hash.js';
import { runCommand as defaultRunCommand } from '../../utils/exec.js';
import { logger } from '../../utils/logger.js';
import { describePlatformMismatch } from '../platforms.js';
import { getToolInstallDirectory } from '../directory.js';
import type { ActionRegistry } from '../actions/registry.js';
import type { PrimitiveAction } from '../actions/base-action.js';
import { downloadDestination } from '../actions/primitives/download-file.js';
import type { Downloader } from '../download/downloader.js';
import { resolveOutput, type OutputPort } from '../ports/index.js';
import { dependencyKey } from '../dependencies/dependency-resolver.js';

export type ExecutionState =
  | { status: 'pending' }
  | { status: 'running'; tool: string; stepIndex: number }
  | { status: 'failed'; tool: string; stepIndex: number; cause: unknown }
  | { status: 'succeeded' };

export interface PlanValidationOptions {
  host: Platform;
  registry: ActionRegistry;
}

/**
 * Everything that must hold before a plan is allowed to touch the system.
 * All problems are reported together.
 */
export function validatePlan(plan: InstallationPlan, options: PlanValidationOptions): void {
  const issues: string[] = [];

  if (plan.format_version !== PLAN_FORMAT_VERSION) {
    issues.push(`unsupported format_version ${plan.format_version} (expected ${PLAN_FORMAT_VERSION})`);
  }

  const mismatch = describePlatformMismatch(plan.platform, options.host);
  if (mismatch) {
    issues.push(mismatch);
  }

  if (plan.dependencies.length > MAX_PLAN_DEPENDENCIES) {
    issues.push(`${plan.dependencies.length} dependencies exceeds the limit of ${MAX_PLAN_DEPENDENCIES}`);
  }

  const checkSteps = (steps: ResolvedStep[], where: string) => {
    steps.forEach((step, index) => {
      const at = `${where}[${index}] (${step.action})`;
      const action = options.registry.get(step.action);
      if (!action) {
        issues.push(`${at}: unknown action`);
      } else if (action.kind !== 'primitive') {
        issues.push(`${at}: composite actions cannot appear in a plan`);
      }
      if (step.action === 'download_file' && !step.checksum) {
        issues.push(`${at}: download has no checksum`);
      }
    });
  };

  checkSteps(plan.steps, 'steps');
  for (const node of plan.dependencies) {
    checkSteps(node.steps, `dependency ${dependencyKey(node.tool, node.version)} steps`);
  }

  if (issues.length > 0) {
    throw new PlanValidationError(issues);
  }
}

export interface PlanExecutorOptions {
  dirs: Pick<QuiverDirectories, 'tools' | 'runtime'>;
  registry: ActionRegistry;
  downloader: Downloader;
  host: Platform;
  runCommand?: CommandRunner;
  output?: OutputPort;
  signal?: AbortSignal;
  onStateChange?: (state: ExecutionState) => void;
  /** Run the recipe's verify command after the root steps */
  verify?: boolean;
}

export interface ExecutionSummary {
  tool: string;
  version: string;
  installDir: string;
  /** `tool@version` keys installed by this run */
  installedDependencies: string[];
  /** Dependencies found already installed */
  skippedDependencies: string[];
}

interface ExecutionUnit {
  tool: string;
  version: string;
  steps: ResolvedStep[];
  dependencyBinDirs: string[];
}

/**
 * Runs a validated plan. Dependencies go first, in plan order, then the
 * root tool. Each tool is staged in a scratch install directory and moved
 * into tools/<tool>-<version> only after all of its steps succeed. There are
 * no retries: the first failing step ends the run.
 */
export class PlanExecutor {
  private currentState: ExecutionState = { status: 'pending' };
  private readonly runCommand: CommandRunner;
  private readonly output: OutputPort;

  constructor(private readonly options: PlanExecutorOptions) {
    this.runCommand = options.runCommand ?? defaultRunCommand;
    this.output = resolveOutput(options);
  }

  get state(): ExecutionState {
    return this.currentState;
  }

  private transition(next: ExecutionState): void {
    this.currentState = next;
    this.options.onStateChange?.(next);
  }

  async execute(plan: InstallationPlan): Promise<ExecutionSummary> {
    if (this.currentState.status !== 'pending') {
      throw new Error(`executor already used (state: ${this.currentState.status})`);
    }
    validatePlan(plan, { host: this.options.host, registry: this.options.registry });

    const summary: ExecutionSummary = {
      tool: plan.tool,
      version: plan.version,
      installDir: getToolInstallDirectory(this.options.dirs, plan.tool, plan.version),
      installedDependencies: [],
      skippedDependencies: []
    };
    const binDirOf = (key: string): string | undefined => {
      const node = plan.dependencies.find(dep => dependencyKey(dep.tool, dep.version) === key);
      return node ? join(getToolInstallDirectory(this.options.dirs, node.tool, node.version), 'bin') : undefined;
    };

    for (const node of plan.dependencies) {
      const key = dependencyKey(node.tool, node.version);
      this.checkAborted(node.tool, 0);
      if (await exists(getToolInstallDirectory(this.options.dirs, node.tool, node.version))) {
        logger.debug(`Dependency ${key} already installed`);
        summary.skippedDependencies.push(key);
        continue;
      }
      this.output.step(`Installing dependency ${key}`);
      await this.runUnit(plan, {
        tool: node.tool,
        version: node.version,
        steps: node.steps,
        dependencyBinDirs: node.dependencies.map(binDirOf).filter((dir): dir is string => dir !== undefined)
      });
      summary.installedDependencies.push(key);
    }

    this.checkAborted(plan.tool, 0);
    this.output.step(`Installing ${plan.tool}@${plan.version}`);
    const rootBinDirs = [...plan.dependencies]
      .reverse()
      .map(node => join(getToolInstallDirectory(this.options.dirs, node.tool, node.version), 'bin'));
    await this.runUnit(plan, { tool: plan.tool, version: plan.version, steps: plan.steps, dependencyBinDirs: rootBinDirs });

    if (this.options.verify && plan.verify) {
      await this.verifyInstall(plan, summary.installDir, rootBinDirs);
    }

    this.transition({ status: 'succeeded' });
    return summary;
  }

  private checkAborted(tool: string, stepIndex: number): void {
    const signal = this.options.signal;
    if (signal?.aborted) {
      this.transition({ status: 'failed', tool, stepIndex, cause: signal.reason });
      signal.throwIfAborted();
    }
  }

  private async runUnit(plan: InstallationPlan, unit: ExecutionUnit): Promise<void> {
    const { dirs } = this.options;
    const finalDir = getToolInstallDirectory(dirs, unit.tool, unit.version);
    const stagingDir = join(dirs.tools, `.${unit.tool}-${unit.version}.${randomBytes(6).toString('hex')}.staging`);

    await ensureDir(dirs.runtime);
    const workDir = await fs.mkdtemp(join(dirs.runtime, `${unit.tool}-${unit.version}-`));
    await fs.chmod(workDir, WORK_DIR_MODE);
    await ensureDir(stagingDir);

    const ctx: ExecutionContext = {
      tool: unit.tool,
      version: unit.version,
      platform: plan.platform,
      workDir,
      installDir: stagingDir,
      dependencyBinDirs: unit.dependencyBinDirs,
      downloader: this.options.downloader,
      runCommand: this.runCommand,
      logger,
      output: this.output,
      signal: this.options.signal
    };

    try {
      for (const [index, step] of unit.steps.entries()) {
        this.checkAborted(unit.tool, index);
        this.transition({ status: 'running', tool: unit.tool, stepIndex: index });
        logger.debug(`${unit.tool} step ${index}: ${step.action}`, { params: step.params });
        try {
          await this.runStep(plan, step, ctx);
        } catch (error) {
          const failure = error instanceof ChecksumMismatchError ? error : new ExecutionError(index, step.action, error, unit.tool);
          this.transition({ status: 'failed', tool: unit.tool, stepIndex: index, cause: failure });
          throw failure;
        }
      }

      await remove(finalDir);
      await fs.rename(stagingDir, finalDir);
      logger.debug(`Installed ${unit.tool}@${unit.version} to ${finalDir}`);
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private primitive(name: string): PrimitiveAction {
    const action = this.options.registry.get(name);
    if (!action || action.kind !== 'primitive') {
      throw new Error(`'${name}' is not a registered primitive action`);
    }
    return action;
  }

  private async runStep(plan: InstallationPlan, step: ResolvedStep, ctx: ExecutionContext): Promise<void> {
    const action = this.primitive(step.action);
    if (step.action !== 'download_file') {
      await action.execute(step.params, ctx);
      return;
    }

    const expected = normalizeChecksum(step.checksum ?? '');
    const params = { ...step.params, checksum: expected };
    await action.execute(params, ctx);

    const actual = await sha256File(downloadDestination(params, ctx.workDir));
    if (actual !== expected) {
      throw new ChecksumMismatchError({
        tool: plan.tool,
        version: plan.version,
        url: step.url ?? String(step.params.url),
        expected,
        actual,
        ...(ctx.tool === plan.tool ? {} : { dependency: ctx.tool })
      });
    }
  }

  private async verifyInstall(plan: InstallationPlan, installDir: string, dependencyBinDirs: string[]): Promise<void> {
    const verify = plan.verify;
    if (!verify) {
      return;
    }
    const stepIndex = plan.steps.length;
    this.transition({ status: 'running', tool: plan.tool, stepIndex });
    try {
      const path = [join(installDir, 'bin'), ...dependencyBinDirs, process.env.PATH ?? ''].filter(Boolean).join(delimiter);
      const { stdout, stderr } = await this.runCommand('sh', ['-c', verify.command], {
        env: { ...process.env, PATH: path },
        signal: this.options.signal
      });
      const expected = (verify.pattern ?? '').split('{version}').join(plan.version);
      if (expected && !`${stdout}\n${stderr}`.includes(expected)) {
        throw new Error(`output of '${verify.command}' does not contain '${expected}'`);
      }
    } catch (error) {
      const failure = new ExecutionError(stepIndex, 'verify', error, plan.tool);
      this.transition({ status: 'failed', tool: plan.tool, stepIndex, cause: failure });
      throw failure;
    }
  }
}

export async function executePlan(plan: InstallationPlan, options: PlanExecutorOptions): Promise<ExecutionSummary> {
  return new PlanExecutor(options).execute(plan);
}
