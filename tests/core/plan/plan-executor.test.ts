import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { InstallationPlan, QuiverDirectories, StepParams } from '../../../src/types/index.js';
import type { ExecutionContext } from '../../../src/types/execution-context.js';
import { PrimitiveAction } from '../../../src/core/actions/base-action.js';
import { createBuiltinRegistry, type ActionRegistry } from '../../../src/core/actions/registry.js';
import { PlanExecutor, executePlan, validatePlan, type ExecutionState } from '../../../src/core/plan/plan-executor.js';
import { silentOutput } from '../../../src/core/ports/index.js';
import { ChecksumMismatchError, ExecutionError, PlanValidationError } from '../../../src/utils/errors.js';
import {
  FakeDownloader,
  LINUX_ALPINE,
  LINUX_DEBIAN,
  RecordingAction,
  checksumOf,
  makeTempDir,
  recordingRunner,
  samplePlan,
  testDirectories,
  type RecordedCommand,
  type RecordedExecution
} from '../../test-helpers.js';

const ASSET_URL = 'https://example.com/demo-1.0.0.tgz';

class AbortingAction extends PrimitiveAction {
  readonly name = 'abort_run';

  constructor(private readonly controller: AbortController) {
    super();
  }

  async execute(_params: StepParams, _ctx: ExecutionContext): Promise<void> {
    this.controller.abort();
  }
}

describe('validatePlan', () => {
  it('reports every problem at once', () => {
    const plan = samplePlan({
      format_version: 2,
      platform: { ...LINUX_ALPINE },
      steps: [
        { action: 'github_archive', params: {}, deterministic: true },
        { action: 'nope', params: {}, deterministic: true },
        { action: 'download_file', params: { url: ASSET_URL }, deterministic: true, url: ASSET_URL }
      ]
    });

    assert.throws(
      () => validatePlan(plan, { host: LINUX_DEBIAN, registry: createBuiltinRegistry() }),
      (error: unknown) => {
        assert.ok(error instanceof PlanValidationError);
        assert.deepEqual(error.issues, [
          'unsupported format_version 2 (expected 3)',
          "plan targets linux family 'alpine' but host is 'debian'",
          'steps[0] (github_archive): composite actions cannot appear in a plan',
          'steps[1] (nope): unknown action',
          'steps[2] (download_file): download has no checksum'
        ]);
        return true;
      }
    );
  });

  it('labels dependency steps with their node', () => {
    const plan = samplePlan({
      dependencies: [{ tool: 'zlib', version: '1.3.1', recipe_hash: 'h', steps: [{ action: 'nope', params: {}, deterministic: true }], dependencies: [] }]
    });
    assert.throws(
      () => validatePlan(plan, { host: LINUX_DEBIAN, registry: createBuiltinRegistry() }),
      (error: unknown) => error instanceof PlanValidationError
        && error.issues[0] === 'dependency zlib@1.3.1 steps[0] (nope): unknown action'
    );
  });
});

describe('PlanExecutor', () => {
  let root: string;
  let dirs: QuiverDirectories;
  let log: RecordedExecution[];
  let registry: ActionRegistry;
  let downloader: FakeDownloader;
  let states: ExecutionState[];

  beforeEach(async () => {
    root = await makeTempDir('executor');
    dirs = testDirectories(root);
    log = [];
    registry = createBuiltinRegistry();
    registry.register(new RecordingAction('record', log));
    registry.register(new RecordingAction('explode', log, new Error('boom')));
    downloader = new FakeDownloader(join(root, 'downloads'), { [ASSET_URL]: 'release-bytes' });
    states = [];
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function executor(extra: { signal?: AbortSignal; calls?: RecordedCommand[]; stdout?: string } = {}): PlanExecutor {
    return new PlanExecutor({
      dirs,
      registry,
      downloader,
      host: LINUX_DEBIAN,
      output: silentOutput,
      signal: extra.signal,
      runCommand: recordingRunner(extra.calls ?? [], () => ({ stdout: extra.stdout ?? '', stderr: '' })),
      onStateChange: state => states.push(state),
      verify: true
    });
  }

  function downloadPlan(checksum: string): InstallationPlan {
    return samplePlan({
      steps: [
        {
          action: 'download_file',
          params: { url: ASSET_URL, dest: 'demo.tgz' },
          deterministic: true,
          url: ASSET_URL,
          checksum
        },
        { action: 'record', params: { after: 'download' }, deterministic: true },
        { action: 'set_env', params: { vars: { DEMO_HOME: '/opt/demo' } }, deterministic: true }
      ]
    });
  }

  it('installs into tools/<tool>-<version> and reports each step', async () => {
    const summary = await executor().execute(downloadPlan(`sha256:${checksumOf('release-bytes').toUpperCase()}`));

    const installDir = join(dirs.tools, 'demo-1.0.0');
    assert.deepEqual(summary, {
      tool: 'demo',
      version: '1.0.0',
      installDir,
      installedDependencies: [],
      skippedDependencies: []
    });
    assert.equal(await fs.readFile(join(installDir, 'env.sh'), 'utf8'), "export DEMO_HOME='/opt/demo'\n");
    assert.deepEqual(states, [
      { status: 'running', tool: 'demo', stepIndex: 0 },
      { status: 'running', tool: 'demo', stepIndex: 1 },
      { status: 'running', tool: 'demo', stepIndex: 2 },
      { status: 'succeeded' }
    ]);
    assert.deepEqual(await fs.readdir(dirs.tools), ['demo-1.0.0']);
    assert.deepEqual(await fs.readdir(dirs.runtime), []);
  });

  it('stops at a checksum mismatch and leaves nothing installed', async () => {
    const run = executor();
    await assert.rejects(run.execute(downloadPlan(checksumOf('original-bytes'))), (error: unknown) => {
      assert.ok(error instanceof ChecksumMismatchError);
      assert.equal(error.expected, checksumOf('original-bytes'));
      assert.equal(error.actual, checksumOf('release-bytes'));
      assert.ok(error.message.includes('quiver install demo@1.0.0 --fresh'));
      assert.equal(error.dependency, undefined);
      return true;
    });

    assert.deepEqual(log, []);
    assert.equal(run.state.status, 'failed');
    assert.deepEqual(await fs.readdir(dirs.tools), []);
    assert.deepEqual(await fs.readdir(dirs.runtime), []);
  });

  it('names the dependency whose download no longer matches', async () => {
    const plan = samplePlan({
      steps: [{ action: 'record', params: {}, deterministic: true }],
      dependencies: [{
        tool: 'zlib',
        version: '1.3.1',
        recipe_hash: 'h',
        steps: [{
          action: 'download_file',
          params: { url: ASSET_URL, dest: 'zlib.tgz' },
          deterministic: true,
          url: ASSET_URL,
          checksum: checksumOf('original-bytes')
        }],
        dependencies: []
      }]
    });

    await assert.rejects(executor().execute(plan), (error: unknown) => {
      assert.ok(error instanceof ChecksumMismatchError);
      assert.equal(error.dependency, 'zlib');
      assert.equal(error.tool, 'demo');
      assert.equal(error.details?.dependency, 'zlib');
      assert.equal(error.message.split('\n')[0], `checksum mismatch for ${ASSET_URL} (dependency 'zlib')`);
      return true;
    });
    assert.deepEqual(log, []);
  });

  it('wraps step failures with the tool, step and action', async () => {
    const plan = samplePlan({ steps: [{ action: 'explode', params: {}, deterministic: true }] });
    const run = executor();

    await assert.rejects(run.execute(plan), (error: unknown) => {
      assert.ok(error instanceof ExecutionError);
      assert.equal(error.message, 'demo step 0 (explode) failed: boom');
      assert.ok(error.cause instanceof Error);
      return true;
    });
    const state = run.state;
    assert.ok(state.status === 'failed');
    assert.equal(state.tool, 'demo');
    assert.equal(state.stepIndex, 0);
    assert.ok(state.cause instanceof ExecutionError);
  });

  it('installs missing dependencies first and skips installed ones', async () => {
    await fs.mkdir(join(dirs.tools, 'pkgconf-2.0.0'), { recursive: true });
    const calls: RecordedCommand[] = [];
    const plan = samplePlan({
      steps: [{ action: 'record', params: {}, deterministic: true }],
      dependencies: [
        { tool: 'zlib', version: '1.3.1', recipe_hash: 'hz', steps: [{ action: 'record', params: {}, deterministic: true }], dependencies: [] },
        { tool: 'pkgconf', version: '2.0.0', recipe_hash: 'hp', steps: [{ action: 'record', params: {}, deterministic: true }], dependencies: [] }
      ],
      verify: { command: 'demo --version', pattern: 'demo {version}' }
    });

    const summary = await executor({ calls, stdout: 'demo 1.0.0\n' }).execute(plan);

    assert.deepEqual(log.map(entry => entry.tool), ['zlib', 'demo']);
    assert.deepEqual(summary.installedDependencies, ['zlib@1.3.1']);
    assert.deepEqual(summary.skippedDependencies, ['pkgconf@2.0.0']);

    assert.equal(calls.length, 1);
    assert.equal(calls[0].file, 'sh');
    assert.deepEqual(calls[0].args, ['-c', 'demo --version']);
    const path = calls[0].options?.env?.PATH ?? '';
    assert.ok(path.startsWith([
      join(dirs.tools, 'demo-1.0.0', 'bin'),
      join(dirs.tools, 'pkgconf-2.0.0', 'bin'),
      join(dirs.tools, 'zlib-1.3.1', 'bin')
    ].join(delimiter)));
  });

  it('fails verification when the output lacks the pattern', async () => {
    const plan = samplePlan({ verify: { command: 'demo --version', pattern: '{version}' } });
    await assert.rejects(
      executor({ stdout: 'demo 0.9.0' }).execute(plan),
      (error: unknown) => error instanceof ExecutionError
        && error.message === "demo step 1 (verify) failed: output of 'demo --version' does not contain '1.0.0'"
    );
  });

  it('stops between steps once aborted', async () => {
    const controller = new AbortController();
    registry.register(new AbortingAction(controller));
    const plan = samplePlan({
      steps: [
        { action: 'abort_run', params: {}, deterministic: true },
        { action: 'record', params: {}, deterministic: true }
      ]
    });
    const run = executor({ signal: controller.signal });

    await assert.rejects(run.execute(plan), { name: 'AbortError' });
    assert.deepEqual(log, []);
    assert.equal(run.state.status, 'failed');
    assert.deepEqual(await fs.readdir(dirs.tools), []);
  });

  it('refuses an invalid plan before touching the system', async () => {
    const plan = samplePlan({ platform: { os: 'darwin', arch: 'arm64' } });
    await assert.rejects(
      executePlan(plan, { dirs, registry, downloader, host: LINUX_DEBIAN, output: silentOutput }),
      PlanValidationError
    );
    await assert.rejects(fs.access(dirs.tools));
  });

  it('runs only once', async () => {
    const run = executor();
    await run.execute(samplePlan());
    await assert.rejects(run.execute(samplePlan()), /executor already used \(state: succeeded\)/);
  });
});
