import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { StepParams } from '../../../src/types/index.js';
import { CompositeAction } from '../../../src/core/actions/base-action.js';
import type { ActionStep } from '../../../src/core/actions/types.js';
import { ActionRegistry, createBuiltinRegistry } from '../../../src/core/actions/registry.js';
import { decomposeSteps, satisfiesConstraint, type DecompositionContext } from '../../../src/core/plan/decomposer.js';
import { StepGenerationError } from '../../../src/utils/errors.js';
import { DARWIN_ARM, LINUX_DEBIAN, step } from '../../test-helpers.js';

const GH_CONTEXT: DecompositionContext = {
  tool: 'gh',
  version: '2.40.0',
  versionTag: 'v2.40.0',
  platform: LINUX_DEBIAN
};

const GH_ARCHIVE = step({
  action: 'github_archive',
  params: {
    repo: 'cli/cli',
    asset_pattern: 'gh_{version}_{os}_{arch}.tar.gz',
    archive_format: 'tar.gz',
    strip_dirs: 1,
    binaries: ['bin/gh']
  }
});

class LoopAction extends CompositeAction {
  constructor(readonly name: string, private readonly next: string) {
    super();
  }

  decompose(_params: StepParams): ActionStep[] {
    return [{ action: this.next, params: {} }];
  }
}

function stepMessage(error: unknown): string {
  assert.ok(error instanceof StepGenerationError);
  return error.message;
}

describe('decomposeSteps', () => {
  it('expands github_archive into four primitives with variables filled in', () => {
    const result = decomposeSteps([GH_ARCHIVE], GH_CONTEXT, createBuiltinRegistry());
    const url = 'https://github.com/cli/cli/releases/download/v2.40.0/gh_2.40.0_linux_amd64.tar.gz';

    assert.deepEqual(result.steps, [
      {
        action: 'download_file',
        params: { url, dest: 'gh_2.40.0_linux_amd64.tar.gz' },
        deterministic: true,
        url
      },
      {
        action: 'extract',
        params: { archive: 'gh_2.40.0_linux_amd64.tar.gz', format: 'tar.gz', strip_dirs: 1 },
        deterministic: true
      },
      { action: 'chmod', params: { files: ['bin/gh'] }, deterministic: true },
      { action: 'install_binaries', params: { binaries: [{ src: 'bin/gh', dest: 'gh' }] }, deterministic: true }
    ]);
    assert.deepEqual(result.implicitDependencies, []);
    assert.deepEqual(result.evalDependencies, []);
  });

  it('drops steps whose when clause excludes the target', () => {
    const darwinOnly = step({ action: 'set_env', params: { vars: { GH_MAC: '1' } }, when: { os: ['darwin'] } });
    const result = decomposeSteps([GH_ARCHIVE, darwinOnly], GH_CONTEXT, createBuiltinRegistry());

    assert.equal(result.steps.length, 4);
    assert.deepEqual(result.activeSteps, [GH_ARCHIVE]);
    assert.ok(result.steps.every(resolved => resolved.action !== 'set_env'));
  });

  it('keeps the package manager step for the target family', () => {
    const steps = [
      step({ action: 'apt_install', params: { packages: ['libssl-dev'] } }),
      step({ action: 'dnf_install', params: { packages: ['openssl-devel'] } }),
      step({ action: 'brew_install', params: { packages: ['openssl@3'] } })
    ];
    const registry = createBuiltinRegistry();
    const actionsFor = (platform: DecompositionContext['platform']) =>
      decomposeSteps(steps, { ...GH_CONTEXT, platform }, registry).steps.map(resolved => resolved.action);

    assert.deepEqual(actionsFor(LINUX_DEBIAN), ['apt_install']);
    assert.deepEqual(actionsFor({ os: 'linux', arch: 'amd64' }), ['apt_install', 'dnf_install']);
    assert.deepEqual(actionsFor(DARWIN_ARM), ['brew_install']);
  });

  it('is deterministic for identical inputs', () => {
    const registry = createBuiltinRegistry();
    assert.deepEqual(
      decomposeSteps([GH_ARCHIVE], GH_CONTEXT, registry),
      decomposeSteps([GH_ARCHIVE], GH_CONTEXT, registry)
    );
  });

  it('collects implicit and eval-time dependencies', () => {
    const result = decomposeSteps(
      [step({ action: 'npm_install', params: { package: 'prettier' } })],
      { ...GH_CONTEXT, tool: 'prettier', version: '3.3.3', versionTag: '3.3.3' },
      createBuiltinRegistry()
    );

    assert.deepEqual(result.steps, [
      { action: 'npm_exec', params: { package: 'prettier', version: '3.3.3' }, deterministic: false }
    ]);
    assert.deepEqual(result.implicitDependencies, ['nodejs']);
    assert.deepEqual(result.evalDependencies, ['nodejs']);
  });

  it('applies os_mapping to the step and removes the mapping from params', () => {
    const result = decomposeSteps(
      [step({
        action: 'download_file',
        params: { url: 'https://example.com/tool-{os}-{arch}', os_mapping: { linux: 'Linux' }, arch_mapping: { amd64: 'x86_64' } }
      })],
      GH_CONTEXT,
      createBuiltinRegistry()
    );
    assert.deepEqual(result.steps[0].params, { url: 'https://example.com/tool-Linux-x86_64' });
  });

  it('reports unknown actions with the step position', () => {
    assert.throws(
      () => decomposeSteps([GH_ARCHIVE, step({ action: 'frobnicate' })], GH_CONTEXT, createBuiltinRegistry()),
      (error: unknown) => stepMessage(error) === "steps[1] (frobnicate): unknown action 'frobnicate'"
    );
  });

  it('reports unknown variables', () => {
    assert.throws(
      () => decomposeSteps([step({ action: 'set_env', params: { vars: { X: '{flavor}' } } })], GH_CONTEXT, createBuiltinRegistry()),
      (error: unknown) => stepMessage(error) === "steps[0] (set_env): unknown variable '{flavor}'"
    );
  });

  it('reports composite parameter errors against the recipe step', () => {
    const bad = step({
      action: 'github_archive',
      params: { repo: 'cli/cli', asset_pattern: 'gh.rar', archive_format: 'rar', binaries: ['gh'] }
    });
    assert.throws(
      () => decomposeSteps([bad], GH_CONTEXT, createBuiltinRegistry()),
      (error: unknown) => stepMessage(error).startsWith("steps[0] (github_archive): unsupported archive format 'rar'")
    );
  });

  it('detects decomposition cycles', () => {
    const registry = new ActionRegistry([new LoopAction('loop_a', 'loop_b'), new LoopAction('loop_b', 'loop_a')]);
    assert.throws(
      () => decomposeSteps([step({ action: 'loop_a' })], GH_CONTEXT, registry),
      (error: unknown) => stepMessage(error) === 'steps[0] (loop_a): decomposition cycle: loop_a -> loop_b -> loop_a'
    );
  });
});

describe('satisfiesConstraint', () => {
  it('treats an unknown linux family as a match', () => {
    assert.equal(satisfiesConstraint({ os: 'linux', linuxFamily: 'rhel' }, { os: 'linux', arch: 'arm64' }), true);
    assert.equal(satisfiesConstraint({ os: 'linux', linuxFamily: 'rhel' }, LINUX_DEBIAN), false);
    assert.equal(satisfiesConstraint({ os: 'darwin' }, LINUX_DEBIAN), false);
    assert.equal(satisfiesConstraint(undefined, DARWIN_ARM), true);
  });
});
