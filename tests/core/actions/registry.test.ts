import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { StepParams } from '../../../src/types/index.js';
import type { ExecutionContext } from '../../../src/types/execution-context.js';
import type { OutputPort } from '../../../src/core/ports/output.js';
import { createBuiltinRegistry, ActionRegistry } from '../../../src/core/actions/registry.js';
import { ParamError, parseBinaries, baseName } from '../../../src/core/actions/params.js';
import { detectArchiveFormat } from '../../../src/core/actions/primitives/extract.js';
import { resolveInside } from '../../../src/core/actions/primitives/paths.js';
import { silentOutput } from '../../../src/core/ports/index.js';
import { logger } from '../../../src/utils/logger.js';
import {
  FakeDownloader,
  LINUX_DEBIAN,
  RecordingAction,
  makeTempDir,
  recordingRunner,
  type RecordedCommand
} from '../../test-helpers.js';

describe('ActionRegistry', () => {
  it('registers every builtin action', () => {
    const registry = createBuiltinRegistry();
    assert.deepEqual(registry.names(), [
      'apk_install',
      'apt_install',
      'brew_install',
      'chmod',
      'dnf_install',
      'download_archive',
      'download_file',
      'extract',
      'github_archive',
      'github_file',
      'go_build',
      'go_install',
      'install_binaries',
      'npm_exec',
      'npm_install',
      'pacman_install',
      'set_env',
      'zypper_install'
    ]);
  });

  it('tells primitives from composites', () => {
    const registry = createBuiltinRegistry();
    assert.equal(registry.isPrimitive('download_file'), true);
    assert.equal(registry.isPrimitive('github_archive'), false);
    assert.equal(registry.isPrimitive('nope'), false);
  });

  it('lets a later registration replace a builtin', () => {
    const registry = createBuiltinRegistry();
    const replacement = new RecordingAction('chmod', []);
    registry.register(replacement);
    assert.equal(registry.get('chmod'), replacement);
  });

  it('declares capabilities on the builtin actions', () => {
    const registry = createBuiltinRegistry();
    assert.equal(registry.get('download_file')?.requiresNetwork, true);
    assert.equal(registry.get('download_file')?.deterministic, true);
    assert.equal(registry.get('npm_exec')?.deterministic, false);
    assert.deepEqual(registry.get('npm_exec')?.implicitDependencies, ['nodejs']);
    assert.deepEqual(registry.get('go_install')?.evalDependencies, ['go']);
    assert.deepEqual(registry.get('apt_install')?.platformConstraint, { os: 'linux', linuxFamily: 'debian' });
    assert.equal(new ActionRegistry().has('chmod'), false);
  });
});

describe('params', () => {
  it('parses binaries given as paths or tables', () => {
    assert.deepEqual(parseBinaries(['bin/gh', { src: 'out/tool-linux', dest: 'tool' }]), [
      { src: 'bin/gh', dest: 'gh' },
      { src: 'out/tool-linux', dest: 'tool' }
    ]);
    assert.throws(() => parseBinaries([3]), ParamError);
  });

  it('takes the last URL segment without the query', () => {
    assert.equal(baseName('https://example.com/dl/tool.tar.gz?raw=1'), 'tool.tar.gz');
  });

  it('detects the longest matching archive suffix', () => {
    assert.equal(detectArchiveFormat('tool-1.0.tar.gz'), 'tar.gz');
    assert.equal(detectArchiveFormat('tool.zip'), 'zip');
    assert.equal(detectArchiveFormat('tool.exe'), undefined);
  });

  it('keeps step paths inside their directory', () => {
    assert.equal(resolveInside('/work', 'a/b'), '/work/a/b');
    assert.throws(() => resolveInside('/work', '../etc/passwd'), /escapes its directory/);
    assert.throws(() => resolveInside('/work', '/etc/passwd'), /must be relative/);
  });
});

describe('primitive validation', () => {
  const registry = createBuiltinRegistry();

  function validate(action: string, params: StepParams): void {
    const found = registry.get(action);
    if (!found || found.kind !== 'primitive') {
      throw new Error(`${action} is not a primitive`);
    }
    found.validate(params);
  }

  it('requires an http(s) URL for downloads', () => {
    assert.throws(() => validate('download_file', { url: 'ftp://example.com/x' }), /must be an http\(s\) URL/);
    assert.doesNotThrow(() => validate('download_file', { url: 'https://example.com/x' }));
  });

  it('rejects strip_dirs on zip archives', () => {
    assert.throws(() => validate('extract', { archive: 'a.zip', strip_dirs: 1 }), /not supported for zip/);
  });

  it('rejects invalid environment variable names', () => {
    assert.throws(() => validate('set_env', { vars: { 'BAD-NAME': 'x' } }), /not a valid environment variable name/);
  });

  it('rejects non-octal chmod modes', () => {
    assert.throws(() => validate('chmod', { files: ['a'], mode: '999' }), /must be an octal string/);
  });
});

describe('primitive execution', () => {
  let root: string;
  let workDir: string;
  let installDir: string;
  let calls: RecordedCommand[];
  let warnings: string[];
  let downloader: FakeDownloader;

  function context(): ExecutionContext {
    const output: OutputPort = { ...silentOutput, warn: (message: string) => warnings.push(message) };
    return {
      tool: 'demo',
      version: '1.0.0',
      platform: LINUX_DEBIAN,
      workDir,
      installDir,
      dependencyBinDirs: ['/deps/bin'],
      downloader,
      runCommand: recordingRunner(calls),
      logger,
      output
    };
  }

  before(async () => {
    root = await makeTempDir('actions');
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function reset(): Promise<void> {
    workDir = await fs.mkdtemp(join(root, 'work-'));
    installDir = join(workDir, 'install');
    calls = [];
    warnings = [];
    downloader = new FakeDownloader(join(root, 'downloads'), { 'https://example.com/tool.tar.gz': 'archive-bytes' });
  }

  it('download_file copies the fetched file into the work dir', async () => {
    await reset();
    const action = createBuiltinRegistry().get('download_file');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ url: 'https://example.com/tool.tar.gz', checksum: 'abc' }, context());

    assert.equal(await fs.readFile(join(workDir, 'tool.tar.gz'), 'utf8'), 'archive-bytes');
    assert.deepEqual(downloader.requests, [{ url: 'https://example.com/tool.tar.gz', expectedChecksum: 'abc' }]);
  });

  it('extract runs tar with the compression flag and strip count', async () => {
    await reset();
    const action = createBuiltinRegistry().get('extract');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ archive: 'tool.tar.gz', strip_dirs: 1 }, context());

    assert.equal(calls.length, 1);
    assert.equal(calls[0].file, 'tar');
    assert.deepEqual(calls[0].args, ['-xzf', join(workDir, 'tool.tar.gz'), '-C', workDir, '--strip-components=1']);
  });

  it('extract uses unzip for zip archives', async () => {
    await reset();
    const action = createBuiltinRegistry().get('extract');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ archive: 'tool.zip', dest: 'out' }, context());

    assert.deepEqual(calls[0].args, ['-o', '-q', join(workDir, 'tool.zip'), '-d', join(workDir, 'out')]);
  });

  it('chmod and install_binaries put executables under bin/', async () => {
    await reset();
    await fs.mkdir(join(workDir, 'dist'));
    await fs.writeFile(join(workDir, 'dist', 'demo-linux'), '#!/bin/sh\n');
    const registry = createBuiltinRegistry();
    const chmod = registry.get('chmod');
    const install = registry.get('install_binaries');
    assert.ok(chmod?.kind === 'primitive' && install?.kind === 'primitive');

    await chmod.execute({ files: ['dist/demo-linux'], mode: '700' }, context());
    assert.equal((await fs.stat(join(workDir, 'dist', 'demo-linux'))).mode & 0o777, 0o700);

    await install.execute({ binaries: [{ src: 'dist/demo-linux', dest: 'demo' }] }, context());
    const installed = join(installDir, 'bin', 'demo');
    assert.equal(await fs.readFile(installed, 'utf8'), '#!/bin/sh\n');
    assert.equal((await fs.stat(installed)).mode & 0o777, 0o755);
  });

  it('set_env appends quoted exports to env.sh', async () => {
    await reset();
    const action = createBuiltinRegistry().get('set_env');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ vars: { DEMO_HOME: '/opt/demo', GREETING: "it's" } }, context());

    assert.equal(
      await fs.readFile(join(installDir, 'env.sh'), 'utf8'),
      "export DEMO_HOME='/opt/demo'\nexport GREETING='it'\\''s'\n"
    );
  });

  it('system package actions only report the command to run', async () => {
    await reset();
    const action = createBuiltinRegistry().get('apt_install');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ packages: ['libssl-dev', 'pkg-config'] }, context());

    assert.deepEqual(calls, []);
    assert.deepEqual(warnings, ['demo requires system packages. Run: sudo apt-get install -y libssl-dev pkg-config']);
  });

  it('npm_exec installs under the tool prefix with dependency bins on PATH', async () => {
    await reset();
    const action = createBuiltinRegistry().get('npm_exec');
    assert.ok(action?.kind === 'primitive');
    await action.execute({ package: 'prettier', version: '3.3.3' }, context());

    assert.equal(calls[0].file, 'npm');
    assert.deepEqual(calls[0].args, ['install', '-g', '--prefix', installDir, 'prettier@3.3.3']);
    assert.ok(calls[0].options?.env?.PATH?.startsWith('/deps/bin'));
  });
});
