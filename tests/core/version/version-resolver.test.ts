import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { VersionSpec } from '../../../src/types/index.js';
import { VersionResolver } from '../../../src/core/version/version-resolver.js';
import { StaticVersionProvider } from '../../../src/core/version/providers/static-provider.js';
import { GitHubVersionProvider } from '../../../src/core/version/providers/github-provider.js';
import { versionFromTag } from '../../../src/core/version/providers/listing-provider.js';
import { VersionResolutionError, type VersionResolutionErrorKind } from '../../../src/utils/errors.js';
import { fakeFetch } from '../../test-helpers.js';

const RELEASES_URL = 'https://api.github.com/repos/cli/cli/releases?per_page=100';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function failsWith(kind: VersionResolutionErrorKind) {
  return (error: unknown) => error instanceof VersionResolutionError && error.kind === kind;
}

const STATIC: VersionSpec = { source: 'static', versions: ['1.2.0', '1.3.0', '1.3.1-rc.1', '2.0.0'] };

describe('versionFromTag', () => {
  it('drops a leading v only before a digit', () => {
    assert.equal(versionFromTag('v1.2.3'), '1.2.3');
    assert.equal(versionFromTag('version-1'), 'version-1');
  });

  it('requires the configured prefix', () => {
    assert.equal(versionFromTag('jq-1.7.1', 'jq-'), '1.7.1');
    assert.equal(versionFromTag('v1.7.1', 'jq-'), undefined);
  });
});

describe('VersionResolver with the static source', () => {
  const resolver = new VersionResolver([new StaticVersionProvider()]);

  it('picks the newest stable version for latest', async () => {
    assert.deepEqual(await resolver.resolveVersion(STATIC, ''), { version: '2.0.0', tag: '2.0.0' });
    assert.deepEqual(await resolver.resolveVersion(STATIC, 'latest'), { version: '2.0.0', tag: '2.0.0' });
  });

  it('picks the newest stable version in a range', async () => {
    assert.deepEqual(await resolver.resolveVersion(STATIC, '^1.2'), { version: '1.3.0', tag: '1.3.0' });
  });

  it('matches exact versions, including pre-releases and a v prefix', async () => {
    assert.deepEqual(await resolver.resolveVersion(STATIC, '1.3.1-rc.1'), { version: '1.3.1-rc.1', tag: '1.3.1-rc.1' });
    assert.deepEqual(await resolver.resolveVersion(STATIC, 'v1.2.0'), { version: '1.2.0', tag: '1.2.0' });
  });

  it('fails with not_found when nothing matches', async () => {
    await assert.rejects(resolver.resolveVersion(STATIC, '9.9.9'), failsWith('not_found'));
    await assert.rejects(resolver.resolveVersion(STATIC, '^3'), failsWith('not_found'));
  });

  it('strips a configured tag prefix', async () => {
    const spec: VersionSpec = { source: 'static', tag_prefix: 'jq-', versions: ['jq-1.6', 'jq-1.7.1'] };
    assert.deepEqual(await resolver.resolveVersion(spec, '1.7.1'), { version: '1.7.1', tag: 'jq-1.7.1' });
  });

  it('rejects sources without a provider', async () => {
    await assert.rejects(
      resolver.resolveVersion({ source: 'pypi' }, 'latest'),
      (error: unknown) => failsWith('unknown_source')(error)
        && error instanceof Error
        && error.message === "Unknown version source 'pypi' (known: static)"
    );
  });
});

describe('GitHubVersionProvider', () => {
  const spec: VersionSpec = { source: 'github', github_repo: 'cli/cli' };
  const releases = [
    { tag_name: 'v2.42.0', draft: true, prerelease: false },
    { tag_name: 'v2.41.0-rc.1', draft: false, prerelease: true },
    { tag_name: 'v2.40.1', draft: false, prerelease: false },
    { tag_name: 'v2.40.0', draft: false, prerelease: false }
  ];

  it('skips drafts and pre-releases for latest', async () => {
    const seen: string[] = [];
    const provider = new GitHubVersionProvider({ fetchImpl: fakeFetch({ [RELEASES_URL]: () => jsonResponse(releases) }, seen) });

    assert.deepEqual(await provider.resolve(spec, 'latest'), { version: '2.40.1', tag: 'v2.40.1' });
    assert.deepEqual(seen, [RELEASES_URL]);
  });

  it('resolves an exact tag', async () => {
    const provider = new GitHubVersionProvider({ fetchImpl: fakeFetch({ [RELEASES_URL]: () => jsonResponse(releases) }) });
    assert.deepEqual(await provider.resolve(spec, 'v2.40.0'), { version: '2.40.0', tag: 'v2.40.0' });
  });

  it('filters tags by tag_prefix', async () => {
    const url = 'https://api.github.com/repos/acme/mono/releases?per_page=100';
    const provider = new GitHubVersionProvider({
      fetchImpl: fakeFetch({
        [url]: () => jsonResponse([
          { tag_name: 'lib-3.0.0', draft: false, prerelease: false },
          { tag_name: 'cli-1.4.0', draft: false, prerelease: false }
        ])
      })
    });
    const result = await provider.resolve({ source: 'github', github_repo: 'acme/mono', tag_prefix: 'cli-' }, '');
    assert.deepEqual(result, { version: '1.4.0', tag: 'cli-1.4.0' });
  });

  it('sends the token as a bearer header', async () => {
    let authorization: string | null = null;
    const fetchImpl: typeof fetch = async (_input, init) => {
      authorization = new Headers(init?.headers).get('authorization');
      return jsonResponse(releases);
    };
    await new GitHubVersionProvider({ token: 'test-token', fetchImpl }).resolve(spec, 'latest');
    assert.equal(authorization, 'Bearer test-token');
  });

  it('maps HTTP failures to error kinds', async () => {
    const missing = new GitHubVersionProvider({ fetchImpl: fakeFetch({}) });
    await assert.rejects(missing.resolve(spec, 'latest'), failsWith('not_found'));

    const broken = new GitHubVersionProvider({ fetchImpl: fakeFetch({ [RELEASES_URL]: () => jsonResponse({}, 500) }) });
    await assert.rejects(broken.resolve(spec, 'latest'), failsWith('network'));

    const offline = new GitHubVersionProvider({
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      }
    });
    await assert.rejects(offline.resolve(spec, 'latest'), failsWith('network'));
  });

  it('rejects a malformed repository name', async () => {
    const provider = new GitHubVersionProvider({ fetchImpl: fakeFetch({}) });
    await assert.rejects(provider.resolve({ source: 'github', github_repo: 'cli' }, 'latest'), failsWith('invalid_constraint'));
  });
});
