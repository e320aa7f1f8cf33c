import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  computePlanContentHash,
  freezePlan,
  parsePlan,
  serializePlan
} from '../../../src/core/plan/plan-serializer.js';
import { PlanValidationError } from '../../../src/utils/errors.js';
import { samplePlan } from '../../test-helpers.js';

function issuesOf(error: unknown): string[] {
  assert.ok(error instanceof PlanValidationError);
  return error.issues;
}

describe('serializePlan / parsePlan', () => {
  it('reads back what it writes, including dependencies and verify', () => {
    const plan = samplePlan({
      steps: [
        {
          action: 'download_file',
          params: { url: 'https://example.com/demo.tgz', dest: 'demo.tgz' },
          deterministic: true,
          url: 'https://example.com/demo.tgz',
          checksum: 'ab'.repeat(32),
          size: 42
        }
      ],
      dependencies: [
        { tool: 'zlib', version: '1.3.1', recipe_hash: 'hash-z', steps: [], dependencies: [] }
      ],
      verify: { command: 'demo --version', pattern: '{version}' }
    });

    const text = serializePlan(plan);
    assert.ok(text.endsWith('}\n'));
    assert.deepEqual(parsePlan(text), plan);
  });

  it('returns a frozen plan', () => {
    const parsed = parsePlan(serializePlan(samplePlan()));
    assert.equal(Object.isFrozen(parsed), true);
    assert.equal(Object.isFrozen(parsed.steps[0].params), true);
  });

  it('rejects format versions newer than this build', () => {
    assert.throws(
      () => parsePlan(serializePlan(samplePlan({ format_version: 4 }))),
      (error: unknown) => issuesOf(error)[0] === 'format_version 4 is newer than supported version 3; upgrade quiver'
    );
  });

  it('parses older format versions so the cache can call them stale', () => {
    assert.equal(parsePlan(serializePlan(samplePlan({ format_version: 2 }))).format_version, 2);
  });

  it('lists every structural problem', () => {
    const text = JSON.stringify({
      format_version: 3,
      tool: '',
      version: '1.0.0',
      platform: { os: 'linux' },
      generated_at: '2026-01-01T00:00:00.000Z',
      recipe_hash: 'hash-1',
      deterministic: 'yes',
      steps: [{ action: 'chmod' }]
    });
    assert.throws(
      () => parsePlan(text),
      (error: unknown) => {
        assert.deepEqual(issuesOf(error), [
          'tool must be a non-empty string',
          'platform must have string os and arch',
          'steps[0] must have a string action and a boolean deterministic',
          'deterministic must be a boolean'
        ]);
        return true;
      }
    );
  });

  it('rejects text that is not JSON', () => {
    assert.throws(() => parsePlan('{'), (error: unknown) => issuesOf(error)[0].startsWith('not valid JSON:'));
  });
});

describe('computePlanContentHash', () => {
  it('ignores generated_at and recipe_source', () => {
    const first = samplePlan();
    const second = samplePlan({ generated_at: '2026-05-05T00:00:00.000Z', recipe_source: '/elsewhere/demo.toml' });
    assert.equal(computePlanContentHash(first), computePlanContentHash(second));
  });

  it('changes when a checksum changes', () => {
    const step = { action: 'download_file', params: {}, deterministic: true, checksum: 'aa' };
    assert.notEqual(
      computePlanContentHash(samplePlan({ steps: [step] })),
      computePlanContentHash(samplePlan({ steps: [{ ...step, checksum: 'bb' }] }))
    );
  });

  it('does not depend on key order', () => {
    const plan = samplePlan();
    const reordered = freezePlan({ dependencies: [], steps: plan.steps, ...plan });
    assert.deepEqual(Object.keys(reordered).slice(0, 2), ['dependencies', 'steps']);
    assert.equal(computePlanContentHash(reordered), computePlanContentHash(plan));
  });
});
