import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { InstallationPlan } from '../../../src/types/index.js';
import {
  FilePlanStore,
  MemoryPlanStore,
  assertCachedPlanValid,
  lookupCachedPlan,
  shouldConsultCache,
  storePlanSafely,
  validateCachedPlan,
  type PlanStore
} from '../../../src/core/plan/plan-cache.js';
import { CacheValidationError, PlanValidationError } from '../../../src/utils/errors.js';
import { LINUX_ALPINE, LINUX_DEBIAN, makeTempDir, samplePlan, testDirectories } from '../../test-helpers.js';

const expected = { recipeHash: 'hash-1', platform: LINUX_DEBIAN };

describe('validateCachedPlan', () => {
  it('accepts a plan matching format, platform and recipe', () => {
    assert.deepEqual(validateCachedPlan(samplePlan(), expected), { valid: true });
  });

  it('rejects an older format version', () => {
    assert.deepEqual(validateCachedPlan(samplePlan({ format_version: 2 }), expected), {
      valid: false,
      reason: 'format version 2 != 3'
    });
  });

  it('rejects a plan for another platform', () => {
    assert.deepEqual(validateCachedPlan(samplePlan({ platform: { ...LINUX_ALPINE } }), expected), {
      valid: false,
      reason: 'platform linux/amd64 (alpine, musl) != linux/amd64 (debian, glibc)'
    });
  });

  it('rejects a plan from a different recipe', () => {
    assert.deepEqual(validateCachedPlan(samplePlan({ recipe_hash: 'hash-2' }), expected), {
      valid: false,
      reason: 'recipe changed since the plan was generated'
    });
  });

  it('assertCachedPlanValid throws the reason', () => {
    assert.throws(
      () => assertCachedPlanValid(samplePlan({ recipe_hash: 'hash-2' }), expected),
      (error: unknown) => error instanceof CacheValidationError
        && error.message === 'Cached plan is stale: recipe changed since the plan was generated'
    );
  });
});

describe('shouldConsultCache', () => {
  it('consults the cache only for exact constraints without --fresh', () => {
    assert.equal(shouldConsultCache({ constraint: '1.0.0' }), true);
    assert.equal(shouldConsultCache({ constraint: 'latest' }), false);
    assert.equal(shouldConsultCache({ constraint: '^1' }), false);
    assert.equal(shouldConsultCache({ constraint: '1.0.0', forceRefresh: true }), false);
    assert.equal(shouldConsultCache({ constraint: '1.0.0', evalMode: true }), false);
  });
});

describe('FilePlanStore', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('plan-store');
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stores under state/tools/<tool>/<version>.json and reads it back', async () => {
    const store = new FilePlanStore(testDirectories(root));
    const plan = samplePlan();
    await store.store(plan);

    const onDisk = JSON.parse(await fs.readFile(join(root, 'state', 'tools', 'demo', '1.0.0.json'), 'utf8'));
    assert.deepEqual(onDisk, { plan });
    assert.deepEqual(await store.lookup('demo', '1.0.0'), { plan });
    assert.equal(await store.lookup('demo', '2.0.0'), null);
  });

  it('records the installation time and replaces on store', async () => {
    const store = new FilePlanStore(testDirectories(root));
    await store.store(samplePlan());
    await store.markInstalled('demo', '1.0.0', new Date('2026-02-03T04:05:06.000Z'));
    assert.equal((await store.lookup('demo', '1.0.0'))?.installedAt, '2026-02-03T04:05:06.000Z');

    await store.store(samplePlan({ recipe_hash: 'hash-2' }));
    const record = await store.lookup('demo', '1.0.0');
    assert.equal(record?.plan.recipe_hash, 'hash-2');
    assert.equal(record?.installedAt, undefined);
  });

  it('refuses to mark a plan it does not have', async () => {
    const store = new FilePlanStore(testDirectories(root));
    await assert.rejects(store.markInstalled('ghost', '1.0.0'), CacheValidationError);
  });

  it('removes entries', async () => {
    const store = new FilePlanStore(testDirectories(root));
    await store.store(samplePlan({ tool: 'gone' }));
    await store.remove('gone', '1.0.0');
    assert.equal(await store.lookup('gone', '1.0.0'), null);
  });

  it('reports corrupt entries and lookupCachedPlan treats them as a miss', async () => {
    const dirs = testDirectories(root);
    await fs.mkdir(join(dirs.state, 'tools', 'broken'), { recursive: true });
    await fs.writeFile(join(dirs.state, 'tools', 'broken', '1.0.0.json'), '{ nope');
    const store = new FilePlanStore(dirs);

    await assert.rejects(store.lookup('broken', '1.0.0'), PlanValidationError);
    assert.equal(await lookupCachedPlan(store, 'broken', '1.0.0'), null);
  });
});

describe('MemoryPlanStore', () => {
  it('keeps an independent copy of stored plans', async () => {
    const store = new MemoryPlanStore();
    const plan = samplePlan();
    await store.store(plan);

    const record = await store.lookup('demo', '1.0.0');
    assert.notEqual(record?.plan, plan);
    assert.deepEqual(record?.plan, plan);
  });
});

describe('storePlanSafely', () => {
  it('reports a failed write without throwing', async () => {
    const failing: PlanStore = {
      lookup: async () => null,
      store: async (_plan: InstallationPlan) => {
        throw new Error('disk full');
      },
      markInstalled: async () => {},
      remove: async () => {}
    };
    assert.equal(await storePlanSafely(failing, samplePlan()), false);
    assert.equal(await storePlanSafely(new MemoryPlanStore(), samplePlan()), true);
  });
});
