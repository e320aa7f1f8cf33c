import { join } from 'path';
import type { InstallationPlan, Platform, QuiverDirectories } from '../../types/index.js';
import { FILE_PATTERNS, PLAN_FORMAT_VERSION } from '../../constants/index.js';
import { CacheValidationError, PlanValidationError } from '../../utils/errors.js';
import { exists, readTextFile, remove, writeFileAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { formatPlatform, platformsEqual } from '../platforms.js';
import { getToolStateDirectory } from '../directory.js';
import { parsePlan, serializePlan } from './plan-serializer.js';
import { classifyConstraint } from '../version/constraint.js';

export interface PlanCacheExpectation {
  recipeHash: string;
  platform: Platform;
  formatVersion?: number;
}

export type PlanValidity = { valid: true } | { valid: false; reason: string };

/**
 * Decide whether a stored plan still describes what generation would
 * produce now: same format version, same platform on every dimension, same
 * recipe content.
 */
export function validateCachedPlan(plan: InstallationPlan, expected: PlanCacheExpectation): PlanValidity {
  const formatVersion = expected.formatVersion ?? PLAN_FORMAT_VERSION;
  if (plan.format_version !== formatVersion) {
    return { valid: false, reason: `format version ${plan.format_version} != ${formatVersion}` };
  }
  if (!platformsEqual(plan.platform, expected.platform)) {
    return {
      valid: false,
      reason: `platform ${formatPlatform(plan.platform)} != ${formatPlatform(expected.platform)}`
    };
  }
  if (plan.recipe_hash !== expected.recipeHash) {
    return { valid: false, reason: 'recipe changed since the plan was generated' };
  }
  return { valid: true };
}

/**
 * Throwing form of validateCachedPlan, for callers that treat a stale plan
 * as an error (e.g. `plan validate`).
 */
export function assertCachedPlanValid(plan: InstallationPlan, expected: PlanCacheExpectation): void {
  const result = validateCachedPlan(plan, expected);
  if (!result.valid) {
    throw new CacheValidationError(result.reason, { tool: plan.tool, version: plan.version });
  }
}

export interface CachePolicyInput {
  constraint: string;
  forceRefresh?: boolean;
  /** Eval never reads the cache */
  evalMode?: boolean;
}

/**
 * Only exact constraints can reuse a stored plan; dynamic ones must be
 * re-resolved because "latest" moves.
 */
export function shouldConsultCache(input: CachePolicyInput): boolean {
  if (input.forceRefresh || input.evalMode) {
    return false;
  }
  return classifyConstraint(input.constraint) === 'exact';
}

export interface StoredPlanRecord {
  plan: InstallationPlan;
  /** Set once an installation from this plan completed */
  installedAt?: string;
}

/**
 * Installed-tool state: one plan per (tool, version). Storing replaces.
 */
export interface PlanStore {
  lookup(tool: string, version: string): Promise<StoredPlanRecord | null>;
  store(plan: InstallationPlan): Promise<void>;
  markInstalled(tool: string, version: string, installedAt?: Date): Promise<void>;
  remove(tool: string, version: string): Promise<void>;
}

interface StoredPlanDocument {
  installed_at?: string;
  plan: InstallationPlan;
}

/**
 * state/tools/<tool>/<version>.json, written through temp-file-and-rename.
 */
export class FilePlanStore implements PlanStore {
  constructor(private readonly dirs: QuiverDirectories) {}

  private pathFor(tool: string, version: string): string {
    return join(getToolStateDirectory(this.dirs, tool), `${version}${FILE_PATTERNS.JSON_FILES}`);
  }

  async lookup(tool: string, version: string): Promise<StoredPlanRecord | null> {
    const path = this.pathFor(tool, version);
    if (!(await exists(path))) {
      return null;
    }

    const content = await readTextFile(path);
    let doc: unknown;
    try {
      doc = JSON.parse(content);
    } catch {
      throw new PlanValidationError([`${path}: not valid JSON`]);
    }
    if (doc === null || typeof doc !== 'object' || !('plan' in doc)) {
      throw new PlanValidationError([`${path}: missing 'plan'`]);
    }

    const plan = parsePlan(JSON.stringify(doc.plan));
    const installedAt = 'installed_at' in doc && typeof doc.installed_at === 'string' ? doc.installed_at : undefined;
    return installedAt ? { plan, installedAt } : { plan };
  }

  async store(plan: InstallationPlan): Promise<void> {
    await this.write(plan);
    logger.debug(`Stored plan for ${plan.tool}@${plan.version}`);
  }

  async markInstalled(tool: string, version: string, installedAt: Date = new Date()): Promise<void> {
    const record = await this.lookup(tool, version);
    if (!record) {
      throw new CacheValidationError(`no stored plan for ${tool}@${version}`, { tool, version });
    }
    await this.write(record.plan, installedAt.toISOString());
  }

  async remove(tool: string, version: string): Promise<void> {
    await remove(this.pathFor(tool, version));
  }

  private async write(plan: InstallationPlan, installedAt?: string): Promise<void> {
    const doc: StoredPlanDocument = installedAt ? { installed_at: installedAt, plan } : { plan };
    await writeFileAtomic(this.pathFor(plan.tool, plan.version), `${JSON.stringify(doc, null, 2)}\n`);
  }
}

export class MemoryPlanStore implements PlanStore {
  private readonly records = new Map<string, StoredPlanRecord>();

  async lookup(tool: string, version: string): Promise<StoredPlanRecord | null> {
    return this.records.get(`${tool}@${version}`) ?? null;
  }

  async store(plan: InstallationPlan): Promise<void> {
    // Re-parse so the stored copy is independent of the caller's object
    this.records.set(`${plan.tool}@${plan.version}`, { plan: parsePlan(serializePlan(plan)) });
  }

  async markInstalled(tool: string, version: string, installedAt: Date = new Date()): Promise<void> {
    const record = this.records.get(`${tool}@${version}`);
    if (!record) {
      throw new CacheValidationError(`no stored plan for ${tool}@${version}`, { tool, version });
    }
    this.records.set(`${tool}@${version}`, { ...record, installedAt: installedAt.toISOString() });
  }

  async remove(tool: string, version: string): Promise<void> {
    this.records.delete(`${tool}@${version}`);
  }
}

/**
 * Store lookup that never fails: unreadable or unparsable entries are
 * logged and reported as a miss.
 */
export async function lookupCachedPlan(store: PlanStore, tool: string, version: string): Promise<StoredPlanRecord | null> {
  try {
    return await store.lookup(tool, version);
  } catch (error) {
    logger.warn(`Ignoring unreadable cached plan for ${tool}@${version}`, { error });
    return null;
  }
}

/**
 * Store write that never fails installation; errors are logged.
 */
export async function storePlanSafely(store: PlanStore, plan: InstallationPlan): Promise<boolean> {
  try {
    await store.store(plan);
    return true;
  } catch (error) {
    logger.warn(`Failed to store plan for ${plan.tool}@${plan.version}; continuing without caching`, { error });
    return false;
  }
}
