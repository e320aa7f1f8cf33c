import type {
  DependencyNode,
  InstallationPlan,
  ParamValue,
  Platform,
  RecipeVerify,
  ResolvedStep,
  StepParams
} from '../../types/index.js';
import { PLAN_FORMAT_VERSION } from '../../constants/index.js';
import { PlanValidationError } from '../../utils/errors.js';
import { canonicalJson, sha256Hex } from '../../utils/hash.js';

/**
 * Plan documents on disk and on the wire: pretty-printed JSON with the
 * plan's own snake_case field names.
 */

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function serializePlan(plan: InstallationPlan): string {
  return `${JSON.stringify(plan, null, 2)}\n`;
}

/**
 * Parse and structurally validate a plan document. Plans newer than this
 * build understands are rejected; older ones parse so the cache can report
 * them as stale.
 */
export function parsePlan(text: string): InstallationPlan {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PlanValidationError([`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return freezePlan(readPlan(raw));
}

/**
 * Hash of everything that determines what gets installed. `generated_at`
 * and `recipe_source` are excluded, so regenerating an unchanged plan, or
 * loading the recipe from another path, keeps the hash.
 */
export function computePlanContentHash(plan: InstallationPlan): string {
  const { generated_at: _generatedAt, recipe_source: _recipeSource, ...content } = plan;
  return sha256Hex(canonicalJson(content));
}

export function freezePlan(plan: InstallationPlan): InstallationPlan {
  return deepFreeze(plan);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function readPlan(raw: unknown): InstallationPlan {
  const issues: string[] = [];
  if (!isPlainObject(raw)) {
    throw new PlanValidationError(['plan must be a JSON object']);
  }
  const doc: PlainObject = raw;

  const formatVersion = doc.format_version;
  if (typeof formatVersion !== 'number' || !Number.isInteger(formatVersion) || formatVersion < 1) {
    throw new PlanValidationError(['format_version must be a positive integer']);
  }
  if (formatVersion > PLAN_FORMAT_VERSION) {
    throw new PlanValidationError([
      `format_version ${formatVersion} is newer than supported version ${PLAN_FORMAT_VERSION}; upgrade quiver`
    ]);
  }

  const str = (key: string): string => {
    const value = doc[key];
    if (typeof value !== 'string' || value.length === 0) {
      issues.push(`${key} must be a non-empty string`);
      return '';
    }
    return value;
  };

  const plan: InstallationPlan = {
    format_version: formatVersion,
    tool: str('tool'),
    version: str('version'),
    platform: readPlatform(doc.platform, issues),
    generated_at: str('generated_at'),
    recipe_hash: str('recipe_hash'),
    recipe_source: typeof doc.recipe_source === 'string' ? doc.recipe_source : '',
    deterministic: doc.deterministic === true,
    steps: readSteps(doc.steps, 'steps', issues),
    dependencies: readDependencies(doc.dependencies, issues)
  };
  if (typeof doc.deterministic !== 'boolean') {
    issues.push('deterministic must be a boolean');
  }
  const verify = readVerify(doc.verify, issues);
  if (verify) {
    plan.verify = verify;
  }

  if (issues.length > 0) {
    throw new PlanValidationError(issues);
  }
  return plan;
}

function readPlatform(raw: unknown, issues: string[]): Platform {
  if (!isPlainObject(raw) || typeof raw.os !== 'string' || typeof raw.arch !== 'string') {
    issues.push('platform must have string os and arch');
    return { os: '', arch: '' };
  }
  const platform: Platform = { os: raw.os, arch: raw.arch };
  if (typeof raw.linux_family === 'string') {
    platform.linux_family = raw.linux_family;
  }
  if (typeof raw.libc === 'string') {
    platform.libc = raw.libc;
  }
  return platform;
}

function readSteps(raw: unknown, where: string, issues: string[]): ResolvedStep[] {
  if (!Array.isArray(raw)) {
    issues.push(`${where} must be an array`);
    return [];
  }
  const steps: ResolvedStep[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const at = `${where}[${index}]`;
    if (!isPlainObject(entry) || typeof entry.action !== 'string' || typeof entry.deterministic !== 'boolean') {
      issues.push(`${at} must have a string action and a boolean deterministic`);
      return;
    }
    const params = readParams(entry.params);
    if (!params) {
      issues.push(`${at}.params must be an object of JSON values`);
      return;
    }
    const step: ResolvedStep = { action: entry.action, params, deterministic: entry.deterministic };
    if (typeof entry.url === 'string') {
      step.url = entry.url;
    }
    if (typeof entry.checksum === 'string') {
      step.checksum = entry.checksum;
    }
    if (typeof entry.size === 'number') {
      step.size = entry.size;
    }
    steps.push(step);
  });
  return steps;
}

function readDependencies(raw: unknown, issues: string[]): DependencyNode[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    issues.push('dependencies must be an array');
    return [];
  }
  const nodes: DependencyNode[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const at = `dependencies[${index}]`;
    if (
      !isPlainObject(entry)
      || typeof entry.tool !== 'string'
      || typeof entry.version !== 'string'
      || typeof entry.recipe_hash !== 'string'
    ) {
      issues.push(`${at} must have string tool, version and recipe_hash`);
      return;
    }
    const childKeys = entry.dependencies ?? [];
    if (!Array.isArray(childKeys) || !childKeys.every((key): key is string => typeof key === 'string')) {
      issues.push(`${at}.dependencies must be a list of tool@version keys`);
      return;
    }
    nodes.push({
      tool: entry.tool,
      version: entry.version,
      recipe_hash: entry.recipe_hash,
      steps: readSteps(entry.steps, `${at}.steps`, issues),
      dependencies: childKeys
    });
  });
  return nodes;
}

function readVerify(raw: unknown, issues: string[]): RecipeVerify | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isPlainObject(raw) || typeof raw.command !== 'string') {
    issues.push('verify.command must be a string');
    return undefined;
  }
  return typeof raw.pattern === 'string' ? { command: raw.command, pattern: raw.pattern } : { command: raw.command };
}

function readParams(raw: unknown): StepParams | undefined {
  if (!isPlainObject(raw)) {
    return undefined;
  }
  const params: StepParams = {};
  for (const [key, value] of Object.entries(raw)) {
    const param = readParamValue(value);
    if (param === undefined) {
      return undefined;
    }
    params[key] = param;
  }
  return params;
}

function readParamValue(raw: unknown): ParamValue | undefined {
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw;
  }
  if (Array.isArray(raw)) {
    const items: ParamValue[] = [];
    for (const item of raw) {
      const value = readParamValue(item);
      if (value === undefined) {
        return undefined;
      }
      items.push(value);
    }
    return items;
  }
  if (isPlainObject(raw)) {
    return readParams(raw);
  }
  return undefined;
}
