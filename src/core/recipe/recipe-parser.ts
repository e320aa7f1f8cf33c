import { extname } from 'path';
import yaml from 'js-yaml';
import * as TOML from 'smol-toml';
import type {
  ParamValue,
  Recipe,
  RecipeStep,
  RecipeType,
  RecipeVerify,
  StepParams,
  VersionSpec,
  WhenClause
} from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { RecipeValidationError } from '../../utils/errors.js';
import { canonicalJson, sha256Hex } from '../../utils/hash.js';

/**
 * Recipe documents: TOML or YAML text in, validated Recipe out.
 *
 * Step fields other than `action`, `when`, `dependencies` and `note` are the
 * step's params, so recipes write them inline:
 *
 *   [[steps]]
 *   action = "github_archive"
 *   repo = "cli/cli"
 */

export type RecipeFormat = 'toml' | 'yaml';

const STEP_RESERVED_KEYS = new Set(['action', 'when', 'dependencies', 'note']);
const WHEN_KEYS = ['platform', 'os', 'arch', 'linux_family', 'libc'] as const;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function detectRecipeFormat(fileName: string): RecipeFormat | undefined {
  switch (extname(fileName).toLowerCase()) {
    case FILE_PATTERNS.TOML_FILES:
      return 'toml';
    case FILE_PATTERNS.YML_FILES:
    case FILE_PATTERNS.YAML_FILES:
      return 'yaml';
    default:
      return undefined;
  }
}

/**
 * Parse recipe text in the given format and validate its structure.
 */
export function parseRecipe(content: string, format: RecipeFormat, source = '<inline>'): Recipe {
  let raw: unknown;
  try {
    raw = format === 'toml' ? TOML.parse(content) : yaml.load(content);
  } catch (error) {
    throw new RecipeValidationError(
      `${source}: ${format.toUpperCase()} parse error: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }
  return validateRecipe(raw, source);
}

/**
 * Validate a parsed document and normalize it into a Recipe.
 */
export function validateRecipe(raw: unknown, source = '<inline>'): Recipe {
  if (!isPlainObject(raw)) {
    throw new RecipeValidationError(`${source}: document must be a table`, { source });
  }

  const metadata = readMetadata(raw.metadata, source);
  const version = readVersionSpec(raw.version, source);

  if (!Array.isArray(raw.steps) || raw.steps.length === 0) {
    throw new RecipeValidationError(`${source}: recipe '${metadata.name}' has no steps`, { source });
  }
  const steps = raw.steps.map((step: unknown, index: number) => readStep(step, index, source));

  const recipe: Recipe = { metadata, version, steps };
  const verify = readVerify(raw.verify, source);
  if (verify) {
    recipe.verify = verify;
  }
  return recipe;
}

/**
 * SHA-256 of the recipe's canonical JSON. Formatting, key order and the
 * source format (TOML or YAML) do not change it.
 */
export function computeRecipeHash(recipe: Recipe): string {
  return sha256Hex(canonicalJson(recipe));
}

function readMetadata(raw: unknown, source: string): Recipe['metadata'] {
  if (!isPlainObject(raw)) {
    throw new RecipeValidationError(`${source}: missing [metadata] table`, { source });
  }
  const name = raw.name;
  if (typeof name !== 'string' || !/^[a-z0-9][a-z0-9._-]*$/i.test(name)) {
    throw new RecipeValidationError(`${source}: metadata.name must be a simple tool name`, { source, name });
  }

  const type = raw.type ?? 'tool';
  if (type !== 'tool' && type !== 'library') {
    throw new RecipeValidationError(`${source}: metadata.type must be 'tool' or 'library'`, { source, type });
  }
  const recipeType: RecipeType = type;

  const metadata: Recipe['metadata'] = {
    name,
    type: recipeType,
    dependencies: readStringList(raw.dependencies, `${source}: metadata.dependencies`)
  };
  if (typeof raw.description === 'string') {
    metadata.description = raw.description;
  }
  if (typeof raw.homepage === 'string') {
    metadata.homepage = raw.homepage;
  }
  return metadata;
}

function readVersionSpec(raw: unknown, source: string): VersionSpec {
  if (!isPlainObject(raw)) {
    throw new RecipeValidationError(`${source}: missing [version] table`, { source });
  }
  if (typeof raw.source !== 'string' || raw.source.length === 0) {
    throw new RecipeValidationError(`${source}: version.source must be a non-empty string`, { source });
  }
  const spec: VersionSpec = { source: raw.source };
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'source') {
      spec[key] = toParamValue(value, `${source}: version.${key}`);
    }
  }
  return spec;
}

function readStep(raw: unknown, index: number, source: string): RecipeStep {
  const where = `${source}: steps[${index}]`;
  if (!isPlainObject(raw)) {
    throw new RecipeValidationError(`${where} must be a table`, { source, index });
  }
  if (typeof raw.action !== 'string' || raw.action.length === 0) {
    throw new RecipeValidationError(`${where} is missing 'action'`, { source, index });
  }

  const params: StepParams = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!STEP_RESERVED_KEYS.has(key)) {
      params[key] = toParamValue(value, `${where}.${key}`);
    }
  }

  const step: RecipeStep = {
    action: raw.action,
    params,
    dependencies: readStringList(raw.dependencies, `${where}.dependencies`)
  };
  if (raw.when !== undefined) {
    step.when = readWhen(raw.when, where);
  }
  return step;
}

function readWhen(raw: unknown, where: string): WhenClause {
  if (!isPlainObject(raw)) {
    throw new RecipeValidationError(`${where}.when must be a table`);
  }
  const when: WhenClause = {};
  for (const [key, value] of Object.entries(raw)) {
    const dimension = WHEN_KEYS.find(known => known === key);
    if (!dimension) {
      throw new RecipeValidationError(`${where}.when has unknown key '${key}'`, { key });
    }
    // A scalar is shorthand for a one-element list
    when[dimension] = typeof value === 'string' ? [value] : readStringList(value, `${where}.when.${key}`);
  }
  for (const tuple of when.platform ?? []) {
    if (!/^[^/\s]+\/[^/\s]+$/.test(tuple)) {
      throw new RecipeValidationError(`${where}.when.platform entry '${tuple}' must be 'os/arch'`);
    }
  }
  return when;
}

function readVerify(raw: unknown, source: string): RecipeVerify | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isPlainObject(raw) || typeof raw.command !== 'string') {
    throw new RecipeValidationError(`${source}: verify.command must be a string`, { source });
  }
  const verify: RecipeVerify = { command: raw.command };
  if (typeof raw.pattern === 'string') {
    verify.pattern = raw.pattern;
  }
  return verify;
}

function readStringList(raw: unknown, where: string): string[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === 'string')) {
    throw new RecipeValidationError(`${where} must be a list of strings`);
  }
  return raw;
}

function toParamValue(raw: unknown, where: string): ParamValue {
  if (typeof raw === 'string' || typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    return Number(raw);
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  if (Array.isArray(raw)) {
    return raw.map((item, i) => toParamValue(item, `${where}[${i}]`));
  }
  if (isPlainObject(raw)) {
    const table: { [key: string]: ParamValue } = {};
    for (const [key, value] of Object.entries(raw)) {
      table[key] = toParamValue(value, `${where}.${key}`);
    }
    return table;
  }
  throw new RecipeValidationError(`${where} has an unsupported value`);
}
