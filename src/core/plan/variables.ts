import * as semver from 'semver';
import type { ParamValue, Platform, StepParams } from '../../types/index.js';

/**
 * `{name}` placeholders in step params.
 *
 * Variables: version, version_tag, os, arch, linux_family, libc.
 * Transforms apply to `version` only: `{version:major_minor}`.
 */

export class VariableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VariableError';
  }
}

export const VARIABLE_NAMES = ['version', 'version_tag', 'os', 'arch', 'linux_family', 'libc'] as const;

export type VariableName = typeof VARIABLE_NAMES[number];

/** Values are undefined when the platform does not define them (e.g. libc on darwin) */
export type Variables = Record<VariableName, string | undefined>;

export const VERSION_TRANSFORMS = ['raw', 'strip_v', 'semver', 'semver_full', 'major', 'major_minor', 'sqlite'] as const;

export type VersionTransform = typeof VERSION_TRANSFORMS[number];

export interface VariableSource {
  version: string;
  versionTag: string;
  platform: Platform;
}

export interface PlatformMappings {
  os?: Record<string, string>;
  arch?: Record<string, string>;
}

function isVariableName(name: string): name is VariableName {
  return VARIABLE_NAMES.some(known => known === name);
}

function isVersionTransform(name: string): name is VersionTransform {
  return VERSION_TRANSFORMS.some(known => known === name);
}

/**
 * Build the variable table for one step. `os_mapping`/`arch_mapping` rename
 * the platform values (e.g. darwin -> macos) for that step only.
 */
export function buildVariables(source: VariableSource, mappings: PlatformMappings = {}): Variables {
  const { platform } = source;
  return {
    version: source.version,
    version_tag: source.versionTag,
    os: mappings.os?.[platform.os] ?? platform.os,
    arch: mappings.arch?.[platform.arch] ?? platform.arch,
    linux_family: platform.linux_family,
    libc: platform.libc
  };
}

function coerced(version: string, transform: VersionTransform): semver.SemVer {
  const parsed = semver.coerce(version);
  if (!parsed) {
    throw new VariableError(`transform '${transform}' cannot apply to version '${version}'`);
  }
  return parsed;
}

export function applyVersionTransform(version: string, transform: VersionTransform): string {
  switch (transform) {
    case 'raw':
      return version;
    case 'strip_v':
      return version.replace(/^v/, '');
    case 'semver':
      return coerced(version, transform).version;
    case 'semver_full': {
      const match = /\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?/.exec(version);
      if (!match) {
        throw new VariableError(`transform 'semver_full' cannot apply to version '${version}'`);
      }
      return match[0];
    }
    case 'major':
      return String(coerced(version, transform).major);
    case 'major_minor': {
      const parsed = coerced(version, transform);
      return `${parsed.major}.${parsed.minor}`;
    }
    case 'sqlite': {
      // sqlite.org encodes X.Y.Z as XYYZZ00 in download file names
      const parsed = coerced(version, transform);
      return String(parsed.major * 1000000 + parsed.minor * 10000 + parsed.patch * 100);
    }
  }
}

/**
 * Replace every `{name}` / `{version:transform}` in one string.
 */
export function substituteString(template: string, variables: Variables): string {
  let result = '';
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);
    if (open === -1) {
      result += template.slice(cursor);
      break;
    }
    const close = template.indexOf('}', open + 1);
    if (close === -1) {
      throw new VariableError(`unterminated placeholder '${template.slice(open)}' in '${template}'`);
    }

    result += template.slice(cursor, open);
    result += resolvePlaceholder(template.slice(open + 1, close), variables);
    cursor = close + 1;
  }

  return result;
}

function resolvePlaceholder(body: string, variables: Variables): string {
  const colon = body.indexOf(':');
  const name = colon === -1 ? body : body.slice(0, colon);
  const transform = colon === -1 ? undefined : body.slice(colon + 1);

  if (!isVariableName(name)) {
    throw new VariableError(`unknown variable '{${body}}'`);
  }

  const value = variables[name];
  if (value === undefined) {
    throw new VariableError(`variable '${name}' is not defined for this platform`);
  }

  if (transform === undefined) {
    return value;
  }
  if (name !== 'version') {
    throw new VariableError(`transforms apply only to 'version', not '{${body}}'`);
  }
  if (!isVersionTransform(transform)) {
    throw new VariableError(`unknown version transform '${transform}' (expected one of ${VERSION_TRANSFORMS.join(', ')})`);
  }
  return applyVersionTransform(value, transform);
}

/**
 * Substitute recursively through lists and tables. Non-string scalars pass
 * through unchanged.
 */
export function substituteValue(value: ParamValue, variables: Variables): ParamValue {
  if (typeof value === 'string') {
    return substituteString(value, variables);
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteValue(item, variables));
  }
  if (typeof value === 'object') {
    const table: { [key: string]: ParamValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      table[key] = substituteValue(entry, variables);
    }
    return table;
  }
  return value;
}

export function substituteParams(params: StepParams, variables: Variables): StepParams {
  const result: StepParams = {};
  for (const [key, value] of Object.entries(params)) {
    result[key] = substituteValue(value, variables);
  }
  return result;
}
