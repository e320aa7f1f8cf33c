import type { ParamValue, StepParams } from '../../types/index.js';

/**
 * Typed readers for step params. They throw ParamError; callers attach the
 * step index and action name.
 */

export class ParamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParamError';
  }
}

export interface BinaryMapping {
  src: string;
  dest: string;
}

export function requireString(params: StepParams, key: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ParamError(`'${key}' is required and must be a non-empty string`);
  }
  return value;
}

export function optionalString(params: StepParams, key: string): string | undefined {
  const value = params[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ParamError(`'${key}' must be a string`);
  }
  return value;
}

export function optionalNumber(params: StepParams, key: string, fallback: number): number {
  const value = params[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ParamError(`'${key}' must be a non-negative integer`);
  }
  return value;
}

export function requireStringList(params: StepParams, key: string): string[] {
  const list = optionalStringList(params, key);
  if (list.length === 0) {
    throw new ParamError(`'${key}' is required and must list at least one entry`);
  }
  return list;
}

export function optionalStringList(params: StepParams, key: string): string[] {
  const value = params[key];
  if (value === undefined) {
    return [];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ParamError(`'${key}' must be a string or a list of strings`);
  }
  return value;
}

export function optionalStringTable(params: StepParams, key: string): Record<string, string> {
  const value = params[key];
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new ParamError(`'${key}' must be a table of strings`);
  }
  const table: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ParamError(`'${key}.${name}' must be a string`);
    }
    table[name] = entry;
  }
  return table;
}

export function isTable(value: ParamValue | undefined): value is { [key: string]: ParamValue } {
  return value !== undefined && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Binaries are listed either as paths (installed under their base name) or
 * as `{src, dest}` tables.
 */
export function parseBinaries(value: ParamValue | undefined, key = 'binaries'): BinaryMapping[] {
  if (value === undefined) {
    return [];
  }
  const entries = Array.isArray(value) ? value : [value];
  return entries.map((entry, index) => {
    if (typeof entry === 'string' && entry.length > 0) {
      return { src: entry, dest: baseName(entry) };
    }
    if (isTable(entry) && typeof entry.src === 'string') {
      const dest = typeof entry.dest === 'string' ? entry.dest : baseName(entry.src);
      return { src: entry.src, dest };
    }
    throw new ParamError(`'${key}[${index}]' must be a path or a {src, dest} table`);
  });
}

/**
 * Read `binaries`, falling back to a single `binary`. At least one is required.
 */
export function requireBinaries(params: StepParams): BinaryMapping[] {
  const binaries = params.binaries !== undefined
    ? parseBinaries(params.binaries)
    : parseBinaries(params.binary, 'binary');
  if (binaries.length === 0) {
    throw new ParamError(`'binaries' (or 'binary') is required`);
  }
  return binaries;
}

export function binariesToParam(binaries: BinaryMapping[]): ParamValue {
  return binaries.map(binary => ({ src: binary.src, dest: binary.dest }));
}

/**
 * Last path segment of a URL or relative path, ignoring any query string.
 */
export function baseName(path: string): string {
  const withoutQuery = path.split(/[?#]/)[0];
  const segments = withoutQuery.split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : withoutQuery;
}
