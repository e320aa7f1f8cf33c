import { delimiter, isAbsolute, join, relative, resolve } from 'path';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { ParamError } from '../params.js';

/**
 * Resolve a step-relative path under `root`. Absolute paths and paths that
 * climb out of `root` are rejected.
 */
export function resolveInside(root: string, path: string): string {
  if (isAbsolute(path)) {
    throw new ParamError(`path '${path}' must be relative`);
  }
  const resolved = resolve(root, path);
  const rel = relative(root, resolved);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new ParamError(`path '${path}' escapes its directory`);
  }
  return resolved;
}

export function installBinDir(ctx: ExecutionContext): string {
  return join(ctx.installDir, 'bin');
}

/**
 * Environment for external commands: dependency bin dirs ahead of PATH.
 */
export function commandEnv(ctx: ExecutionContext, extra: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  const path = [...ctx.dependencyBinDirs, process.env.PATH ?? ''].filter(Boolean).join(delimiter);
  return { ...process.env, PATH: path, ...extra };
}
