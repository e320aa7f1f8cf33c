import type { Action } from './base-action.js';
import { ChmodAction } from './primitives/chmod.js';
import { DownloadFileAction } from './primitives/download-file.js';
import { ExtractAction } from './primitives/extract.js';
import { GoBuildAction } from './primitives/go-build.js';
import { InstallBinariesAction } from './primitives/install-binaries.js';
import { NpmExecAction } from './primitives/npm-exec.js';
import { SetEnvAction } from './primitives/set-env.js';
import {
  AptInstallAction,
  ApkInstallAction,
  BrewInstallAction,
  DnfInstallAction,
  PacmanInstallAction,
  ZypperInstallAction
} from './primitives/system-packages.js';
import { DownloadArchiveAction } from './composites/download-archive.js';
import { GitHubArchiveAction, GitHubFileAction } from './composites/github.js';
import { GoInstallAction, NpmInstallAction } from './composites/ecosystem.js';

export const BUILTIN_ACTIONS = [
  DownloadFileAction,
  ExtractAction,
  ChmodAction,
  InstallBinariesAction,
  SetEnvAction,
  AptInstallAction,
  DnfInstallAction,
  ApkInstallAction,
  PacmanInstallAction,
  ZypperInstallAction,
  BrewInstallAction,
  NpmExecAction,
  GoBuildAction,
  DownloadArchiveAction,
  GitHubArchiveAction,
  GitHubFileAction,
  NpmInstallAction,
  GoInstallAction
] as const;

export type BuiltinActionName = InstanceType<typeof BUILTIN_ACTIONS[number]>['name'];

/**
 * Name -> action lookup. Tests build registries with extra or replacement
 * actions; everything else uses `createBuiltinRegistry()`.
 */
export class ActionRegistry {
  private readonly actions = new Map<string, Action>();

  constructor(actions: Iterable<Action> = []) {
    for (const action of actions) {
      this.register(action);
    }
  }

  register(action: Action): void {
    this.actions.set(action.name, action);
  }

  get(name: string): Action | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  isPrimitive(name: string): boolean {
    return this.actions.get(name)?.kind === 'primitive';
  }

  names(): string[] {
    return [...this.actions.keys()].sort();
  }
}

export function createBuiltinRegistry(): ActionRegistry {
  return new ActionRegistry(BUILTIN_ACTIONS.map(ActionClass => new ActionClass()));
}
