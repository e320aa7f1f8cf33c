import type { WhenClause } from './platform.js';

export type RecipeType = 'tool' | 'library';

/**
 * A step parameter value as it appears in a recipe file.
 */
export type ParamValue =
  | string
  | number
  | boolean
  | ParamValue[]
  | { [key: string]: ParamValue };

export type StepParams = Record<string, ParamValue>;

export interface RecipeMetadata {
  name: string;
  description?: string;
  homepage?: string;
  type: RecipeType;
  /** Install-time dependencies, as `name` or `name@constraint` */
  dependencies: string[];
}

/**
 * Where versions come from. `source` selects the version provider; the
 * remaining fields are provider specific (e.g. `github_repo`, `versions`).
 */
export interface VersionSpec {
  source: string;
  [field: string]: ParamValue;
}

export interface RecipeStep {
  action: string;
  params: StepParams;
  when?: WhenClause;
  /** Dependencies that only apply when this step survives platform filtering */
  dependencies: string[];
}

export interface RecipeVerify {
  command: string;
  pattern?: string;
}

export interface Recipe {
  metadata: RecipeMetadata;
  version: VersionSpec;
  steps: RecipeStep[];
  verify?: RecipeVerify;
}
