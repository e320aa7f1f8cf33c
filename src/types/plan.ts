/**
 * Installation plan types.
 *
 * Field names are snake_case because plans are serialized as-is and external
 * consumers (golden-file tests, validators) read the JSON directly.
 */

import type { Platform } from './platform.js';
import type { StepParams } from './recipe.js';
import type { RecipeVerify } from './recipe.js';

export interface ResolvedStep {
  /** Primitive action name; never a composite */
  action: string;
  params: StepParams;
  /** Whether the action produces identical results for identical inputs */
  deterministic: boolean;
  url?: string;
  /** Hex SHA-256, present on every download step */
  checksum?: string;
  size?: number;
}

export interface DependencyNode {
  tool: string;
  version: string;
  recipe_hash: string;
  steps: ResolvedStep[];
  /** Direct dependencies of this node, as `tool@version` keys */
  dependencies: string[];
}

export interface InstallationPlan {
  format_version: number;
  tool: string;
  version: string;
  platform: Platform;
  /** ISO-8601 timestamp */
  generated_at: string;
  recipe_hash: string;
  recipe_source: string;
  /** True only if every step, including dependency steps, is deterministic */
  deterministic: boolean;
  steps: ResolvedStep[];
  /** Leaves first: each node's dependencies appear before it */
  dependencies: DependencyNode[];
  verify?: RecipeVerify;
}
