import type { Platform, StepParams } from '../../types/index.js';

/**
 * An action name plus its params, before variable substitution.
 */
export interface ActionStep {
  action: string;
  params: StepParams;
}

/**
 * What a composite sees while decomposing. Params still contain `{var}`
 * placeholders at this point; substitution runs on the resulting primitives.
 */
export interface DecomposeContext {
  tool: string;
  version: string;
  versionTag: string;
  platform: Platform;
}

/**
 * Platforms an action can run on at all, checked before the step's `when`.
 */
export interface PlatformConstraint {
  os: string;
  linuxFamily?: string;
}
