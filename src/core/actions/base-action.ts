import type { StepParams } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { ActionStep, DecomposeContext, PlatformConstraint } from './types.js';

/**
 * Capabilities every action declares. Defaults assume nothing: not
 * deterministic, no network, no dependencies, runs anywhere.
 */
abstract class BaseAction {
  abstract readonly name: string;

  /** Same inputs always produce the same installed files */
  readonly deterministic: boolean = false;

  readonly requiresNetwork: boolean = false;

  /** Tools that must be installed before this action runs (become plan dependencies) */
  readonly implicitDependencies: readonly string[] = [];

  /** Tools needed on the machine generating the plan; never embedded in the plan */
  readonly evalDependencies: readonly string[] = [];

  readonly platformConstraint?: PlatformConstraint;
}

export abstract class PrimitiveAction extends BaseAction {
  readonly kind = 'primitive' as const;

  /**
   * Check params after substitution. Runs at generation time so a bad recipe
   * fails before anything is downloaded.
   */
  validate(_params: StepParams): void {}

  abstract execute(params: StepParams, ctx: ExecutionContext): Promise<void>;
}

export abstract class CompositeAction extends BaseAction {
  readonly kind = 'composite' as const;

  /**
   * Expand into child steps. Children may be composites themselves.
   */
  abstract decompose(params: StepParams, ctx: DecomposeContext): ActionStep[];
}

export type Action = PrimitiveAction | CompositeAction;
