import type { Platform, RecipeStep, ResolvedStep, StepParams } from '../../types/index.js';
import { StepGenerationError } from '../../utils/errors.js';
import { matchesWhen } from '../platforms.js';
import type { Action } from '../actions/base-action.js';
import type { ActionRegistry } from '../actions/registry.js';
import type { ActionStep, DecomposeContext, PlatformConstraint } from '../actions/types.js';
import { ParamError, isTable, optionalStringTable } from '../actions/params.js';
import { buildVariables, substituteParams, type PlatformMappings } from './variables.js';

export interface DecompositionContext {
  tool: string;
  version: string;
  versionTag: string;
  platform: Platform;
}

export interface DecompositionResult {
  /** Primitive steps with every placeholder expanded */
  steps: ResolvedStep[];
  /** Recipe steps that survived platform filtering, in recipe order */
  activeSteps: RecipeStep[];
  /** Tools primitive actions need installed first, in first-seen order */
  implicitDependencies: string[];
  /** Tools composites need on the generating machine, in first-seen order */
  evalDependencies: string[];
}

interface WorkItem {
  action: string;
  params: StepParams;
  /** Composite names this item descends from, outermost first */
  chain: string[];
}

const MAPPING_KEYS = ['os_mapping', 'arch_mapping'] as const;

export function satisfiesConstraint(constraint: PlatformConstraint | undefined, platform: Platform): boolean {
  if (!constraint) {
    return true;
  }
  if (platform.os !== constraint.os) {
    return false;
  }
  // An unknown family matches, as it does for `when` clauses
  return !constraint.linuxFamily || !platform.linux_family || platform.linux_family === constraint.linuxFamily;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function splitMappings(params: StepParams): { params: StepParams; mappings: PlatformMappings } {
  const rest: StepParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (!MAPPING_KEYS.some(mappingKey => mappingKey === key)) {
      rest[key] = value;
    }
  }
  for (const key of MAPPING_KEYS) {
    if (params[key] !== undefined && !isTable(params[key])) {
      throw new ParamError(`'${key}' must be a table`);
    }
  }
  return {
    params: rest,
    mappings: {
      os: optionalStringTable(params, 'os_mapping'),
      arch: optionalStringTable(params, 'arch_mapping')
    }
  };
}

function pushUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) {
      target.push(value);
    }
  }
}

/**
 * Filter recipe steps for the target platform and expand them into
 * primitive steps.
 *
 * Filtering is two-stage: the action's own platform constraint, then the
 * step's `when` clause. Composites expand depth-first in place, so the
 * primitives keep recipe order. Variables are substituted once expansion is
 * complete. Pure and synchronous: the same inputs always give the same output.
 */
export function decomposeSteps(
  steps: RecipeStep[],
  context: DecompositionContext,
  registry: ActionRegistry
): DecompositionResult {
  const result: DecompositionResult = {
    steps: [],
    activeSteps: [],
    implicitDependencies: [],
    evalDependencies: []
  };

  const decomposeContext: DecomposeContext = { ...context };

  steps.forEach((step, index) => {
    const stepError = (reason: string) => new StepGenerationError(index, step.action, reason);

    const action = registry.get(step.action);
    if (!action) {
      throw stepError(`unknown action '${step.action}'`);
    }

    if (!satisfiesConstraint(action.platformConstraint, context.platform) || !matchesWhen(step.when, context.platform)) {
      return;
    }
    result.activeSteps.push(step);

    let split: ReturnType<typeof splitMappings>;
    try {
      split = splitMappings(step.params);
    } catch (error) {
      throw stepError(describe(error));
    }
    const variables = buildVariables(
      { version: context.version, versionTag: context.versionTag, platform: context.platform },
      split.mappings
    );

    // Children are pushed in reverse so they pop in recipe order
    const stack: WorkItem[] = [{ action: step.action, params: split.params, chain: [] }];

    for (let item = stack.pop(); item; item = stack.pop()) {
      const current: Action | undefined = registry.get(item.action);
      if (!current) {
        const origin = item.chain.length > 0 ? ` (from ${item.chain.join(' -> ')})` : '';
        throw stepError(`unknown action '${item.action}'${origin}`);
      }

      if (current.kind === 'composite') {
        if (item.chain.includes(current.name)) {
          throw stepError(`decomposition cycle: ${[...item.chain, current.name].join(' -> ')}`);
        }
        pushUnique(result.evalDependencies, current.evalDependencies);

        let children: ActionStep[];
        try {
          children = current.decompose(item.params, decomposeContext);
        } catch (error) {
          throw stepError(describe(error));
        }
        const chain = [...item.chain, current.name];
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push({ action: children[i].action, params: children[i].params, chain });
        }
        continue;
      }

      let params: StepParams;
      try {
        params = substituteParams(item.params, variables);
        current.validate(params);
      } catch (error) {
        const prefix = item.chain.length > 0 ? `${current.name}: ` : '';
        throw stepError(`${prefix}${describe(error)}`);
      }

      pushUnique(result.implicitDependencies, current.implicitDependencies);

      const resolved: ResolvedStep = {
        action: current.name,
        params,
        deterministic: current.deterministic
      };
      if (current.name === 'download_file' && typeof params.url === 'string') {
        resolved.url = params.url;
      }
      result.steps.push(resolved);
    }
  });

  return result;
}
