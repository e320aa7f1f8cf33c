import { promises as fs } from 'fs';
import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { PrimitiveAction } from '../base-action.js';
import { ParamError, optionalString, requireStringList } from '../params.js';
import { resolveInside } from './paths.js';

function parseMode(params: StepParams): number {
  const mode = optionalString(params, 'mode') ?? '755';
  if (!/^[0-7]{3,4}$/.test(mode)) {
    throw new ParamError(`'mode' must be an octal string like "755", got '${mode}'`);
  }
  return parseInt(mode, 8);
}

export class ChmodAction extends PrimitiveAction {
  readonly name = 'chmod';
  readonly deterministic = true;

  validate(params: StepParams): void {
    requireStringList(params, 'files');
    parseMode(params);
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const mode = parseMode(params);
    for (const file of requireStringList(params, 'files')) {
      await fs.chmod(resolveInside(ctx.workDir, file), mode);
    }
  }
}
