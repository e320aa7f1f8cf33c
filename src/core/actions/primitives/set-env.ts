import { promises as fs } from 'fs';
import { join } from 'path';
import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { ensureDir } from '../../../utils/fs.js';
import { PrimitiveAction } from '../base-action.js';
import { ParamError, optionalStringTable } from '../params.js';

export const ENV_FILE_NAME = 'env.sh';

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Append `export NAME='value'` lines to the tool's env.sh.
 */
export class SetEnvAction extends PrimitiveAction {
  readonly name = 'set_env';
  readonly deterministic = true;

  validate(params: StepParams): void {
    const vars = optionalStringTable(params, 'vars');
    if (Object.keys(vars).length === 0) {
      throw new ParamError(`'vars' must set at least one variable`);
    }
    for (const name of Object.keys(vars)) {
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new ParamError(`'${name}' is not a valid environment variable name`);
      }
    }
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const vars = optionalStringTable(params, 'vars');
    const lines = Object.entries(vars).map(([name, value]) => `export ${name}=${shellQuote(value)}\n`);
    await ensureDir(ctx.installDir);
    await fs.appendFile(join(ctx.installDir, ENV_FILE_NAME), lines.join(''));
  }
}
