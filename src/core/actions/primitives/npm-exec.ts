import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { PrimitiveAction } from '../base-action.js';
import { requireString } from '../params.js';
import { commandEnv } from './paths.js';

/**
 * `npm install -g --prefix <installDir> <package>@<version>`; npm links the
 * package's executables into <installDir>/bin.
 */
export class NpmExecAction extends PrimitiveAction {
  readonly name = 'npm_exec';
  readonly requiresNetwork = true;
  readonly implicitDependencies = ['nodejs'];

  validate(params: StepParams): void {
    requireString(params, 'package');
    requireString(params, 'version');
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const spec = `${requireString(params, 'package')}@${requireString(params, 'version')}`;
    await ctx.runCommand('npm', ['install', '-g', '--prefix', ctx.installDir, spec], {
      cwd: ctx.workDir,
      env: commandEnv(ctx, { npm_config_cache: `${ctx.workDir}/.npm` }),
      signal: ctx.signal
    });
  }
}
