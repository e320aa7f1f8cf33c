import { join } from 'path';
import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { PrimitiveAction } from '../base-action.js';
import { requireString } from '../params.js';
import { commandEnv, installBinDir } from './paths.js';

/**
 * `go install <module>@<version>` with GOBIN pointed at the tool's bin/.
 */
export class GoBuildAction extends PrimitiveAction {
  readonly name = 'go_build';
  readonly requiresNetwork = true;
  readonly implicitDependencies = ['go'];

  validate(params: StepParams): void {
    requireString(params, 'module');
    requireString(params, 'version');
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const target = `${requireString(params, 'module')}@${requireString(params, 'version')}`;
    const goPath = join(ctx.workDir, 'gopath');
    await ctx.runCommand('go', ['install', target], {
      cwd: ctx.workDir,
      env: commandEnv(ctx, {
        GOBIN: installBinDir(ctx),
        GOPATH: goPath,
        GOMODCACHE: join(goPath, 'pkg', 'mod'),
        CGO_ENABLED: '0'
      }),
      signal: ctx.signal
    });
  }
}
