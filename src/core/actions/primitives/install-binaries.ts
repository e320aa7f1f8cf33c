import { promises as fs } from 'fs';
import { join } from 'path';
import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { copyFile } from '../../../utils/fs.js';
import { PrimitiveAction } from '../base-action.js';
import { ParamError, parseBinaries } from '../params.js';
import { installBinDir, resolveInside } from './paths.js';

/**
 * Copy built or extracted executables from the work directory into the
 * tool's bin/ directory.
 */
export class InstallBinariesAction extends PrimitiveAction {
  readonly name = 'install_binaries';
  readonly deterministic = true;

  validate(params: StepParams): void {
    const binaries = parseBinaries(params.binaries);
    if (binaries.length === 0) {
      throw new ParamError(`'binaries' must list at least one executable`);
    }
    for (const binary of binaries) {
      if (binary.dest.includes('/')) {
        throw new ParamError(`binary destination '${binary.dest}' must be a plain file name`);
      }
    }
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const binDir = installBinDir(ctx);
    for (const binary of parseBinaries(params.binaries)) {
      const target = join(binDir, binary.dest);
      await copyFile(resolveInside(ctx.workDir, binary.src), target);
      await fs.chmod(target, 0o755);
      ctx.logger.debug(`Installed ${binary.dest}`, { target });
    }
  }
}
