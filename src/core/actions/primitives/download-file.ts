import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { copyFile } from '../../../utils/fs.js';
import { PrimitiveAction } from '../base-action.js';
import { ParamError, baseName, optionalString, requireString } from '../params.js';
import { resolveInside } from './paths.js';

/**
 * Fetch `url` into the work directory as `dest` (default: the URL's last
 * segment). A `checksum` param is passed to the downloader so a cached copy
 * with that digest can be reused; the executor verifies the file afterwards.
 */
export class DownloadFileAction extends PrimitiveAction {
  readonly name = 'download_file';
  readonly deterministic = true;
  readonly requiresNetwork = true;

  validate(params: StepParams): void {
    const url = requireString(params, 'url');
    if (!/^https?:\/\//.test(url)) {
      throw new ParamError(`'url' must be an http(s) URL, got '${url}'`);
    }
    optionalString(params, 'checksum');
    destinationName(params);
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const url = requireString(params, 'url');
    const dest = downloadDestination(params, ctx.workDir);
    const result = await ctx.downloader.fetch(url, {
      signal: ctx.signal,
      expectedChecksum: optionalString(params, 'checksum')
    });
    await copyFile(result.path, dest);
    ctx.logger.debug(`Downloaded ${url} -> ${dest}`, { size: result.size });
  }
}

function destinationName(params: StepParams): string {
  return optionalString(params, 'dest') ?? baseName(requireString(params, 'url'));
}

/**
 * Absolute path a download_file step writes to.
 */
export function downloadDestination(params: StepParams, workDir: string): string {
  return resolveInside(workDir, destinationName(params));
}
