import type { StepParams } from '../../../types/index.js';
import type { ExecutionContext } from '../../../types/execution-context.js';
import { ensureDir } from '../../../utils/fs.js';
import { PrimitiveAction } from '../base-action.js';
import { ParamError, optionalNumber, optionalString, requireString } from '../params.js';
import { resolveInside } from './paths.js';

export const ARCHIVE_FORMATS = ['tar.gz', 'tgz', 'tar.xz', 'tar.bz2', 'tar', 'zip'] as const;

export type ArchiveFormat = typeof ARCHIVE_FORMATS[number];

const TAR_COMPRESSION_FLAGS: Record<Exclude<ArchiveFormat, 'zip'>, string> = {
  'tar.gz': 'z',
  tgz: 'z',
  'tar.xz': 'J',
  'tar.bz2': 'j',
  tar: ''
};

function isArchiveFormat(value: string): value is ArchiveFormat {
  return ARCHIVE_FORMATS.some(format => format === value);
}

/**
 * Guess the format from the archive's file name, longest suffix first.
 */
export function detectArchiveFormat(fileName: string): ArchiveFormat | undefined {
  const lower = fileName.toLowerCase();
  return [...ARCHIVE_FORMATS]
    .sort((a, b) => b.length - a.length)
    .find(format => lower.endsWith(`.${format}`));
}

export function resolveArchiveFormat(params: StepParams): ArchiveFormat {
  const declared = optionalString(params, 'format');
  if (declared !== undefined) {
    if (!isArchiveFormat(declared)) {
      throw new ParamError(`unsupported archive format '${declared}' (expected one of ${ARCHIVE_FORMATS.join(', ')})`);
    }
    return declared;
  }
  const archive = requireString(params, 'archive');
  const detected = detectArchiveFormat(archive);
  if (!detected) {
    throw new ParamError(`cannot infer archive format from '${archive}'; set 'format'`);
  }
  return detected;
}

/**
 * Unpack an archive from the work directory with the system tar or unzip.
 */
export class ExtractAction extends PrimitiveAction {
  readonly name = 'extract';
  readonly deterministic = true;

  validate(params: StepParams): void {
    requireString(params, 'archive');
    const format = resolveArchiveFormat(params);
    if (format === 'zip' && optionalNumber(params, 'strip_dirs', 0) > 0) {
      throw new ParamError(`'strip_dirs' is not supported for zip archives`);
    }
  }

  async execute(params: StepParams, ctx: ExecutionContext): Promise<void> {
    const archive = resolveInside(ctx.workDir, requireString(params, 'archive'));
    const dest = resolveInside(ctx.workDir, optionalString(params, 'dest') ?? '.');
    const format = resolveArchiveFormat(params);
    const stripDirs = optionalNumber(params, 'strip_dirs', 0);

    await ensureDir(dest);

    if (format === 'zip') {
      await ctx.runCommand('unzip', ['-o', '-q', archive, '-d', dest], { signal: ctx.signal });
      return;
    }

    const args = [`-x${TAR_COMPRESSION_FLAGS[format]}f`, archive, '-C', dest];
    if (stripDirs > 0) {
      args.push(`--strip-components=${stripDirs}`);
    }
    await ctx.runCommand('tar', args, { signal: ctx.signal });
  }
}
