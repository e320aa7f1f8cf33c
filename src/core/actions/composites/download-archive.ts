import type { StepParams } from '../../../types/index.js';
import { CompositeAction } from '../base-action.js';
import type { ActionStep } from '../types.js';
import {
  baseName,
  binariesToParam,
  optionalNumber,
  requireBinaries,
  requireString
} from '../params.js';
import { resolveArchiveFormat } from '../primitives/extract.js';

/**
 * download_file, extract, chmod, install_binaries for one archive.
 *
 * Params: url, archive_format, binaries (or binary), strip_dirs, checksum.
 */
export class DownloadArchiveAction extends CompositeAction {
  readonly name = 'download_archive';

  decompose(params: StepParams): ActionStep[] {
    return archiveSteps(requireString(params, 'url'), params);
  }
}

/**
 * Shared by every archive-shaped composite once it knows the download URL.
 */
export function archiveSteps(url: string, params: StepParams): ActionStep[] {
  const archive = baseName(url);
  const format = resolveArchiveFormat({ format: requireString(params, 'archive_format'), archive });
  const binaries = requireBinaries(params);

  const download: StepParams = { url, dest: archive };
  if (typeof params.checksum === 'string') {
    download.checksum = params.checksum;
  }

  return [
    { action: 'download_file', params: download },
    {
      action: 'extract',
      params: { archive, format, strip_dirs: optionalNumber(params, 'strip_dirs', 0) }
    },
    { action: 'chmod', params: { files: binaries.map(binary => binary.src) } },
    { action: 'install_binaries', params: { binaries: binariesToParam(binaries) } }
  ];
}
