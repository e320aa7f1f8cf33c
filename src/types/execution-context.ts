/**
 * Execution Context Types
 *
 * What a primitive action sees while a plan runs.
 */

import type { Logger } from './index.js';
import type { Platform } from './platform.js';
import type { OutputPort } from '../core/ports/output.js';
import type { Downloader } from '../core/download/downloader.js';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program without a shell. Rejects on non-zero exit.
 */
export type CommandRunner = (file: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>;

export interface ExecutionContext {
  /** Tool whose steps are running (the root tool or a dependency) */
  tool: string;
  version: string;
  platform: Platform;

  /**
   * Scratch directory for this tool's steps, mode 0700.
   * Relative step paths (download dest, extract archive) resolve here.
   */
  workDir: string;

  /** Final location: tools/<tool>-<version> */
  installDir: string;

  /** bin/ directories of this tool's installed dependencies, nearest first */
  dependencyBinDirs: string[];

  downloader: Downloader;
  runCommand: CommandRunner;
  logger: Logger;
  output: OutputPort;
  signal?: AbortSignal;
}
