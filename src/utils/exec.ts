import { execFile } from 'child_process';
import { promisify } from 'util';
import type { CommandOptions, CommandOutput, CommandRunner } from '../types/execution-context.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

function stderrOf(error: unknown): string {
  if (error instanceof Error && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' || Buffer.isBuffer(stderr)) {
      return stderr.toString().trim();
    }
  }
  return '';
}

/**
 * Default CommandRunner: execFile without a shell, output decoded as UTF-8.
 */
export const runCommand: CommandRunner = async (
  file: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandOutput> => {
  logger.debug(`Running ${file} ${args.join(' ')}`, { cwd: options.cwd });
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
      encoding: 'utf8',
      maxBuffer: 16 * 1024 * 1024
    });
    return { stdout, stderr };
  } catch (error) {
    const detail = stderrOf(error) || (error instanceof Error ? error.message : String(error));
    throw new Error(`${file} ${args.join(' ')} failed: ${detail}`, { cause: error });
  }
};
