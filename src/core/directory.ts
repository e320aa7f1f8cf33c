import * as os from 'os';
import * as path from 'path';
import { QuiverDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, QUIVER_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Get Quiver directories using the dotfile convention (~/.quiver on all
 * platforms). QUIVER_HOME, or an explicit home, relocates the whole tree.
 */
export function getQuiverDirectories(home?: string): QuiverDirectories {
  const quiverHome = home ?? process.env[ENV_VARS.HOME] ?? path.join(os.homedir(), DIR_PATTERNS.QUIVER);

  return {
    home: quiverHome,
    config: quiverHome,
    recipes: path.join(quiverHome, QUIVER_DIRS.RECIPES),
    state: path.join(quiverHome, QUIVER_DIRS.STATE),
    tools: path.join(quiverHome, QUIVER_DIRS.TOOLS),
    cache: path.join(quiverHome, QUIVER_DIRS.CACHE),
    locks: path.join(quiverHome, QUIVER_DIRS.LOCKS),
    runtime: path.join(os.tmpdir(), QUIVER_DIRS.RUNTIME)
  };
}

/**
 * Ensure all Quiver directories exist
 */
export async function ensureQuiverDirectories(dirs: QuiverDirectories = getQuiverDirectories()): Promise<QuiverDirectories> {
  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.recipes),
      ensureDir(dirs.state),
      ensureDir(dirs.tools),
      ensureDir(dirs.cache),
      ensureDir(dirs.locks),
      ensureDir(dirs.runtime)
    ]);

    logger.debug('Quiver directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create Quiver directories', { error, directories: dirs });
    throw error;
  }
}

/**
 * Directory holding cached plans: state/tools/<tool>/<version>.json
 */
export function getToolStateDirectory(dirs: QuiverDirectories, tool: string): string {
  return path.join(dirs.state, QUIVER_DIRS.STATE_TOOLS, tool);
}

export function getDownloadCacheDirectory(dirs: QuiverDirectories): string {
  return path.join(dirs.cache, QUIVER_DIRS.DOWNLOADS);
}

/**
 * Final install location of a tool: tools/<tool>-<version>
 */
export function getToolInstallDirectory(dirs: Pick<QuiverDirectories, 'tools'>, tool: string, version: string): string {
  return path.join(dirs.tools, `${tool}-${version}`);
}
