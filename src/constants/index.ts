/**
 * Shared constants for the Quiver installer
 */

export const DIR_PATTERNS = {
  QUIVER: '.quiver'
} as const;

export const QUIVER_DIRS = {
  RECIPES: 'recipes',
  STATE: 'state',
  STATE_TOOLS: 'tools',
  TOOLS: 'tools',
  CACHE: 'cache',
  DOWNLOADS: 'downloads',
  LOCKS: 'locks',
  RUNTIME: 'quiver'
} as const;

export const FILE_PATTERNS = {
  TOML_FILES: '.toml',
  YML_FILES: '.yml',
  YAML_FILES: '.yaml',
  JSON_FILES: '.json',
  LOCK_FILES: '.lock',
  RECIPE_EXTENSIONS: ['.toml', '.yml', '.yaml']
} as const;

export const ENV_VARS = {
  HOME: 'QUIVER_HOME',
  VERBOSE: 'QUIVER_VERBOSE',
  GITHUB_TOKEN: 'GITHUB_TOKEN'
} as const;

/**
 * Current plan document format. Plans with any other value are regenerated
 * (install) or rejected (execute).
 */
export const PLAN_FORMAT_VERSION = 3;

/** Upper bound on dependency nodes a single plan may embed */
export const MAX_PLAN_DEPENDENCIES = 100;

export const DEFAULT_LOCK_TIMEOUT_MS = 5 * 60 * 1000;

export const LOCK_POLL_INTERVAL_MS = 200;

export const WORK_DIR_MODE = 0o700;
