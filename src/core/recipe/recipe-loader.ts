import { join, resolve } from 'path';
import type { Recipe } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { RecipeValidationError } from '../../utils/errors.js';
import { computeRecipeHash, detectRecipeFormat, parseRecipe } from './recipe-parser.js';

export interface LoadedRecipe {
  recipe: Recipe;
  /** Where the recipe came from (a file path, or a label for in-memory recipes) */
  source: string;
  hash: string;
}

export interface RecipeLoader {
  /** Resolves to null when no recipe with that name exists */
  load(name: string): Promise<LoadedRecipe | null>;
}

/**
 * Load a single recipe file; the format follows the extension.
 */
export async function loadRecipeFile(path: string): Promise<LoadedRecipe> {
  const absolute = resolve(path);
  const format = detectRecipeFormat(absolute);
  if (!format) {
    throw new RecipeValidationError(`${absolute}: unsupported recipe extension (use .toml, .yml or .yaml)`);
  }
  const recipe = parseRecipe(await readTextFile(absolute), format, absolute);
  return { recipe, source: absolute, hash: computeRecipeHash(recipe) };
}

/**
 * Searches recipe directories in order for `<name>.toml`, `<name>.yml` or
 * `<name>.yaml`. The first match wins.
 */
export class FileRecipeLoader implements RecipeLoader {
  private readonly cache = new Map<string, LoadedRecipe>();

  constructor(private readonly searchDirs: string[]) {}

  async load(name: string): Promise<LoadedRecipe | null> {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    for (const dir of this.searchDirs) {
      for (const ext of FILE_PATTERNS.RECIPE_EXTENSIONS) {
        const candidate = join(dir, `${name}${ext}`);
        if (!(await exists(candidate))) {
          continue;
        }
        logger.debug(`Loading recipe '${name}' from ${candidate}`);
        const loaded = await loadRecipeFile(candidate);
        if (loaded.recipe.metadata.name !== name) {
          throw new RecipeValidationError(
            `${candidate}: metadata.name '${loaded.recipe.metadata.name}' does not match file name '${name}'`
          );
        }
        this.cache.set(name, loaded);
        return loaded;
      }
    }

    logger.debug(`Recipe '${name}' not found`, { searchDirs: this.searchDirs });
    return null;
  }
}

/**
 * Serves already parsed recipes; used for `--recipe <file>` overrides and tests.
 */
export class MemoryRecipeLoader implements RecipeLoader {
  private readonly recipes = new Map<string, LoadedRecipe>();

  constructor(recipes: Recipe[] = [], private readonly fallback?: RecipeLoader) {
    for (const recipe of recipes) {
      this.add(recipe);
    }
  }

  add(recipe: Recipe, source = `memory:${recipe.metadata.name}`): LoadedRecipe {
    const loaded = { recipe, source, hash: computeRecipeHash(recipe) };
    this.recipes.set(recipe.metadata.name, loaded);
    return loaded;
  }

  async load(name: string): Promise<LoadedRecipe | null> {
    const found = this.recipes.get(name);
    if (found) {
      return found;
    }
    return this.fallback ? this.fallback.load(name) : null;
  }
}
