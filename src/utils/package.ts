import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'quiver';

/**
 * Version of the running CLI, read from the nearest package.json named
 * quiver above this module (works from src/ and from dist/src/).
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (
        pkg !== null && typeof pkg === 'object'
        && 'name' in pkg && pkg.name === PACKAGE_NAME
        && 'version' in pkg && typeof pkg.version === 'string'
      ) {
        return pkg.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}
