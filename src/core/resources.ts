import * as fs from 'fs';
import * as path from 'path';

/**
 * Nearest directory at or above `from` that holds a package.json
 */
export function packageRoot(from: string = __dirname): string {
  let dir = from;
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json above ${from}`);
    }
    dir = parent;
  }
}

/**
 * Locate a directory or file shipped at the package root (`schema/`, `data/`).
 * Works from both the TypeScript sources and the compiled `dist/src` tree,
 * since both sit below the same package.json.
 */
export function resolveResource(name: string, from: string = __dirname): string {
  const candidate = path.join(packageRoot(from), name);
  if (!fs.existsSync(candidate)) {
    throw new Error(`Cannot locate bundled resource "${name}" above ${from}`);
  }
  return candidate;
}

/**
 * Read a bundled JSON data file
 */
export function readDataFile(name: string): unknown {
  const file = resolveResource(path.join('data', name));
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
