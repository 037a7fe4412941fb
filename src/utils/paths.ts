import path from 'path';
import fs from 'fs-extra';

// Walk up from this file until a package.json is found, so paths do not
// depend on the directory the process was started from.
function findProjectRoot(startPath: string): string {
  let currentDir = startPath;
  while (currentDir !== path.parse(currentDir).root) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return process.cwd();
}

const PROJECT_ROOT = findProjectRoot(__dirname);

export function getProjectRoot(): string {
  return PROJECT_ROOT;
}

export function resolvePath(...segments: string[]): string {
  return path.resolve(PROJECT_ROOT, ...segments);
}

/** Resolves `target` against the project root unless it is already absolute. */
export function resolveFromRoot(target: string): string {
  return path.isAbsolute(target) ? target : resolvePath(target);
}
