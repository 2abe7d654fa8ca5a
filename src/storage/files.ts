/**
 * File-based storage helpers for the `.leasegraph/` workspace.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { parse, stringify } from 'yaml';

/**
 * Workspace directory name.
 */
export const WORKSPACE_DIR = '.leasegraph';

/**
 * Find the workspace root by walking up from cwd.
 */
export function findWorkspaceRoot(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, WORKSPACE_DIR))) {
      return dir;
    }
    dir = dirname(dir);
  }
  return null;
}

/**
 * Read and parse a YAML (or JSON) file. Shape checks are the caller's job.
 */
export function loadYaml(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf-8');
  return parse(content);
}

export function saveYaml(filePath: string, value: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const content = stringify(value, { lineWidth: 0 });
  writeFileSync(filePath, content, 'utf-8');
}

/**
 * List YAML files under a directory recursively, sorted by path.
 */
export function listYamlFiles(dir: string): string[] {
  const files: string[] = [];

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        walkDir(fullPath);
      } else if (entry.name.endsWith('.yaml') || entry.name.endsWith('.yml')) {
        files.push(fullPath);
      }
    }
  }

  if (existsSync(dir)) {
    walkDir(dir);
  }

  return files.sort();
}
