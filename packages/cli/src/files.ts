import * as fs from 'node:fs/promises';
import path from 'node:path';

export const CONFIG_EXTENSION = '.tf';

/**
 * Expands the given paths into configuration files.
 * Directories contribute their `.tf` files in name order; hidden directories such as `.terraform` are skipped.
 */
export async function discoverFiles(paths: string[], recursive: boolean, cwd: string = process.cwd()): Promise<string[]> {
  const files: string[] = [];

  for (const input of paths) {
    const fullPath = path.resolve(cwd, input);
    const stats = await fs.stat(fullPath);
    if (stats.isDirectory()) files.push(...(await collectDirectory(fullPath, recursive)));
    else files.push(fullPath);
  }

  return [...new Set(files)];
}

async function collectDirectory(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isFile() && entry.name.endsWith(CONFIG_EXTENSION)) files.push(entryPath);
    else if (recursive && entry.isDirectory() && !entry.name.startsWith('.')) files.push(...(await collectDirectory(entryPath, recursive)));
  }
  return files;
}
