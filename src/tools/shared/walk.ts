import { promises as fs } from 'node:fs';
import path from 'node:path';

export interface WalkOptions {
  /** Directory names never descended into */
  skipDirectories?: ReadonlySet<string>;
}

/**
 * Yield every regular file under `root` as a `/`-separated relative path,
 * depth first with entries in name order. Symlinks are not followed.
 */
export async function* walkFiles(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const skip = options.skipDirectories ?? new Set<string>();

  async function* visit(dir: string, prefix: string): AsyncGenerator<string> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (skip.has(entry.name)) continue;
        yield* visit(path.join(dir, entry.name), relative);
      } else if (entry.isFile()) {
        yield relative;
      }
    }
  }

  yield* visit(root, '');
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
