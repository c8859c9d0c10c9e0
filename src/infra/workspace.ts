import fs from 'node:fs/promises';
import path from 'node:path';
import type { Workspace } from '../core/collaborators.js';

const IGNORED_DIRS = new Set(['.git', 'node_modules', 'dist', 'build', 'coverage', '.gantry', '__pycache__']);
const IGNORED_FILE = /\.(sqlite3?|db|log|pyc)$|^\.DS_Store$|^\.env$/;

/** Files under a target directory on the local disk. */
export class FsWorkspace implements Workspace {
  async listFiles(targetPath: string): Promise<string[]> {
    const root = path.resolve(targetPath);
    const out: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isDirectory()) {
          if (!IGNORED_DIRS.has(entry.name)) await walk(path.join(dir, entry.name));
        } else if (entry.isFile() && !IGNORED_FILE.test(entry.name)) {
          out.push(path.relative(root, path.join(dir, entry.name)).split(path.sep).join('/'));
        }
      }
    };

    await walk(root);
    return out.sort();
  }

  async readFiles(targetPath: string, files: string[]): Promise<Record<string, string>> {
    const root = path.resolve(targetPath);
    const contents: Record<string, string> = {};
    for (const file of files) {
      const abs = path.resolve(root, file);
      if (abs !== root && !abs.startsWith(root + path.sep)) {
        throw new Error(`Path escapes target directory: ${file}`);
      }
      try {
        contents[file] = await fs.readFile(abs, 'utf8');
      } catch (err) {
        if (isMissing(err)) continue;
        throw err;
      }
    }
    return contents;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
