import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FsWorkspace } from '../src/infra/workspace.js';

describe('FsWorkspace', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'gantry-ws-'));
    await fs.mkdir(path.join(root, 'src', 'lib'), { recursive: true });
    await fs.mkdir(path.join(root, 'node_modules', 'dep'), { recursive: true });
    await fs.writeFile(path.join(root, 'README.md'), '# demo\n');
    await fs.writeFile(path.join(root, 'src', 'index.ts'), 'export {};\n');
    await fs.writeFile(path.join(root, 'src', 'lib', 'util.ts'), 'export const x = 1;\n');
    await fs.writeFile(path.join(root, 'node_modules', 'dep', 'index.js'), '');
    await fs.writeFile(path.join(root, '.env'), 'TOKEN=placeholder\n');
    await fs.writeFile(path.join(root, 'cache.sqlite'), '');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists source files relative to the target, skipping ignored entries', async () => {
    const files = await new FsWorkspace().listFiles(root);
    expect(files).toEqual(['README.md', 'src/index.ts', 'src/lib/util.ts']);
  });

  it('reads existing files and leaves out missing ones', async () => {
    const contents = await new FsWorkspace().readFiles(root, ['src/index.ts', 'src/new.ts']);
    expect(contents).toEqual({ 'src/index.ts': 'export {};\n' });
  });

  it('refuses paths outside the target', async () => {
    await expect(new FsWorkspace().readFiles(root, ['../outside.ts'])).rejects.toThrow(
      'Path escapes target directory: ../outside.ts'
    );
  });
});
