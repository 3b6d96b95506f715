import * as fs from 'node:fs/promises';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { discoverFiles } from '../src/files';

vi.mock('node:fs/promises');

function entry(name: string, kind: 'file' | 'dir') {
  return { name, isFile: () => kind === 'file', isDirectory: () => kind === 'dir' };
}

const tree: Record<string, ReturnType<typeof entry>[]> = {
  '/work': [entry('b.tf', 'file'), entry('notes.md', 'file'), entry('modules', 'dir'), entry('.terraform', 'dir'), entry('a.tf', 'file')],
  '/work/modules': [entry('main.tf', 'file')],
  '/work/.terraform': [entry('cached.tf', 'file')],
};

describe('discoverFiles', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(fs.stat).mockImplementation((async (target: unknown) => ({ isDirectory: () => String(target) in tree })) as never);
    vi.mocked(fs.readdir).mockImplementation((async (dir: unknown) => tree[String(dir)] ?? []) as never);
  });

  it('should list the .tf files of a directory in name order', async () => {
    expect(await discoverFiles(['/work'], false)).toEqual(['/work/a.tf', '/work/b.tf']);
  });

  it('should descend into subdirectories but skip hidden ones', async () => {
    expect(await discoverFiles(['/work'], true)).toEqual(['/work/a.tf', '/work/b.tf', '/work/modules/main.tf']);
  });

  it('should take files as given, relative to the working directory, once each', async () => {
    expect(await discoverFiles(['vars.tfvars', '/work/vars.tfvars'], false, '/work')).toEqual(['/work/vars.tfvars']);
  });

  it('should fail on a missing path', async () => {
    vi.mocked(fs.stat).mockRejectedValue(new Error('ENOENT: no such file or directory'));
    await expect(discoverFiles(['/missing'], false)).rejects.toThrow('ENOENT');
  });
});
