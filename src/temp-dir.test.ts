import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createCloneDir } from './temp-dir.js';

describe('createCloneDir', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'clone-dir-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates an empty prefixed directory under the given root', async () => {
    const dir = await createCloneDir(root);

    expect(path.dirname(dir)).toBe(root);
    expect(path.basename(dir).startsWith('upstream-head-')).toBe(true);
    expect((await fs.stat(dir)).isDirectory()).toBe(true);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('returns a different directory on every call', async () => {
    const a = await createCloneDir(root);
    const b = await createCloneDir(root);

    expect(a).not.toBe(b);
  });

  it('rejects when the root does not exist', async () => {
    await expect(createCloneDir(path.join(root, 'missing'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
