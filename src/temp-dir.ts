import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { TEMP_DIR_PREFIX } from './upstream.js';

/**
 * Creates a fresh, uniquely named directory for a clone and returns its path.
 * The caller owns it; nothing removes it afterwards.
 */
export async function createCloneDir(root: string = os.tmpdir()): Promise<string> {
  return fs.mkdtemp(path.join(root, TEMP_DIR_PREFIX));
}
