import { revParseHead, shallowClone, type HeadScope } from './git.js';
import type { LoggerLike } from './logging/logger-like.js';
import { createCloneDir } from './temp-dir.js';
import { CLONE_DEPTH, UPSTREAM_URL } from './upstream.js';

export type FetchLatestCommitOptions = {
  gitBin?: string;
  scope?: HeadScope;
  /** Parent directory for the clone. Defaults to the OS temp directory. */
  tmpRoot?: string;
  log?: LoggerLike;
};

export type LatestCommit = {
  /** Output of `git rev-parse HEAD`, as decoded. */
  commit: string;
  /** Clone location. Left on disk. */
  dir: string;
};

/**
 * Shallow-clones the upstream repository into a new temporary directory and
 * resolves its HEAD. Steps run one after another; the first failure rejects
 * and nothing later runs.
 */
export async function fetchLatestCommit(opts: FetchLatestCommitOptions = {}): Promise<LatestCommit> {
  const { gitBin, scope, tmpRoot, log } = opts;

  const dir = await createCloneDir(tmpRoot);
  log?.debug({ dir }, 'clone:temp dir created');

  log?.debug({ url: UPSTREAM_URL, depth: CLONE_DEPTH, dir }, 'clone:start');
  await shallowClone(UPSTREAM_URL, dir, { depth: CLONE_DEPTH, gitBin });
  log?.debug({ dir }, 'clone:done');

  const commit = await revParseHead(dir, { scope, gitBin });
  log?.debug({ dir, commit: commit.trim() }, 'head:resolved');

  return { commit, dir };
}
