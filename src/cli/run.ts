import type { UpstreamHeadConfig } from '../config.js';
import { exitCodeFor, isSubprocessFailure } from '../exit-code.js';
import { fetchLatestCommit } from '../latest-commit.js';
import type { LoggerLike } from '../logging/logger-like.js';

export type RunCliOptions = {
  config: UpstreamHeadConfig;
  stdout: { write: (chunk: string) => unknown };
  log: LoggerLike;
  tmpRoot?: string;
};

/**
 * Prints the upstream HEAD commit to `stdout` and resolves to the process
 * exit status. Nothing is printed on failure.
 */
export async function runCli(opts: RunCliOptions): Promise<number> {
  const { config, stdout, log, tmpRoot } = opts;
  try {
    const { commit, dir } = await fetchLatestCommit({ gitBin: config.gitBin, tmpRoot, log });
    stdout.write(commit);
    log.debug({ dir }, 'run:done');
    return 0;
  } catch (err) {
    const exitCode = exitCodeFor(err);
    // git has already reported a non-zero exit on stderr.
    if (isSubprocessFailure(err)) {
      log.debug({ err, exitCode }, 'run:git failed');
    } else {
      log.error({ err, exitCode }, 'run:failed');
    }
    return exitCode;
  }
}
