import path from 'node:path';
import { execa } from 'execa';

export type HeadScope = 'git-dir' | 'cwd';

export type GitOptions = {
  gitBin?: string;
};

export type ShallowCloneOptions = GitOptions & {
  depth: number;
};

export type RevParseOptions = GitOptions & {
  /**
   * How the query is pointed at the clone: `git-dir` passes
   * `--git-dir=<dir>/.git`, `cwd` runs git with `<dir>` as its working
   * directory.
   */
  scope?: HeadScope;
};

/**
 * Clones `url` into `dest`, truncated to `depth` commits. Output from git
 * goes straight to this process's stdout and stderr.
 */
export async function shallowClone(url: string, dest: string, opts: ShallowCloneOptions): Promise<void> {
  await execa(
    opts.gitBin ?? 'git',
    ['clone', '--quiet', '--depth', String(opts.depth), url, dest],
    { stdio: 'inherit' },
  );
}

/**
 * Resolves HEAD of the checkout at `dir`. Returns git's stdout as text,
 * trailing newline included.
 */
export async function revParseHead(dir: string, opts: RevParseOptions = {}): Promise<string> {
  const gitBin = opts.gitBin ?? 'git';
  const result = (opts.scope ?? 'git-dir') === 'cwd'
    ? await execa(gitBin, ['rev-parse', 'HEAD'], { cwd: dir, stderr: 'inherit', stripFinalNewline: false })
    : await execa(
      gitBin,
      [`--git-dir=${path.join(dir, '.git')}`, 'rev-parse', 'HEAD'],
      { stderr: 'inherit', stripFinalNewline: false },
    );
  return result.stdout;
}
