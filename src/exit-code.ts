/**
 * True when `err` reports a child process that ran and exited non-zero.
 * Such a child has already written its own diagnostics to stderr.
 */
export function isSubprocessFailure(err: unknown): err is { exitCode: number } {
  return (
    typeof err === 'object'
    && err !== null
    && 'exitCode' in err
    && typeof err.exitCode === 'number'
    && Number.isInteger(err.exitCode)
    && err.exitCode > 0
  );
}

/** Exit status for a failed run: the child's own code when there is one, else 1. */
export function exitCodeFor(err: unknown): number {
  return isSubprocessFailure(err) ? err.exitCode : 1;
}
