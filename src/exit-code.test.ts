import { describe, expect, it } from 'vitest';
import { exitCodeFor, isSubprocessFailure } from './exit-code.js';

describe('exitCodeFor', () => {
  it('passes through the exit code of a failed child', () => {
    expect(exitCodeFor(Object.assign(new Error('clone failed'), { exitCode: 128 }))).toBe(128);
  });

  it('returns 1 for an error without an exit code', () => {
    const err = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    expect(exitCodeFor(err)).toBe(1);
  });

  it('returns 1 when the child was killed by a signal', () => {
    expect(exitCodeFor({ exitCode: undefined, signal: 'SIGTERM' })).toBe(1);
  });

  it('returns 1 for a zero exit code', () => {
    expect(exitCodeFor({ exitCode: 0 })).toBe(1);
  });

  it('returns 1 for non-object throws', () => {
    expect(exitCodeFor('boom')).toBe(1);
    expect(exitCodeFor(null)).toBe(1);
  });
});

describe('isSubprocessFailure', () => {
  it('recognises a non-zero exit', () => {
    expect(isSubprocessFailure({ exitCode: 1 })).toBe(true);
  });

  it('rejects a spawn failure', () => {
    expect(isSubprocessFailure(Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' }))).toBe(false);
  });

  it('rejects a non-integer exit code', () => {
    expect(isSubprocessFailure({ exitCode: 1.5 })).toBe(false);
  });
});
