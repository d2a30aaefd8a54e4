import { describe, expect, it } from 'vitest';
import { canTransition, createFileResult, isTerminal, markFailed, transition } from './file-state';

const file = { path: '/docs/scan.pdf', size: 10, modifiedAt: new Date(2024, 0, 1) };

describe('file lifecycle', () => {
  it('walks pending -> extracted -> named -> renamed', () => {
    const result = createFileResult(file);
    transition(result, 'extracted');
    transition(result, 'named');
    transition(result, 'renamed');
    expect(result.status).toBe('renamed');
    expect(isTerminal(result.status)).toBe(true);
  });

  it('allows failing from any non-terminal state', () => {
    for (const state of ['pending', 'extracted', 'named'] as const) {
      expect(canTransition(state, 'failed')).toBe(true);
    }
  });

  it('records the failure', () => {
    const result = createFileResult(file);
    markFailed(result, { kind: 'UnreadablePdfError', message: 'bad' });
    expect(result).toMatchObject({ status: 'failed', failure: { kind: 'UnreadablePdfError', message: 'bad' } });
  });

  it('refuses to skip or revisit states', () => {
    const result = createFileResult(file);
    expect(() => transition(result, 'renamed')).toThrow('Illegal state transition for /docs/scan.pdf: pending -> renamed');

    transition(result, 'extracted');
    expect(() => transition(result, 'pending')).toThrow();
  });

  it('never leaves a terminal state', () => {
    const result = createFileResult(file);
    markFailed(result, { kind: 'RenameError', message: 'EACCES' });
    expect(() => transition(result, 'extracted')).toThrow();
    expect(canTransition('renamed', 'failed')).toBe(false);
  });
});
