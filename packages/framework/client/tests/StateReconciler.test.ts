import { createChallenge } from '@inkling/testing';
import { describe, expect, it } from 'vitest';
import { createSnapshot, merge, restoreFromSnapshot } from '../src/index.js';

describe('merge', () => {
  it('should keep the local prompt and take the remote image', () => {
    const local = [createChallenge({ id: 'c1', prompt: 'X', imageUrl: null })];
    const remote = [createChallenge({ id: 'c1', prompt: null, imageUrl: 'img1' })];

    const [merged] = merge(local, remote);

    expect(merged?.prompt).toBe('X');
    expect(merged?.imageUrl).toBe('img1');
  });

  it('should fall back to the remote prompt when the local one is absent', () => {
    const local = [createChallenge({ id: 'c1', prompt: null })];
    const remote = [createChallenge({ id: 'c1', prompt: 'from server' })];

    expect(merge(local, remote)[0]?.prompt).toBe('from server');
  });

  it('should take every server-computed field from the remote copy', () => {
    const local = [createChallenge({ id: 'c1', isResolved: false, currentPhase: 'waiting_prompt' })];
    const remote = [
      createChallenge({ id: 'c1', isResolved: true, currentPhase: 'resolved', completedAt: 1234 }),
    ];

    const [merged] = merge(local, remote);

    expect(merged?.isResolved).toBe(true);
    expect(merged?.currentPhase).toBe('resolved');
    expect(merged?.completedAt).toBe(1234);
  });

  it('should keep local template fields over remote ones', () => {
    const local = [createChallenge({ id: 'c1', input1: 'chien' })];
    const remote = [createChallenge({ id: 'c1', input1: 'loup' })];

    expect(merge(local, remote)[0]?.input1).toBe('chien');
  });

  it('should return an empty list when there is nothing local', () => {
    expect(merge([], [createChallenge({ id: 'c1' })])).toEqual([]);
  });

  it('should return a copy of the local list when remote is empty', () => {
    const local = [createChallenge({ id: 'c1' })];
    const merged = merge(local, []);

    expect(merged).toEqual(local);
    expect(merged).not.toBe(local);
  });

  it('should follow local order and never introduce remote-only challenges', () => {
    const local = [createChallenge({ id: 'b' }), createChallenge({ id: 'a' })];
    const remote = [
      createChallenge({ id: 'a' }),
      createChallenge({ id: 'z' }),
      createChallenge({ id: 'b' }),
    ];

    expect(merge(local, remote).map((c) => c.id)).toEqual(['b', 'a']);
  });

  it('should keep unmatched local challenges unchanged', () => {
    const pending = createChallenge({ id: 'local-only', prompt: 'draft' });
    const merged = merge([pending], [createChallenge({ id: 'other' })]);

    expect(merged[0]).toBe(pending);
  });
});

describe('snapshots', () => {
  it('should not be affected by later edits of the source list', () => {
    const source = [createChallenge({ id: 'c1', prompt: 'before' })];
    const snapshot = createSnapshot(source);

    source[0] = { ...createChallenge({ id: 'c1' }), prompt: 'after' };

    expect(snapshot[0]?.prompt).toBe('before');
  });

  it('should freeze the snapshot entries', () => {
    const snapshot = createSnapshot([createChallenge({ id: 'c1' })]);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it('should restore equal but independent copies on every call', () => {
    const snapshot = createSnapshot([createChallenge({ id: 'c1', prompt: 'p' })]);

    const first = restoreFromSnapshot(snapshot);
    const second = restoreFromSnapshot(snapshot);

    expect(first).toEqual(second);
    expect(first[0]).not.toBe(second[0]);
    expect(first[0]?.forbiddenWords).not.toBe(snapshot[0]?.forbiddenWords);
  });
});
