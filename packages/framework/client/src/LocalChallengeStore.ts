/**
 * @fileoverview Locally-known challenges with optimistic edits.
 *
 * The store's list defines which challenges this client works on; the
 * synchronizer merges it against every remote fetch.
 */

import type { Challenge } from '@inkling/shared';
import {
  type ChallengeSnapshot,
  createSnapshot,
  merge,
  restoreFromSnapshot,
} from './StateReconciler.js';

export type ChallengePatch = Partial<Omit<Challenge, 'id'>>;

export class LocalChallengeStore {
  private challenges: Challenge[];

  constructor(initial: readonly Challenge[] = []) {
    this.challenges = [...initial];
  }

  all(): readonly Challenge[] {
    return this.challenges;
  }

  get(id: string): Challenge | undefined {
    return this.challenges.find((c) => c.id === id);
  }

  get size(): number {
    return this.challenges.length;
  }

  /**
   * Append challenges not yet known. Known ones are left as they are.
   */
  track(challenges: readonly Challenge[]): void {
    const known = new Set(this.challenges.map((c) => c.id));
    const added = challenges.filter((c) => !known.has(c.id));
    if (added.length > 0) {
      this.challenges = [...this.challenges, ...added];
    }
  }

  /**
   * Replace one challenge with a patched copy. Returns the new value.
   */
  update(id: string, patch: ChallengePatch): Challenge | undefined {
    const index = this.challenges.findIndex((c) => c.id === id);
    const current = this.challenges[index];
    if (!current) {
      return undefined;
    }
    const updated: Challenge = { ...current, ...patch };
    this.challenges = this.challenges.map((c, i) => (i === index ? updated : c));
    return updated;
  }

  /**
   * Merge the local list with a remote copy and keep the result.
   */
  reconcile(remote: readonly Challenge[]): Challenge[] {
    this.challenges = merge(this.challenges, remote);
    return [...this.challenges];
  }

  checkpoint(): ChallengeSnapshot {
    return createSnapshot(this.challenges);
  }

  rollback(snapshot: ChallengeSnapshot): void {
    this.challenges = restoreFromSnapshot(snapshot);
  }

  clear(): void {
    this.challenges = [];
  }
}
