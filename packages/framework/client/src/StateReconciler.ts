/**
 * @fileoverview Merge of locally-composed challenges with the remote copy.
 *
 * The local list decides which challenges exist; the remote list only
 * contributes the fields the server computes. All functions are pure.
 */

import type { Challenge } from '@inkling/shared';

/**
 * Independent copy of a challenge list, taken before a risky remote call.
 */
export type ChallengeSnapshot = readonly Readonly<Challenge>[];

function copyChallenge(challenge: Challenge): Challenge {
  return { ...challenge, forbiddenWords: [...challenge.forbiddenWords] };
}

function mergeOne(local: Challenge, remote: Challenge): Challenge {
  return {
    ...local,
    // in-progress fields: local wins unless absent
    prompt: local.prompt ?? remote.prompt,
    answer: local.answer ?? remote.answer,
    // server-computed fields
    imageUrl: remote.imageUrl,
    isResolved: remote.isResolved,
    currentPhase: remote.currentPhase,
    completedAt: remote.completedAt,
  };
}

/**
 * Reconcile `local` against `remote`. Output order follows `local`; remote-only
 * challenges are never introduced.
 */
export function merge(local: readonly Challenge[], remote: readonly Challenge[]): Challenge[] {
  if (local.length === 0) {
    return [];
  }
  if (remote.length === 0) {
    return [...local];
  }

  const remoteById = new Map<string, Challenge>();
  for (const challenge of remote) {
    remoteById.set(challenge.id, challenge);
  }

  return local.map((challenge) => {
    const counterpart = remoteById.get(challenge.id);
    return counterpart ? mergeOne(challenge, counterpart) : challenge;
  });
}

export function createSnapshot(challenges: readonly Challenge[]): ChallengeSnapshot {
  return Object.freeze(challenges.map((c) => Object.freeze(copyChallenge(c))));
}

/**
 * Fresh mutable copy of a snapshot. Each call returns new objects.
 */
export function restoreFromSnapshot(snapshot: ChallengeSnapshot): Challenge[] {
  return snapshot.map(copyChallenge);
}
