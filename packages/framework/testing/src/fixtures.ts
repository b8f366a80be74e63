/**
 * @fileoverview Entity builders for tests.
 *
 * Every builder returns a complete entity with neutral defaults; pass only the
 * fields a test cares about.
 */

import type { Challenge, ChallengeDraft, GameSession, Player, TeamColor } from '@inkling/shared';

export function createPlayer(overrides: Partial<Player> & { id: string }): Player {
  return {
    name: `Player ${overrides.id}`,
    color: null,
    role: null,
    isHost: false,
    challengesSent: 0,
    hasDrawn: false,
    hasGuessed: false,
    ...overrides,
  };
}

export function createSession(overrides: Partial<GameSession> = {}): GameSession {
  return {
    id: 'session-1',
    status: 'lobby',
    gamePhase: null,
    players: [],
    teamScores: { red: 100, blue: 100 },
    currentChallengeIndex: 0,
    createdAt: null,
    startedAt: null,
    hostId: null,
    ...overrides,
  };
}

/**
 * Four players, two per team, in join order `ids`. The first two join red,
 * the last two blue; the first player hosts.
 */
export function createFullSession(
  ids: readonly [string, string, string, string] = ['A', 'B', 'C', 'D'],
  overrides: Partial<GameSession> = {}
): GameSession {
  const colors: TeamColor[] = ['red', 'red', 'blue', 'blue'];
  return createSession({
    hostId: ids[0],
    players: ids.map((id, index) =>
      createPlayer({ id, color: colors[index] ?? null, isHost: index === 0 })
    ),
    ...overrides,
  });
}

export function createChallengeDraft(overrides: Partial<ChallengeDraft> = {}): ChallengeDraft {
  return {
    article1: 'Un',
    input1: 'chat',
    preposition: 'Sur',
    article2: 'Une',
    input2: 'table',
    forbiddenWords: ['animal', 'meuble', 'bois'],
    ...overrides,
  };
}

export function createChallenge(overrides: Partial<Challenge> & { id: string }): Challenge {
  return {
    gameSessionId: 'session-1',
    ...createChallengeDraft(),
    prompt: null,
    imageUrl: null,
    answer: null,
    isResolved: false,
    drawerId: null,
    guesserId: null,
    currentPhase: 'waiting_prompt',
    createdAt: null,
    completedAt: null,
    ...overrides,
  };
}
