/**
 * @fileoverview Structural comparison of two session snapshots.
 * Only fields that drive the lobby and phase logic are compared.
 */

import type { GameSession, Player } from '@inkling/shared';

export function arePlayersEqual(a: Player, b: Player): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.color === b.color &&
    a.role === b.role &&
    a.isHost === b.isHost &&
    a.challengesSent === b.challengesSent &&
    a.hasDrawn === b.hasDrawn &&
    a.hasGuessed === b.hasGuessed
  );
}

/**
 * Whether anything observable changed between two versions of a session.
 */
export function hasSessionChanged(previous: GameSession | null, next: GameSession): boolean {
  if (!previous) {
    return true;
  }
  if (
    previous.status !== next.status ||
    previous.gamePhase !== next.gamePhase ||
    previous.hostId !== next.hostId ||
    previous.currentChallengeIndex !== next.currentChallengeIndex ||
    previous.teamScores.red !== next.teamScores.red ||
    previous.teamScores.blue !== next.teamScores.blue ||
    previous.players.length !== next.players.length
  ) {
    return true;
  }

  const previousById = new Map(previous.players.map((p) => [p.id, p]));
  return next.players.some((player) => {
    const before = previousById.get(player.id);
    return !before || !arePlayersEqual(before, player);
  });
}

export interface SessionDifference {
  readonly old: unknown;
  readonly new: unknown;
}

/**
 * Field-level differences, for diagnostics.
 */
export function getSessionDifferences(
  previous: GameSession,
  next: GameSession
): Record<string, SessionDifference> {
  const differences: Record<string, SessionDifference> = {};

  if (previous.players.length !== next.players.length) {
    differences['playerCount'] = { old: previous.players.length, new: next.players.length };
  }
  if (previous.status !== next.status) {
    differences['status'] = { old: previous.status, new: next.status };
  }
  if (previous.gamePhase !== next.gamePhase) {
    differences['gamePhase'] = { old: previous.gamePhase, new: next.gamePhase };
  }
  if (
    previous.teamScores.red !== next.teamScores.red ||
    previous.teamScores.blue !== next.teamScores.blue
  ) {
    differences['teamScores'] = { old: previous.teamScores, new: next.teamScores };
  }

  const previousById = new Map(previous.players.map((p) => [p.id, p]));
  for (const player of next.players) {
    const before = previousById.get(player.id);
    if (before && !arePlayersEqual(before, player)) {
      differences[`player:${player.id}`] = { old: before, new: player };
    }
  }

  return differences;
}
