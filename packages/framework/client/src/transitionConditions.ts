/**
 * @fileoverview Ready-made conditions for TransitionWatcher.
 *
 * Snapshot-based conditions read whatever the synchronizer published last and
 * are false until a first snapshot exists.
 */

import { isSessionReady } from '@inkling/game';
import { type GamePhase, type GameStatus, MAX_PLAYERS, type Player } from '@inkling/shared';
import type { RemoteSessionApi } from './api/RemoteSessionApi.js';
import type { TransitionCheck } from './TransitionWatcher.js';
import type { SessionSnapshot } from './types.js';

export type SnapshotSource = () => SessionSnapshot | null;

function everyPlayer(
  source: SnapshotSource,
  predicate: (player: Player) => boolean
): TransitionCheck {
  return () => {
    const players = source()?.session.players ?? [];
    return players.length === MAX_PLAYERS && players.every(predicate);
  };
}

export const TransitionConditions = {
  waitForStatus(source: SnapshotSource, status: GameStatus): TransitionCheck {
    return () => source()?.session.status === status;
  },

  waitForPhase(source: SnapshotSource, phase: GamePhase): TransitionCheck {
    return () => source()?.session.gamePhase === phase;
  },

  /**
   * Two complete teams are present.
   */
  waitForPlayersReady(source: SnapshotSource): TransitionCheck {
    return () => {
      const snapshot = source();
      return snapshot !== null && isSessionReady(snapshot.session);
    };
  },

  /**
   * Asks the server directly instead of reading the last snapshot.
   */
  waitForRemoteStatus(api: RemoteSessionApi, sessionId: string, status: GameStatus): TransitionCheck {
    return async () => (await api.getSessionStatus(sessionId)) === status;
  },

  allChallengesSent(source: SnapshotSource, perPlayer: number): TransitionCheck {
    return everyPlayer(source, (player) => player.challengesSent === perPlayer);
  },

  allPlayersDrawn(source: SnapshotSource): TransitionCheck {
    return everyPlayer(source, (player) => player.hasDrawn);
  },

  allPlayersGuessed(source: SnapshotSource): TransitionCheck {
    return everyPlayer(source, (player) => player.hasGuessed);
  },

  /**
   * Round time measured from the session's start timestamp.
   */
  roundTimeElapsed(source: SnapshotSource, durationMs: number, now: () => number): TransitionCheck {
    return () => {
      const startedAt = source()?.session.startedAt ?? null;
      return startedAt !== null && now() - startedAt >= durationMs;
    };
  },

  anyOf(...checks: TransitionCheck[]): TransitionCheck {
    return async () => {
      for (const check of checks) {
        if (await check()) {
          return true;
        }
      }
      return false;
    };
  },
} as const;
