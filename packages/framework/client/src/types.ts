import type { Challenge, GameSession } from '@inkling/shared';

/**
 * Immutable view published after every successful synchronization tick.
 */
export interface SessionSnapshot {
  readonly session: GameSession;
  /** Local challenges merged with the remote copy */
  readonly challenges: readonly Challenge[];
  /** Epoch milliseconds */
  readonly fetchedAt: number;
  /** Whether the session differs from the previous snapshot */
  readonly changed: boolean;
}

/**
 * Client-side lifecycle. `drawing` and `guessing` are the sub-phases of the
 * server's `playing` status.
 */
export type LocalPhase = 'lobby' | 'challenge' | 'drawing' | 'guessing' | 'finished';

export const LOCAL_PHASE_ORDER: readonly LocalPhase[] = [
  'lobby',
  'challenge',
  'drawing',
  'guessing',
  'finished',
];

export interface PhaseTransition {
  readonly from: LocalPhase;
  readonly to: LocalPhase;
  readonly snapshot: SessionSnapshot;
}
