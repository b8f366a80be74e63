/**
 * @fileoverview Retry, conflict recovery and serialization around remote calls.
 *
 * Raw errors are classified once, in `withRetry`, and leave this module as
 * tagged SessionErrors:
 * - transient: retried with backoff, surfaced after the last attempt
 * - conflict: handled by the membership recovery strategies below
 * - fatal: surfaced immediately
 *
 * Membership mutations (join, change team, leave) are serialized: while one is
 * in flight, further requests resolve to 'dropped' without touching the server.
 */

import {
  type Challenge,
  describeError,
  type GameSession,
  logger,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  SessionError,
  type TeamColor,
  toSessionError,
} from '@inkling/shared';
import type { RemoteSessionApi } from './api/RemoteSessionApi.js';
import { type Scheduler, timerScheduler } from './Scheduler.js';

export type BackoffStrategy = 'linear' | 'exponential';

export interface RetryConfig {
  /** Total attempts for a transient failure, first call included */
  maxAttempts: number;
  baseDelayMs: number;
  backoff: BackoffStrategy;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: RETRY_MAX_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  backoff: 'linear',
};

/**
 * - applied: the server state was changed
 * - unchanged: the server already had the requested state
 * - dropped: another mutation was in flight; nothing was sent
 */
export type MutationOutcome = 'applied' | 'unchanged' | 'dropped';

type SettledOutcome = Exclude<MutationOutcome, 'dropped'>;

function isConflict(error: SessionError, reason: 'already_member' | 'not_member'): boolean {
  return error.kind === 'conflict' && error.reason === reason;
}

export class ResilientMutator {
  private readonly config: RetryConfig;
  private inFlight: string | null = null;

  constructor(
    private readonly api: RemoteSessionApi,
    config: Partial<RetryConfig> = {},
    private readonly scheduler: Scheduler = timerScheduler
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  get isMutating(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Delay before attempt `attempt + 1`.
   */
  backoffDelay(attempt: number): number {
    if (this.config.backoff === 'exponential') {
      return this.config.baseDelayMs * 2 ** (attempt - 1);
    }
    return this.config.baseDelayMs * attempt;
  }

  // ============ Retry ============

  /**
   * Run `operation`, retrying transient failures. Always rejects with a
   * SessionError.
   */
  async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, this.config.maxAttempts);
    let lastError: SessionError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const sessionError = toSessionError(error);
        if (sessionError.kind !== 'transient') {
          throw sessionError;
        }
        lastError = sessionError;
        logger.warn('Transient failure', {
          operation: label,
          attempt,
          maxAttempts,
          error: sessionError.message,
        });
        if (attempt < maxAttempts) {
          await this.scheduler.delay(this.backoffDelay(attempt));
        }
      }
    }

    throw new SessionError(
      'transient',
      `${label} failed after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      { attempts: maxAttempts, cause: lastError }
    );
  }

  // ============ Reads ============

  refreshSession(sessionId: string): Promise<GameSession> {
    return this.withRetry('getSession', () => this.api.getSession(sessionId));
  }

  fetchChallenges(sessionId: string): Promise<Challenge[]> {
    return this.withRetry('listChallenges', () => this.api.listChallenges(sessionId));
  }

  // ============ Membership ============

  /**
   * Join `color`, recovering from membership conflicts.
   */
  joinTeam(sessionId: string, playerId: string, color: TeamColor): Promise<MutationOutcome> {
    return this.serialize('joinTeam', () => this.joinWithRecovery(sessionId, playerId, color));
  }

  /**
   * Move to `color` by leaving and joining again.
   */
  changeTeam(sessionId: string, playerId: string, color: TeamColor): Promise<MutationOutcome> {
    return this.serialize('changeTeam', () => this.performTeamChange(sessionId, playerId, color));
  }

  /**
   * Leave the session. Not being a member counts as already left.
   */
  leaveSession(sessionId: string): Promise<MutationOutcome> {
    return this.serialize('leaveSession', async () => {
      try {
        await this.leave(sessionId);
        return 'applied';
      } catch (error) {
        if (error instanceof SessionError && isConflict(error, 'not_member')) {
          logger.info('Leave ignored, player not in session', { sessionId });
          return 'unchanged';
        }
        throw error;
      }
    });
  }

  // ============ Internals ============

  private async serialize(
    label: string,
    operation: () => Promise<SettledOutcome>
  ): Promise<MutationOutcome> {
    if (this.inFlight) {
      logger.warn('Mutation dropped, another is in flight', { requested: label, inFlight: this.inFlight });
      return 'dropped';
    }
    this.inFlight = label;
    try {
      return await operation();
    } finally {
      this.inFlight = null;
    }
  }

  private join(sessionId: string, color: TeamColor): Promise<void> {
    return this.withRetry('joinSession', () => this.api.joinSession(sessionId, color));
  }

  private leave(sessionId: string): Promise<void> {
    return this.withRetry('leaveSession', () => this.api.leaveSession(sessionId));
  }

  /**
   * `allowTeamChange` is false when called from a team change, so recovery
   * cannot recurse.
   */
  private async joinWithRecovery(
    sessionId: string,
    playerId: string,
    color: TeamColor,
    allowTeamChange = true
  ): Promise<SettledOutcome> {
    try {
      await this.join(sessionId, color);
      return 'applied';
    } catch (error) {
      if (!(error instanceof SessionError) || error.kind !== 'conflict') {
        throw error;
      }
      if (error.reason === 'already_member') {
        return this.recoverAlreadyMember(sessionId, playerId, color, error, allowTeamChange);
      }
      return this.recoverNotMember(sessionId, color);
    }
  }

  private async recoverAlreadyMember(
    sessionId: string,
    playerId: string,
    color: TeamColor,
    original: SessionError,
    allowTeamChange: boolean
  ): Promise<SettledOutcome> {
    logger.info('Player already in session, leaving and rejoining', { sessionId, color });
    try {
      await this.leave(sessionId);
      await this.join(sessionId, color);
      return 'applied';
    } catch (rejoinError) {
      logger.warn('Leave-then-rejoin failed, checking session state', {
        sessionId,
        ...describeError(rejoinError),
      });
    }

    const session = await this.refreshSession(sessionId);
    const player = session.players.find((p) => p.id === playerId);
    if (player?.color === color) {
      logger.info('Player already on requested team', { sessionId, color });
      return 'unchanged';
    }
    if (!player || !allowTeamChange) {
      throw original;
    }
    return this.performTeamChange(sessionId, playerId, color);
  }

  private async recoverNotMember(sessionId: string, color: TeamColor): Promise<SettledOutcome> {
    logger.info('Player not in session, refreshing and joining again', { sessionId, color });
    await this.refreshSession(sessionId);
    await this.join(sessionId, color);
    return 'applied';
  }

  private async performTeamChange(
    sessionId: string,
    playerId: string,
    color: TeamColor
  ): Promise<SettledOutcome> {
    try {
      await this.leave(sessionId);
      await this.join(sessionId, color);
      return 'applied';
    } catch (error) {
      if (!(error instanceof SessionError) || error.kind !== 'conflict') {
        throw error;
      }
      if (error.reason === 'not_member') {
        return this.recoverNotMember(sessionId, color);
      }
    }

    logger.info('Still in session after leave, joining directly', { sessionId, color });
    try {
      await this.join(sessionId, color);
      return 'applied';
    } catch (directJoinError) {
      logger.warn('Direct join failed, falling back to join recovery', {
        sessionId,
        ...describeError(directJoinError),
      });
      return this.joinWithRecovery(sessionId, playerId, color, false);
    }
  }
}
