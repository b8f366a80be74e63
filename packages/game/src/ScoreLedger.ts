/**
 * @fileoverview Event-sourced team score engine.
 *
 * Every score change goes through `applyDelta`, which clamps at zero, appends a
 * frozen ScoreEvent and notifies observers. History is append-only; `reset` and
 * remote syncs are recorded as events like any other change.
 */

import {
  describeError,
  INITIAL_TEAM_SCORE,
  logger,
  SCORE_RULES,
  type ScoreEvent,
  TEAM_COLORS,
  type TeamColor,
} from '@inkling/shared';

export type TeamScores = Readonly<Record<TeamColor, number>>;

/**
 * Called after every recorded score change.
 */
export type ScoreObserver = (event: ScoreEvent, scores: TeamScores) => void;

export interface ScoreLedgerConfig {
  /** Score each team starts with */
  initialScore: number;
  /** Clock used for event timestamps */
  now: () => number;
}

export const DEFAULT_LEDGER_CONFIG: ScoreLedgerConfig = {
  initialScore: INITIAL_TEAM_SCORE,
  now: () => Date.now(),
};

export interface ScoreStats {
  scores: TeamScores;
  winner: TeamColor | null;
  eventCounts: Record<TeamColor, number>;
  totalEvents: number;
}

export class ScoreLedger {
  private readonly config: ScoreLedgerConfig;
  private readonly current: Record<TeamColor, number>;
  private readonly events: ScoreEvent[] = [];
  private readonly observers = new Set<ScoreObserver>();

  constructor(config: Partial<ScoreLedgerConfig> = {}) {
    this.config = { ...DEFAULT_LEDGER_CONFIG, ...config };
    this.current = { red: this.config.initialScore, blue: this.config.initialScore };
  }

  // ============ Queries ============

  getScore(team: TeamColor): number {
    return this.current[team];
  }

  get scores(): TeamScores {
    return Object.freeze({ ...this.current });
  }

  get history(): readonly ScoreEvent[] {
    return [...this.events];
  }

  /**
   * Team with the strictly higher score, or null on a tie.
   */
  getWinner(): TeamColor | null {
    if (this.current.red > this.current.blue) {
      return 'red';
    }
    if (this.current.blue > this.current.red) {
      return 'blue';
    }
    return null;
  }

  getStats(): ScoreStats {
    const eventCounts: Record<TeamColor, number> = { red: 0, blue: 0 };
    for (const event of this.events) {
      eventCounts[event.team]++;
    }
    return {
      scores: this.scores,
      winner: this.getWinner(),
      eventCounts,
      totalEvents: this.events.length,
    };
  }

  // ============ Observers ============

  subscribe(observer: ScoreObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // ============ Mutations ============

  /**
   * Add a positive amount. Non-positive amounts are ignored and record nothing.
   */
  addPoints(team: TeamColor, amount: number, reason: string): ScoreEvent | null {
    if (!(amount > 0)) {
      logger.warn('Ignoring non-positive score addition', { team, amount, reason });
      return null;
    }
    return this.applyDelta(team, amount, reason);
  }

  /**
   * Subtract a positive amount. Non-positive amounts are ignored and record nothing.
   */
  subtractPoints(team: TeamColor, amount: number, reason: string): ScoreEvent | null {
    if (!(amount > 0)) {
      logger.warn('Ignoring non-positive score subtraction', { team, amount, reason });
      return null;
    }
    return this.applyDelta(team, -amount, reason);
  }

  /**
   * Hard-set a team's score. A zero delta records nothing.
   */
  setScore(team: TeamColor, value: number, reason: string): ScoreEvent | null {
    const delta = value - this.current[team];
    if (delta === 0) {
      return null;
    }
    return this.applyDelta(team, delta, reason);
  }

  /**
   * The single path every score change takes.
   */
  applyDelta(team: TeamColor, delta: number, reason: string): ScoreEvent {
    const previousScore = this.current[team];
    const newScore = Math.max(0, previousScore + delta);
    this.current[team] = newScore;

    const event: ScoreEvent = Object.freeze({
      team,
      previousScore,
      newScore,
      delta,
      reason,
      timestamp: this.config.now(),
    });
    this.events.push(event);

    logger.debug('Score changed', { team, previousScore, newScore, delta, reason });
    this.notify(event);
    return event;
  }

  // ============ Game Actions ============

  wordFound(team: TeamColor, word: string): ScoreEvent | null {
    return this.addPoints(team, SCORE_RULES.WORD_FOUND, `word found: ${word}`);
  }

  wrongGuess(team: TeamColor): ScoreEvent | null {
    return this.subtractPoints(team, SCORE_RULES.WRONG_GUESS, 'wrong guess');
  }

  imageRegenerated(team: TeamColor): ScoreEvent | null {
    return this.subtractPoints(team, SCORE_RULES.IMAGE_REGENERATED, 'image regenerated');
  }

  /**
   * Align local scores with the authoritative remote ones.
   */
  syncFromRemote(teamScores: TeamScores): ScoreEvent[] {
    const recorded: ScoreEvent[] = [];
    for (const team of TEAM_COLORS) {
      const event = this.setScore(team, teamScores[team], 'remote sync');
      if (event) {
        recorded.push(event);
      }
    }
    return recorded;
  }

  /**
   * Bring both teams back to the initial score, recording the changes.
   */
  reset(): ScoreEvent[] {
    const recorded: ScoreEvent[] = [];
    for (const team of TEAM_COLORS) {
      const event = this.setScore(team, this.config.initialScore, 'reset');
      if (event) {
        recorded.push(event);
      }
    }
    return recorded;
  }

  private notify(event: ScoreEvent): void {
    const scores = this.scores;
    for (const observer of this.observers) {
      try {
        observer(event, scores);
      } catch (error) {
        logger.error('Score observer failed', { team: event.team, ...describeError(error) });
      }
    }
  }
}
