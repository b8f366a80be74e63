/**
 * @fileoverview Applies guesses and regenerations for challenges to a ScoreLedger.
 *
 * Per challenge the referee remembers which target words were found, whether it
 * resolved and how many regenerations were used. A challenge resolves at most
 * once and a target word scores at most once.
 */

import {
  type Challenge,
  getTargetWords,
  logger,
  MAX_REGENERATIONS,
  type ScoreEvent,
  SessionError,
  type TeamColor,
} from '@inkling/shared';
import type { ScoreLedger } from './ScoreLedger.js';
import { normalizeWord } from './validators.js';

export interface RoundRefereeConfig {
  /** Regenerations allowed per challenge */
  maxRegenerations: number;
}

export const DEFAULT_REFEREE_CONFIG: RoundRefereeConfig = {
  maxRegenerations: MAX_REGENERATIONS,
};

export interface GuessResult {
  /** Target words this guess found for the first time */
  readonly newlyFound: readonly string[];
  /** Nothing new was found */
  readonly wrong: boolean;
  /** The challenge is resolved (by this guess or earlier) */
  readonly resolved: boolean;
  /** This guess resolved the challenge */
  readonly newlyResolved: boolean;
  readonly events: readonly ScoreEvent[];
}

/**
 * What a guess would do, computed without touching progress or scores.
 */
export interface GuessAssessment {
  readonly newlyFound: readonly string[];
  readonly wrong: boolean;
  /** The challenge would be resolved after this guess */
  readonly resolved: boolean;
  /** The challenge was resolved before this guess */
  readonly alreadyResolved: boolean;
}

interface ChallengeProgress {
  readonly found: Set<string>;
  resolved: boolean;
  regenerations: number;
}

export class RoundReferee {
  private readonly config: RoundRefereeConfig;
  private readonly progress = new Map<string, ChallengeProgress>();

  constructor(
    private readonly ledger: ScoreLedger,
    config: Partial<RoundRefereeConfig> = {}
  ) {
    this.config = { ...DEFAULT_REFEREE_CONFIG, ...config };
  }

  // ============ Guesses ============

  /**
   * Evaluate a guess against the challenge's target words. Pure: scoring
   * happens in `submitGuess`.
   */
  assessGuess(challenge: Challenge, answer: string): GuessAssessment {
    const progress = this.progress.get(challenge.id);
    if (progress?.resolved || challenge.isResolved === true) {
      return { newlyFound: [], wrong: false, resolved: true, alreadyResolved: true };
    }

    const found = progress?.found ?? new Set<string>();
    const guessed = new Set(answer.split(/\s+/).map(normalizeWord).filter(Boolean));
    const targets = getTargetWords(challenge).map(normalizeWord);
    const newlyFound = targets.filter((word) => guessed.has(word) && !found.has(word));
    const resolved = targets.every((word) => found.has(word) || newlyFound.includes(word));

    return { newlyFound, wrong: newlyFound.length === 0, resolved, alreadyResolved: false };
  }

  /**
   * Score a guess for `team`. Guesses on a resolved challenge change nothing.
   */
  submitGuess(challenge: Challenge, team: TeamColor, answer: string): GuessResult {
    const assessment = this.assessGuess(challenge, answer);
    const progress = this.getProgress(challenge.id);
    if (assessment.alreadyResolved) {
      progress.resolved = true;
      return { newlyFound: [], wrong: false, resolved: true, newlyResolved: false, events: [] };
    }

    const events: ScoreEvent[] = [];
    for (const word of assessment.newlyFound) {
      progress.found.add(word);
      const event = this.ledger.wordFound(team, word);
      if (event) {
        events.push(event);
      }
    }

    if (assessment.wrong) {
      const event = this.ledger.wrongGuess(team);
      if (event) {
        events.push(event);
      }
    }

    if (assessment.resolved) {
      progress.resolved = true;
      logger.info('Challenge resolved', { challengeId: challenge.id, team });
    }

    return {
      newlyFound: assessment.newlyFound,
      wrong: assessment.wrong,
      resolved: assessment.resolved,
      newlyResolved: assessment.resolved,
      events,
    };
  }

  /**
   * Adopt a resolution decided elsewhere (e.g. by the server) without scoring.
   */
  markResolved(challengeId: string): void {
    this.getProgress(challengeId).resolved = true;
  }

  isResolved(challengeId: string): boolean {
    return this.progress.get(challengeId)?.resolved ?? false;
  }

  getFoundWords(challengeId: string): string[] {
    return [...(this.progress.get(challengeId)?.found ?? [])];
  }

  // ============ Regenerations ============

  /**
   * Count a regeneration for `team` and apply its penalty.
   * Throws an invalid SessionError once the cap is reached.
   */
  registerRegeneration(challengeId: string, team: TeamColor): ScoreEvent | null {
    this.assertCanRegenerate(challengeId);
    this.getProgress(challengeId).regenerations++;
    return this.ledger.imageRegenerated(team);
  }

  /**
   * Throws the `regeneration_limit` error when the cap is reached. Changes nothing.
   */
  assertCanRegenerate(challengeId: string): void {
    if (this.remainingRegenerations(challengeId) <= 0) {
      throw SessionError.invalid(
        'regeneration_limit',
        `Challenge ${challengeId} already used its ${this.config.maxRegenerations} regenerations`
      );
    }
  }

  getRegenerationCount(challengeId: string): number {
    return this.progress.get(challengeId)?.regenerations ?? 0;
  }

  remainingRegenerations(challengeId: string): number {
    return this.config.maxRegenerations - this.getRegenerationCount(challengeId);
  }

  private getProgress(challengeId: string): ChallengeProgress {
    let progress = this.progress.get(challengeId);
    if (!progress) {
      progress = { found: new Set(), resolved: false, regenerations: 0 };
      this.progress.set(challengeId, progress);
    }
    return progress;
  }
}
