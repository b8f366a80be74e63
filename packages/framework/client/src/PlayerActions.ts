/**
 * @fileoverview Player-initiated operations for one session.
 *
 * Local rules run before any remote call: validation failures never reach the
 * server. Membership calls go through the ResilientMutator; challenge, prompt
 * and answer submissions are not idempotent and are sent exactly once.
 */

import {
  allPlayersHaveRoles,
  assignInitialRoles,
  type GuessResult,
  isSessionReady,
  RoundReferee,
  ScoreLedger,
  validateChallengeDraft,
  validatePrompt,
} from '@inkling/game';
import {
  type Challenge,
  type ChallengeDraft,
  describeError,
  type GameSession,
  logger,
  MAX_REGENERATIONS,
  SessionError,
  type TeamColor,
  toSessionError,
} from '@inkling/shared';
import type { RemoteSessionApi } from './api/RemoteSessionApi.js';
import { LocalChallengeStore } from './LocalChallengeStore.js';
import { type MutationOutcome, ResilientMutator } from './ResilientMutator.js';

export interface PlayerActionsOptions {
  mutator?: ResilientMutator;
  /** Shared with the synchronizer so optimistic edits survive reconciliation */
  store?: LocalChallengeStore;
  ledger?: ScoreLedger;
  maxRegenerations?: number;
}

export class PlayerActions {
  readonly mutator: ResilientMutator;
  readonly store: LocalChallengeStore;
  readonly ledger: ScoreLedger;
  readonly referee: RoundReferee;
  private readonly regenerating = new Set<string>();

  constructor(
    private readonly api: RemoteSessionApi,
    readonly sessionId: string,
    readonly playerId: string,
    options: PlayerActionsOptions = {}
  ) {
    this.mutator = options.mutator ?? new ResilientMutator(api);
    this.store = options.store ?? new LocalChallengeStore();
    this.ledger = options.ledger ?? new ScoreLedger();
    this.referee = new RoundReferee(this.ledger, {
      maxRegenerations: options.maxRegenerations ?? MAX_REGENERATIONS,
    });
  }

  // ============ Membership ============

  joinTeam(color: TeamColor): Promise<MutationOutcome> {
    return this.mutator.joinTeam(this.sessionId, this.playerId, color);
  }

  changeTeam(color: TeamColor): Promise<MutationOutcome> {
    return this.mutator.changeTeam(this.sessionId, this.playerId, color);
  }

  leave(): Promise<MutationOutcome> {
    return this.mutator.leaveSession(this.sessionId);
  }

  // ============ Lobby ============

  /**
   * Start the session as its host. Resolves with the started session; roles
   * are assigned locally when the server returned none.
   */
  async startGame(): Promise<GameSession> {
    const session = await this.mutator.refreshSession(this.sessionId);
    const me = session.players.find((p) => p.id === this.playerId);
    if (session.hostId !== this.playerId && !me?.isHost) {
      throw SessionError.invalid('not_host', 'Only the host can start the game');
    }
    if (!isSessionReady(session)) {
      throw SessionError.invalid('teams_incomplete', 'Both teams need two players to start');
    }

    await this.mutator.withRetry('startSession', () => this.api.startSession(this.sessionId));
    const started = await this.mutator.refreshSession(this.sessionId);
    logger.info('Game started', { sessionId: this.sessionId, status: started.status });

    if (allPlayersHaveRoles(started)) {
      return started;
    }
    return assignInitialRoles(started);
  }

  // ============ Challenges ============

  /**
   * Validate and submit a challenge definition. The created challenge joins the
   * local list.
   */
  async submitChallenge(draft: ChallengeDraft): Promise<Challenge> {
    const normalized = validateChallengeDraft(draft);
    const created = await this.sendOnce('submitChallenge', () =>
      this.api.submitChallenge(this.sessionId, normalized)
    );
    this.store.track([created]);
    logger.info('Challenge submitted', { sessionId: this.sessionId, challengeId: created.id });
    return created;
  }

  /**
   * Fetch the session's challenges and track the ones not yet known locally.
   */
  async refreshChallenges(): Promise<readonly Challenge[]> {
    const remote = await this.mutator.fetchChallenges(this.sessionId);
    this.store.track(remote);
    return this.store.reconcile(remote);
  }

  // ============ Drawing ============

  /**
   * Submit the drawer's prompt. The prompt is written locally first and rolled
   * back when the remote call fails.
   */
  async submitPrompt(challengeId: string, prompt: string): Promise<Challenge> {
    const challenge = this.requireChallenge(challengeId);
    const trimmed = validatePrompt(prompt, challenge);

    const checkpoint = this.store.checkpoint();
    this.store.update(challengeId, { prompt: trimmed, currentPhase: 'prompt_created' });

    let imageUrl: string;
    try {
      imageUrl = await this.sendOnce('submitPrompt', () =>
        this.api.submitPromptAndGenerateImage(this.sessionId, challengeId, trimmed)
      );
    } catch (error) {
      this.store.rollback(checkpoint);
      logger.warn('Prompt rejected, local state rolled back', { challengeId, ...describeError(error) });
      throw error;
    }

    const patch = { prompt: trimmed, imageUrl, currentPhase: 'image_generated' } as const;
    return this.store.update(challengeId, patch) ?? { ...challenge, ...patch };
  }

  /**
   * Regenerate the image from the current prompt. The penalty and the
   * regeneration count apply once the server returned a new image.
   */
  async regenerateImage(challengeId: string, team: TeamColor): Promise<Challenge> {
    const challenge = this.requireChallenge(challengeId);
    if (challenge.prompt === null) {
      throw SessionError.invalid('prompt_missing', 'No prompt to regenerate from');
    }
    if (this.regenerating.has(challengeId)) {
      throw SessionError.invalid('regeneration_pending', `Challenge ${challengeId} is already regenerating`);
    }
    this.referee.assertCanRegenerate(challengeId);

    this.regenerating.add(challengeId);
    try {
      const updated = await this.submitPrompt(challengeId, challenge.prompt);
      this.referee.registerRegeneration(challengeId, team);
      return updated;
    } finally {
      this.regenerating.delete(challengeId);
    }
  }

  // ============ Guessing ============

  /**
   * Report a guess with the resolved flag it would produce, then score it.
   * Nothing is scored when the server rejects the answer. Guesses on an
   * already-resolved challenge are not sent.
   */
  async submitAnswer(challengeId: string, team: TeamColor, answer: string): Promise<GuessResult> {
    const challenge = this.requireChallenge(challengeId);
    const trimmed = answer.trim();
    if (trimmed.length === 0) {
      throw SessionError.invalid('answer_empty', 'Answer must not be empty');
    }

    const assessment = this.referee.assessGuess(challenge, trimmed);
    if (assessment.alreadyResolved) {
      logger.debug('Answer ignored, challenge already resolved', { challengeId });
      return this.referee.submitGuess(challenge, team, trimmed);
    }

    await this.sendOnce('submitAnswer', () =>
      this.api.submitAnswer(this.sessionId, challengeId, trimmed, assessment.resolved)
    );
    this.store.update(challengeId, { answer: trimmed });
    return this.referee.submitGuess(challenge, team, trimmed);
  }

  // ============ Internals ============

  private requireChallenge(challengeId: string): Challenge {
    const challenge = this.store.get(challengeId);
    if (!challenge) {
      throw SessionError.invalid('unknown_challenge', `Unknown challenge ${challengeId}`);
    }
    return challenge;
  }

  /**
   * Single attempt at a non-idempotent write; failures leave as SessionErrors.
   */
  private async sendOnce<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const sessionError = toSessionError(error);
      logger.error('Remote write failed', { operation: label, kind: sessionError.kind, error: sessionError.message });
      throw sessionError;
    }
  }
}
