/**
 * @fileoverview Polling loop and local phase machine for one game session.
 *
 * Handles:
 * - Periodic fetch of the session and its challenges (no push channel exists)
 * - Reconciliation with locally-composed challenges
 * - Publication of frozen snapshots to subscribers
 * - Phase transitions (lobby → challenge → drawing → guessing → finished)
 *
 * Each phase boundary is one TransitionWatcher reading the latest snapshot.
 * Server-reported phases ahead of the local one are adopted; the local phase
 * never moves backwards.
 */

import { hasSessionChanged } from '@inkling/protocol';
import {
  CHALLENGES_PER_PLAYER,
  type Challenge,
  describeError,
  type GameSession,
  logger,
  ROUND_DURATION_MS,
  SESSION_POLL_INTERVAL_MS,
  type SessionError,
  TRANSITION_POLL_INTERVAL_MS,
  toSessionError,
} from '@inkling/shared';
import type { RemoteSessionApi } from './api/RemoteSessionApi.js';
import type { LocalChallengeStore } from './LocalChallengeStore.js';
import { ResilientMutator } from './ResilientMutator.js';
import { type CancelTimer, type Scheduler, timerScheduler } from './Scheduler.js';
import { merge } from './StateReconciler.js';
import { type TransitionCheck, TransitionWatcher } from './TransitionWatcher.js';
import { TransitionConditions } from './transitionConditions.js';
import {
  LOCAL_PHASE_ORDER,
  type LocalPhase,
  type PhaseTransition,
  type SessionSnapshot,
} from './types.js';

/**
 * Session synchronizer event handlers.
 */
export interface SessionSynchronizerEvents {
  /** Called with every published snapshot */
  onSnapshot?: (snapshot: SessionSnapshot) => void;
  /** Called once per phase boundary crossed */
  onTransition?: (transition: PhaseTransition) => void;
  /** Called when a tick fails; polling continues */
  onError?: (error: SessionError) => void;
}

export interface SessionSynchronizerConfig {
  /** Interval between session fetches */
  sessionIntervalMs: number;
  /** Interval between transition checks */
  transitionIntervalMs: number;
  /** Length of the playing phase, measured from the session start */
  roundDurationMs: number;
  /** Challenges each player submits before drawing starts */
  challengesPerPlayer: number;
}

export const DEFAULT_SYNCHRONIZER_CONFIG: SessionSynchronizerConfig = {
  sessionIntervalMs: SESSION_POLL_INTERVAL_MS,
  transitionIntervalMs: TRANSITION_POLL_INTERVAL_MS,
  roundDurationMs: ROUND_DURATION_MS,
  challengesPerPlayer: CHALLENGES_PER_PLAYER,
};

export interface SessionSynchronizerOptions {
  mutator?: ResilientMutator;
  scheduler?: Scheduler;
  /** Local challenges to reconcile; without one, snapshots carry no challenges */
  challengeStore?: LocalChallengeStore;
}

export type SnapshotListener = (snapshot: SessionSnapshot) => void;

interface PhaseBoundary {
  readonly name: string;
  /** Local phases during which the boundary is armed */
  readonly armedIn: readonly LocalPhase[];
  readonly target: LocalPhase;
  readonly condition: TransitionCheck;
}

function serverPhaseOf(session: GameSession): LocalPhase {
  switch (session.status) {
    case 'lobby':
      return 'lobby';
    case 'challenge':
      return 'challenge';
    case 'playing':
      return session.gamePhase === 'guessing' ? 'guessing' : 'drawing';
    case 'finished':
      return 'finished';
  }
}

function phaseIndex(phase: LocalPhase): number {
  return LOCAL_PHASE_ORDER.indexOf(phase);
}

function freezeSession(session: GameSession): GameSession {
  return Object.freeze({
    ...session,
    players: Object.freeze(session.players.map((p) => Object.freeze({ ...p }))),
    teamScores: Object.freeze({ ...session.teamScores }),
  });
}

export class SessionSynchronizer {
  private readonly config: SessionSynchronizerConfig;
  private readonly mutator: ResilientMutator;
  private readonly scheduler: Scheduler;
  private readonly challengeStore: LocalChallengeStore | undefined;
  private readonly boundaries: readonly PhaseBoundary[];
  private readonly watchers = new Map<string, TransitionWatcher>();
  private readonly listeners = new Set<SnapshotListener>();

  private snapshot: SessionSnapshot | null = null;
  private phase: LocalPhase = 'lobby';
  private cancelPolling: CancelTimer | null = null;
  private ticking = false;
  /** Bumped on stop so results of ticks still in flight are discarded */
  private generation = 0;

  constructor(
    api: RemoteSessionApi,
    readonly sessionId: string,
    private readonly events: SessionSynchronizerEvents = {},
    config: Partial<SessionSynchronizerConfig> = {},
    options: SessionSynchronizerOptions = {}
  ) {
    this.config = { ...DEFAULT_SYNCHRONIZER_CONFIG, ...config };
    this.scheduler = options.scheduler ?? timerScheduler;
    this.mutator = options.mutator ?? new ResilientMutator(api, {}, this.scheduler);
    this.challengeStore = options.challengeStore;
    this.boundaries = this.createBoundaries();
  }

  // ============ Lifecycle ============

  get isRunning(): boolean {
    return this.cancelPolling !== null;
  }

  /**
   * Start polling. The first tick runs immediately.
   */
  start(): void {
    if (this.cancelPolling) {
      logger.warn('Session synchronizer already running', { sessionId: this.sessionId });
      return;
    }

    this.cancelPolling = this.scheduler.every(this.config.sessionIntervalMs, () => {
      this.runTick();
    });
    this.armWatchers();
    logger.info('Session synchronizer started', {
      sessionId: this.sessionId,
      intervalMs: this.config.sessionIntervalMs,
    });
    this.runTick();
  }

  /**
   * Stop polling and all watchers. Results of requests still in flight are
   * discarded when they arrive.
   */
  stop(): void {
    if (!this.cancelPolling) {
      return;
    }
    this.cancelPolling();
    this.cancelPolling = null;
    this.generation++;
    for (const watcher of this.watchers.values()) {
      watcher.stopListening();
    }
    logger.info('Session synchronizer stopped', { sessionId: this.sessionId });
  }

  // ============ Read Access ============

  getSnapshot(): SessionSnapshot | null {
    return this.snapshot;
  }

  getPhase(): LocalPhase {
    return this.phase;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============ Polling ============

  /**
   * One fetch → reconcile → publish → evaluate cycle. Resolves false when the
   * tick was skipped, failed or was discarded by `stop()`.
   */
  async tick(): Promise<boolean> {
    if (this.ticking) {
      logger.debug('Skipping tick, previous one still in flight', { sessionId: this.sessionId });
      return false;
    }

    this.ticking = true;
    const generation = this.generation;
    try {
      const [session, remoteChallenges] = await Promise.all([
        this.mutator.refreshSession(this.sessionId),
        this.mutator.fetchChallenges(this.sessionId),
      ]);
      if (generation !== this.generation) {
        logger.debug('Discarding tick result after stop', { sessionId: this.sessionId });
        return false;
      }

      const snapshot = this.publish(session, remoteChallenges);
      this.adoptServerPhase(snapshot);
      if (this.isRunning) {
        await this.evaluateWatchers();
      }
      return true;
    } catch (error) {
      if (generation === this.generation) {
        const sessionError = toSessionError(error);
        logger.error('Session sync failed', { sessionId: this.sessionId, ...describeError(sessionError) });
        this.events.onError?.(sessionError);
      }
      return false;
    } finally {
      this.ticking = false;
    }
  }

  private runTick(): void {
    this.tick().catch((error: unknown) => {
      logger.error('Unexpected tick failure', { sessionId: this.sessionId, ...describeError(error) });
    });
  }

  private publish(remote: GameSession, remoteChallenges: Challenge[]): SessionSnapshot {
    const previous = this.snapshot;
    const session =
      remote.hostId === null && previous?.session.hostId
        ? { ...remote, hostId: previous.session.hostId }
        : remote;

    const challenges = this.challengeStore
      ? this.challengeStore.reconcile(remoteChallenges)
      : merge([], remoteChallenges);

    const snapshot: SessionSnapshot = Object.freeze({
      session: freezeSession(session),
      challenges: Object.freeze(challenges.map((c) => Object.freeze({ ...c }))),
      fetchedAt: this.scheduler.now(),
      changed: hasSessionChanged(previous?.session ?? null, session),
    });
    this.snapshot = snapshot;

    this.events.onSnapshot?.(snapshot);
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Snapshot listener failed', describeError(error));
      }
    }
    return snapshot;
  }

  // ============ Phases ============

  private createBoundaries(): PhaseBoundary[] {
    const source = () => this.snapshot;
    return [
      {
        name: 'challenge→drawing',
        armedIn: ['challenge'],
        target: 'drawing',
        condition: TransitionConditions.allChallengesSent(source, this.config.challengesPerPlayer),
      },
      {
        name: 'drawing→guessing',
        armedIn: ['drawing'],
        target: 'guessing',
        condition: TransitionConditions.allPlayersDrawn(source),
      },
      {
        name: 'playing→finished',
        armedIn: ['drawing', 'guessing'],
        target: 'finished',
        condition: TransitionConditions.anyOf(
          TransitionConditions.allPlayersGuessed(source),
          TransitionConditions.roundTimeElapsed(source, this.config.roundDurationMs, () =>
            this.scheduler.now()
          )
        ),
      },
    ];
  }

  /**
   * Start watchers armed in the current phase, stop the others.
   */
  private armWatchers(): void {
    for (const boundary of this.boundaries) {
      const existing = this.watchers.get(boundary.name);
      if (!boundary.armedIn.includes(this.phase)) {
        existing?.stopListening();
        continue;
      }
      if (existing?.isListening || existing?.hasFired) {
        continue;
      }
      const watcher = existing ?? new TransitionWatcher(boundary.name, this.scheduler);
      this.watchers.set(boundary.name, watcher);
      watcher.startListening(
        boundary.condition,
        () => this.onBoundaryCrossed(boundary),
        this.config.transitionIntervalMs
      );
    }
  }

  private onBoundaryCrossed(boundary: PhaseBoundary): void {
    const snapshot = this.snapshot;
    if (snapshot) {
      this.advanceTo(boundary.target, snapshot);
    }
  }

  private adoptServerPhase(snapshot: SessionSnapshot): void {
    const serverPhase = serverPhaseOf(snapshot.session);
    if (phaseIndex(serverPhase) > phaseIndex(this.phase)) {
      this.advanceTo(serverPhase, snapshot);
    }
  }

  private advanceTo(target: LocalPhase, snapshot: SessionSnapshot): void {
    const from = this.phase;
    if (phaseIndex(target) <= phaseIndex(from)) {
      return;
    }
    this.phase = target;
    logger.info('Phase transition', { sessionId: this.sessionId, from, to: target });
    if (this.isRunning) {
      this.armWatchers();
    }
    this.events.onTransition?.({ from, to: target, snapshot });
  }

  /**
   * Evaluate active watchers against the latest snapshot, again after each
   * transition so newly armed watchers see the same snapshot.
   */
  private async evaluateWatchers(): Promise<void> {
    for (let round = 0; round < LOCAL_PHASE_ORDER.length; round++) {
      const phaseBefore = this.phase;
      const active = [...this.watchers.values()].filter((w) => w.isListening);
      await Promise.all(active.map((watcher) => watcher.evaluateNow()));
      if (this.phase === phaseBefore) {
        return;
      }
    }
  }
}
