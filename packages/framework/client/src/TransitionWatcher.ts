/**
 * @fileoverview Single-fire condition poller.
 *
 * A watcher evaluates its condition on an interval and invokes its callback the
 * first time the condition holds, then stops for good. One instance per phase
 * boundary; instances share no state.
 */

import { describeError, logger, TRANSITION_POLL_INTERVAL_MS } from '@inkling/shared';
import { type CancelTimer, type Scheduler, timerScheduler } from './Scheduler.js';

export type TransitionCheck = () => boolean | Promise<boolean>;

export class TransitionWatcher {
  private cancelTimer: CancelTimer | null = null;
  private check: TransitionCheck | null = null;
  private onTransition: (() => void) | null = null;
  private fired = false;
  private checking = false;
  /** Bumped on every start/stop so results of stale checks are discarded */
  private generation = 0;

  constructor(
    readonly name: string = 'transition',
    private readonly scheduler: Scheduler = timerScheduler
  ) {}

  get hasFired(): boolean {
    return this.fired;
  }

  get isListening(): boolean {
    return this.cancelTimer !== null;
  }

  startListening(
    checkCondition: TransitionCheck,
    onTransition: () => void,
    pollingIntervalMs: number = TRANSITION_POLL_INTERVAL_MS
  ): void {
    if (this.fired) {
      logger.warn('Transition watcher already fired', { watcher: this.name });
      return;
    }
    if (this.cancelTimer) {
      logger.warn('Transition watcher already listening', { watcher: this.name });
      return;
    }

    this.check = checkCondition;
    this.onTransition = onTransition;
    this.generation++;
    this.cancelTimer = this.scheduler.every(pollingIntervalMs, () => {
      this.evaluateNow().catch((error: unknown) => {
        logger.error('Transition evaluation failed', { watcher: this.name, ...describeError(error) });
      });
    });
    logger.debug('Transition watcher started', { watcher: this.name, pollingIntervalMs });
  }

  /**
   * Cancel polling. Idempotent; a check already running cannot fire afterwards.
   */
  stopListening(): void {
    if (!this.cancelTimer) {
      return;
    }
    this.cancelTimer();
    this.cancelTimer = null;
    this.check = null;
    this.onTransition = null;
    this.generation++;
    logger.debug('Transition watcher stopped', { watcher: this.name });
  }

  /**
   * Run one check now. Resolves true if this call fired the transition.
   * Skipped while another check is running.
   */
  async evaluateNow(): Promise<boolean> {
    const check = this.check;
    if (!check || this.fired || this.checking) {
      return false;
    }

    const generation = this.generation;
    this.checking = true;
    let satisfied = false;
    try {
      satisfied = await check();
    } catch (error) {
      logger.warn('Transition check failed, retrying on next tick', {
        watcher: this.name,
        ...describeError(error),
      });
    } finally {
      this.checking = false;
    }

    if (!satisfied || generation !== this.generation || this.fired) {
      return false;
    }

    const callback = this.onTransition;
    this.fired = true;
    this.stopListening();
    logger.info('Transition fired', { watcher: this.name });

    try {
      callback?.();
    } catch (error) {
      logger.error('Transition callback failed', { watcher: this.name, ...describeError(error) });
    }
    return true;
  }
}
