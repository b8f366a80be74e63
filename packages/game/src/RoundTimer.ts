import { logger, ROUND_DURATION_MS } from '@inkling/shared';

export type RoundTimerState = 'idle' | 'running' | 'paused' | 'finished';

export interface RoundTimerConfig {
  /** Length of the round in milliseconds */
  durationMs: number;
  /** Interval between ticks in milliseconds */
  tickIntervalMs: number;
  /** Called after each tick with the remaining whole seconds */
  onTick?: (remainingSeconds: number) => void;
  /** Called once when the countdown reaches zero or is forced to finish */
  onTimeout?: () => void;
}

/**
 * Format seconds as MM:SS. Negative values show as 00:00.
 */
export function formatTime(totalSeconds: number): string {
  const clamped = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(clamped / 60);
  const seconds = clamped % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Countdown for the playing phase.
 *
 * Lifecycle: idle → running ⇄ paused → finished. `stop()` returns to idle with
 * the full duration restored.
 */
export class RoundTimer {
  private readonly config: RoundTimerConfig;
  private readonly totalSeconds: number;
  private remaining: number;
  private timerState: RoundTimerState = 'idle';
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(config: Partial<RoundTimerConfig> = {}) {
    this.config = {
      durationMs: config.durationMs ?? ROUND_DURATION_MS,
      tickIntervalMs: config.tickIntervalMs ?? 1000,
      onTick: config.onTick,
      onTimeout: config.onTimeout,
    };
    this.totalSeconds = Math.ceil(this.config.durationMs / 1000);
    this.remaining = this.totalSeconds;
  }

  get state(): RoundTimerState {
    return this.timerState;
  }

  get remainingSeconds(): number {
    return this.remaining;
  }

  get elapsedSeconds(): number {
    return this.totalSeconds - this.remaining;
  }

  /**
   * Fraction of the round elapsed, 0 to 1.
   */
  get progress(): number {
    return this.totalSeconds === 0 ? 1 : this.elapsedSeconds / this.totalSeconds;
  }

  get formattedRemaining(): string {
    return formatTime(this.remaining);
  }

  start(): void {
    if (this.timerState !== 'idle') {
      logger.warn('Round timer cannot start', { state: this.timerState });
      return;
    }
    this.run();
    logger.info('Round timer started', { remainingSeconds: this.remaining });
  }

  pause(): void {
    if (this.timerState !== 'running') {
      logger.warn('Round timer is not running', { state: this.timerState });
      return;
    }
    this.cancelInterval();
    this.timerState = 'paused';
  }

  resume(): void {
    if (this.timerState !== 'paused') {
      logger.warn('Round timer is not paused', { state: this.timerState });
      return;
    }
    this.run();
  }

  /**
   * Cancel and reset to the full duration.
   */
  stop(): void {
    this.cancelInterval();
    this.timerState = 'idle';
    this.remaining = this.totalSeconds;
  }

  /**
   * End the round now. Fires `onTimeout` unless already finished.
   */
  forceFinish(): void {
    if (this.timerState === 'finished') {
      return;
    }
    this.finish();
  }

  private run(): void {
    this.timerState = 'running';
    this.interval = setInterval(() => this.tick(), this.config.tickIntervalMs);
  }

  private tick(): void {
    this.remaining = Math.max(0, this.remaining - 1);
    this.config.onTick?.(this.remaining);
    if (this.remaining === 0) {
      this.finish();
    }
  }

  private finish(): void {
    this.cancelInterval();
    this.timerState = 'finished';
    logger.info('Round timer finished', { elapsedSeconds: this.elapsedSeconds });
    this.config.onTimeout?.();
  }

  private cancelInterval(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }
}
