/**
 * @fileoverview Clock and timer abstraction for every polling component.
 */

export type CancelTimer = () => void;

export interface Scheduler {
  /** Run `task` every `intervalMs` until cancelled */
  every(intervalMs: number, task: () => void): CancelTimer;
  /** Resolve after `ms` milliseconds */
  delay(ms: number): Promise<void>;
  /** Current time in epoch milliseconds */
  now(): number;
}

/**
 * Scheduler backed by the global timer functions.
 */
export const timerScheduler: Scheduler = {
  every(intervalMs, task) {
    const handle = setInterval(task, intervalMs);
    return () => clearInterval(handle);
  },
  delay(ms) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  },
  now() {
    return Date.now();
  },
};
