/**
 * @fileoverview Session client runtime.
 *
 * This package drives one player's view of a remote game session. It handles:
 * - Polling and reconciliation of session and challenge state
 * - Local phase transitions (lobby → challenge → drawing → guessing → finished)
 * - Retry and membership conflict recovery for remote calls
 * - Player operations (teams, challenges, prompts, answers)
 */

// Remote service
export { type FetchFunction, HttpSessionApi, type HttpSessionApiConfig } from './api/HttpSessionApi.js';
export type { RemoteSessionApi } from './api/RemoteSessionApi.js';
// Configuration
export {
  type ClientConfig,
  ConfigError,
  clearConfigCache,
  loadClientConfig,
  parseClientConfig,
} from './config/clientConfig.js';
export {
  createSessionClient,
  type SessionClient,
  type SessionClientOptions,
} from './createSessionClient.js';
// State
export { type ChallengePatch, LocalChallengeStore } from './LocalChallengeStore.js';
export { PlayerActions, type PlayerActionsOptions } from './PlayerActions.js';
export {
  type BackoffStrategy,
  DEFAULT_RETRY_CONFIG,
  type MutationOutcome,
  ResilientMutator,
  type RetryConfig,
} from './ResilientMutator.js';
export { type CancelTimer, type Scheduler, timerScheduler } from './Scheduler.js';
export {
  DEFAULT_SYNCHRONIZER_CONFIG,
  SessionSynchronizer,
  type SessionSynchronizerConfig,
  type SessionSynchronizerEvents,
  type SessionSynchronizerOptions,
  type SnapshotListener,
} from './SessionSynchronizer.js';
export {
  type ChallengeSnapshot,
  createSnapshot,
  merge,
  restoreFromSnapshot,
} from './StateReconciler.js';
export { type TransitionCheck, TransitionWatcher } from './TransitionWatcher.js';
export { type SnapshotSource, TransitionConditions } from './transitionConditions.js';
export {
  LOCAL_PHASE_ORDER,
  type LocalPhase,
  type PhaseTransition,
  type SessionSnapshot,
} from './types.js';
