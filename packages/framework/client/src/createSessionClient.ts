/**
 * @fileoverview Wires one player's session client from configuration.
 */

import { ScoreLedger } from '@inkling/game';
import { setLogLevel } from '@inkling/shared';
import { type FetchFunction, HttpSessionApi } from './api/HttpSessionApi.js';
import { type ClientConfig, loadClientConfig } from './config/clientConfig.js';
import { LocalChallengeStore } from './LocalChallengeStore.js';
import { PlayerActions } from './PlayerActions.js';
import { ResilientMutator } from './ResilientMutator.js';
import { type Scheduler, timerScheduler } from './Scheduler.js';
import { SessionSynchronizer, type SessionSynchronizerEvents } from './SessionSynchronizer.js';

export interface SessionClientOptions {
  /** Defaults to `loadClientConfig()` */
  config?: ClientConfig;
  fetch?: FetchFunction;
  scheduler?: Scheduler;
  events?: SessionSynchronizerEvents;
}

export interface SessionClient {
  readonly config: ClientConfig;
  readonly api: HttpSessionApi;
  readonly mutator: ResilientMutator;
  readonly store: LocalChallengeStore;
  readonly ledger: ScoreLedger;
  readonly synchronizer: SessionSynchronizer;
  readonly actions: PlayerActions;
}

/**
 * Build the client for `playerId` in `sessionId`. All parts share one mutator
 * and one challenge store. Without a configured token the player id is sent
 * as bearer token, which is what the dev server expects.
 */
export function createSessionClient(
  sessionId: string,
  playerId: string,
  options: SessionClientOptions = {}
): SessionClient {
  const config = options.config ?? loadClientConfig();
  setLogLevel(config.logLevel);

  const scheduler = options.scheduler ?? timerScheduler;
  const api = new HttpSessionApi({
    baseUrl: config.api.baseUrl,
    token: config.api.token ?? playerId,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  const mutator = new ResilientMutator(api, config.retry, scheduler);
  const store = new LocalChallengeStore();
  const ledger = new ScoreLedger({ now: () => scheduler.now() });

  const synchronizer = new SessionSynchronizer(
    api,
    sessionId,
    options.events,
    { ...config.polling, ...config.game },
    { mutator, scheduler, challengeStore: store }
  );
  const actions = new PlayerActions(api, sessionId, playerId, {
    mutator,
    store,
    ledger,
    maxRegenerations: config.game.maxRegenerations,
  });

  return { config, api, mutator, store, ledger, synchronizer, actions };
}
