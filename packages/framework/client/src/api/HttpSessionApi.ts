/**
 * @fileoverview RemoteSessionApi over HTTP.
 *
 * Non-2xx responses become RemoteRequestError, whose message carries the status
 * and the response body so that error classification can read it. Rejections
 * from `fetch` itself pass through untouched; their `cause` carries the socket
 * error that classification reads. A 2xx body that is not JSON raises a
 * ProtocolError naming the endpoint.
 */

import {
  parseChallenge,
  parseChallengeList,
  parseGameSession,
  parseImageReference,
  parseSessionStatus,
  ProtocolError,
  serializeChallengeDraft,
} from '@inkling/protocol';
import {
  type Challenge,
  type ChallengeDraft,
  errorMessage,
  type GameSession,
  type GameStatus,
  logger,
  RemoteRequestError,
  type TeamColor,
} from '@inkling/shared';
import type { RemoteSessionApi } from './RemoteSessionApi.js';

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpSessionApiConfig {
  /** Service root, e.g. "http://localhost:3000" */
  baseUrl: string;
  /** Bearer token identifying the player */
  token?: string | undefined;
  fetch?: FetchFunction;
}

type HttpMethod = 'GET' | 'POST';

export class HttpSessionApi implements RemoteSessionApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFunction;
  private token: string | undefined;

  constructor(config: HttpSessionApiConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.token = config.token;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  // ============ Sessions ============

  async createSession(): Promise<GameSession> {
    return parseGameSession(await this.request('POST', '/game_sessions', {}));
  }

  async joinSession(sessionId: string, color: TeamColor): Promise<void> {
    await this.request('POST', `${this.sessionPath(sessionId)}/join`, { color });
  }

  async leaveSession(sessionId: string): Promise<void> {
    await this.request('GET', `${this.sessionPath(sessionId)}/leave`);
  }

  async getSession(sessionId: string): Promise<GameSession> {
    return parseGameSession(await this.request('GET', this.sessionPath(sessionId)));
  }

  async getSessionStatus(sessionId: string): Promise<GameStatus> {
    return parseSessionStatus(await this.request('GET', `${this.sessionPath(sessionId)}/status`));
  }

  async startSession(sessionId: string): Promise<void> {
    await this.request('POST', `${this.sessionPath(sessionId)}/start`, {});
  }

  // ============ Challenges ============

  async listChallenges(sessionId: string): Promise<Challenge[]> {
    return parseChallengeList(await this.request('GET', `${this.sessionPath(sessionId)}/challenges`));
  }

  async submitChallenge(sessionId: string, draft: ChallengeDraft): Promise<Challenge> {
    const body = serializeChallengeDraft(draft);
    return parseChallenge(
      await this.request('POST', `${this.sessionPath(sessionId)}/challenges`, body)
    );
  }

  async submitPromptAndGenerateImage(
    sessionId: string,
    challengeId: string,
    prompt: string
  ): Promise<string> {
    const path = `${this.challengePath(sessionId, challengeId)}/draw`;
    return parseImageReference(await this.request('POST', path, { prompt }));
  }

  async submitAnswer(
    sessionId: string,
    challengeId: string,
    answer: string,
    resolved: boolean
  ): Promise<void> {
    const path = `${this.challengePath(sessionId, challengeId)}/answer`;
    await this.request('POST', path, { answer, is_resolved: resolved });
  }

  // ============ Transport ============

  private sessionPath(sessionId: string): string {
    return `/game_sessions/${encodeURIComponent(sessionId)}`;
  }

  private challengePath(sessionId: string, challengeId: string): string {
    return `${this.sessionPath(sessionId)}/challenges/${encodeURIComponent(challengeId)}`;
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    logger.debug('Remote request', { method, path });
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const text = await response.text();

    if (!response.ok) {
      throw new RemoteRequestError(response.status, text, `${method} ${path}`);
    }
    if (text.length === 0) {
      return {};
    }
    return this.parseBody(text, `${method} ${path}`);
  }

  private parseBody(text: string, endpoint: string): unknown {
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new ProtocolError(`non-JSON response from ${endpoint}: ${errorMessage(error)}`);
    }
  }
}
