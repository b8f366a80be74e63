import type {
  Challenge,
  ChallengeDraft,
  GameSession,
  GameStatus,
  TeamColor,
} from '@inkling/shared';

/**
 * Contract of the remote session service.
 *
 * The calling player is identified by the transport (bearer token), so
 * membership calls take no player id. Failures are plain errors whose text is
 * the only classification signal.
 */
export interface RemoteSessionApi {
  createSession(): Promise<GameSession>;
  joinSession(sessionId: string, color: TeamColor): Promise<void>;
  leaveSession(sessionId: string): Promise<void>;
  getSession(sessionId: string): Promise<GameSession>;
  getSessionStatus(sessionId: string): Promise<GameStatus>;
  startSession(sessionId: string): Promise<void>;
  listChallenges(sessionId: string): Promise<Challenge[]>;
  submitChallenge(sessionId: string, draft: ChallengeDraft): Promise<Challenge>;
  /** Resolves with the generated image reference */
  submitPromptAndGenerateImage(sessionId: string, challengeId: string, prompt: string): Promise<string>;
  submitAnswer(
    sessionId: string,
    challengeId: string,
    answer: string,
    resolved: boolean
  ): Promise<void>;
}
