/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports domain types, game constants, the error taxonomy and the logger.
 */

// Constants
export {
  ARTICLES,
  CHALLENGES_PER_PLAYER,
  FORBIDDEN_WORDS_PER_CHALLENGE,
  INITIAL_TEAM_SCORE,
  MAX_PLAYERS,
  MAX_REGENERATIONS,
  PLAYERS_PER_TEAM,
  PREPOSITIONS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  ROUND_DURATION_MS,
  SCORE_RULES,
  SESSION_POLL_INTERVAL_MS,
  TEAM_COLORS,
  TRANSITION_POLL_INTERVAL_MS,
} from './constants.js';
// Errors
export {
  type ConflictReason,
  classifyRemoteError,
  type ErrorClassification,
  errorMessage,
  RemoteRequestError,
  SessionError,
  type SessionErrorKind,
  type SessionErrorOptions,
  toSessionError,
} from './errors.js';
// Types
export {
  type Challenge,
  type ChallengeDraft,
  type ChallengePhase,
  type GamePhase,
  type GameSession,
  type GameStatus,
  getAllForbiddenWords,
  getFullPhrase,
  getTargetWords,
  getTeamPlayers,
  type Player,
  type PlayerRole,
  type ScoreEvent,
  type TeamColor,
} from './types/index.js';
// Logging
export {
  describeError,
  formatLog,
  getLogLevel,
  type LogLevel,
  type LogThreshold,
  logger,
  setLogLevel,
} from './utils/logger.js';
