/**
 * @fileoverview Wire protocol of the remote session service.
 *
 * This package turns the service's JSON payloads into domain entities and back:
 * - zod schemas accepting every known field alias
 * - session parsers for the flat and per-team payload shapes
 * - challenge, challenge list, status and image response parsers
 * - structural session comparison
 */

export {
  arePlayersEqual,
  getSessionDifferences,
  hasSessionChanged,
  type SessionDifference,
} from './comparator.js';
export {
  CompositeSessionParser,
  parseChallenge,
  parseChallengeList,
  parseGameSession,
  parseImageReference,
  parsePlayer,
  parseSessionStatus,
  ProtocolError,
  type SessionFormatParser,
  serializeChallenge,
  serializeChallengeDraft,
  serializeGameSession,
  standardFormatParser,
  teamFormatParser,
} from './parsers.js';
export {
  AnswerRequestSchema,
  ChallengePhaseSchema,
  type ChallengeSubmission,
  ChallengeSubmissionSchema,
  GamePhaseSchema,
  GameStatusSchema,
  JoinRequestSchema,
  PlayerRoleSchema,
  PromptRequestSchema,
  type RawChallenge,
  RawChallengeSchema,
  type RawPlayer,
  RawPlayerSchema,
  type RawSession,
  RawSessionSchema,
  TeamColorSchema,
} from './schemas.js';

/**
 * Protocol version.
 */
export const PROTOCOL_VERSION = '1.0.0';
