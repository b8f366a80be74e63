/**
 * @fileoverview Wire schemas for the remote session service.
 *
 * The service is inconsistent about field names (camelCase, snake_case and
 * positional `*_word` keys all occur), so every schema accepts the known aliases
 * and the parsers pick the first one present.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Identifiers arrive as strings or numbers; they are always handled as strings.
 */
export const IdSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

/**
 * ISO date string or epoch milliseconds.
 */
export const TimestampSchema = z.union([z.string(), z.number()]);

export const TeamColorSchema = z.enum(['red', 'blue']);

export const PlayerRoleSchema = z.enum(['drawer', 'guesser']);

export const GameStatusSchema = z.enum(['lobby', 'challenge', 'playing', 'finished']);

export const GamePhaseSchema = z.enum(['drawing', 'guessing']);

export const ChallengePhaseSchema = z.enum([
  'waiting_prompt',
  'prompt_created',
  'image_generated',
  'guessing',
  'resolved',
]);

// ============ Players ============

/**
 * Player as sent inside a session payload.
 */
export const RawPlayerSchema = z.object({
  id: IdSchema.nullish(),
  _id: IdSchema.nullish(),
  player_id: IdSchema.nullish(),
  name: z.string().nullish(),
  color: z.string().nullish(),
  role: z.string().nullish(),
  isHost: z.boolean().nullish(),
  challengesSent: z.number().int().nonnegative().nullish(),
  hasDrawn: z.boolean().nullish(),
  hasGuessed: z.boolean().nullish(),
});
export type RawPlayer = z.infer<typeof RawPlayerSchema>;

/**
 * Team member in the `red_team` / `blue_team` format: a full player or a bare id.
 */
export const RawTeamMemberSchema = z.union([RawPlayerSchema, IdSchema]);

// ============ Session ============

export const RawTeamScoresSchema = z.object({
  red: z.number().nullish(),
  blue: z.number().nullish(),
});

/**
 * Entry of the optional `challenges` array used to derive per-player counts.
 */
export const RawChallengeRefSchema = z.object({
  challenger_id: IdSchema.nullish(),
});

export const RawSessionSchema = z.object({
  id: IdSchema.nullish(),
  _id: IdSchema.nullish(),
  gameSessionId: IdSchema.nullish(),
  status: z.string().nullish(),
  players: z.array(RawPlayerSchema).nullish(),
  red_team: z.array(RawTeamMemberSchema).nullish(),
  blue_team: z.array(RawTeamMemberSchema).nullish(),
  teamScores: RawTeamScoresSchema.nullish(),
  currentChallengeIndex: z.number().int().nullish(),
  currentTurn: z.number().int().nullish(),
  current_turn: z.number().int().nullish(),
  gamePhase: z.string().nullish(),
  game_phase: z.string().nullish(),
  createdAt: TimestampSchema.nullish(),
  created_at: TimestampSchema.nullish(),
  startedAt: TimestampSchema.nullish(),
  started_at: TimestampSchema.nullish(),
  hostId: IdSchema.nullish(),
  host_id: IdSchema.nullish(),
  createdBy: IdSchema.nullish(),
  created_by: IdSchema.nullish(),
  challenges: z.array(RawChallengeRefSchema).nullish(),
});
export type RawSession = z.infer<typeof RawSessionSchema>;

/**
 * Response of the status endpoint.
 */
export const RawStatusSchema = z.object({
  status: z.string().nullish(),
});

// ============ Challenges ============

export const RawChallengeSchema = z.object({
  id: IdSchema.nullish(),
  _id: IdSchema.nullish(),
  challengeId: IdSchema.nullish(),
  gameSessionId: IdSchema.nullish(),
  game_session_id: IdSchema.nullish(),
  article1: z.string().nullish(),
  article_1: z.string().nullish(),
  first_word: z.string().nullish(),
  input1: z.string().nullish(),
  input_1: z.string().nullish(),
  second_word: z.string().nullish(),
  preposition: z.string().nullish(),
  third_word: z.string().nullish(),
  article2: z.string().nullish(),
  article_2: z.string().nullish(),
  fourth_word: z.string().nullish(),
  input2: z.string().nullish(),
  input_2: z.string().nullish(),
  fifth_word: z.string().nullish(),
  forbidden_words: z.union([z.array(z.union([z.string(), z.number()])), z.string()]).nullish(),
  forbiddenWords: z.array(z.string()).nullish(),
  prompt: z.string().nullish(),
  imageUrl: z.string().nullish(),
  image_url: z.string().nullish(),
  image_path: z.string().nullish(),
  answer: z.string().nullish(),
  isResolved: z.boolean().nullish(),
  is_resolved: z.boolean().nullish(),
  drawerId: IdSchema.nullish(),
  drawer_id: IdSchema.nullish(),
  guesserId: IdSchema.nullish(),
  guesser_id: IdSchema.nullish(),
  currentPhase: z.string().nullish(),
  current_phase: z.string().nullish(),
  createdAt: TimestampSchema.nullish(),
  completedAt: TimestampSchema.nullish(),
});
export type RawChallenge = z.infer<typeof RawChallengeSchema>;

/**
 * Challenge lists come either bare or wrapped in `{ items: [...] }`.
 */
export const RawChallengeListSchema = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()).nullish() }),
]);

/**
 * Response of the prompt submission endpoint.
 */
export const RawImageResponseSchema = z.object({
  imageUrl: z.string().nullish(),
  image_url: z.string().nullish(),
  image_path: z.string().nullish(),
});

// ============ Outgoing Payloads ============

/**
 * Body of a challenge submission, in the service's positional word format.
 */
export const ChallengeSubmissionSchema = z.object({
  first_word: z.string(),
  second_word: z.string(),
  third_word: z.string(),
  fourth_word: z.string(),
  fifth_word: z.string(),
  forbidden_words: z.array(z.string()),
});
export type ChallengeSubmission = z.infer<typeof ChallengeSubmissionSchema>;

export const JoinRequestSchema = z.object({
  color: TeamColorSchema,
});

export const PromptRequestSchema = z.object({
  prompt: z.string().min(1),
});

export const AnswerRequestSchema = z.object({
  answer: z.string(),
  is_resolved: z.boolean(),
});
