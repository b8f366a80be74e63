/**
 * @fileoverview Conversion between wire payloads and domain entities.
 *
 * Session payloads come in two shapes: a flat `players` list, or separate
 * `red_team` / `blue_team` lists. Each shape has its own parser; the composite
 * parser picks the first that accepts a payload and falls back to the flat one.
 */

import {
  type Challenge,
  type ChallengeDraft,
  type ChallengePhase,
  type GamePhase,
  type GameSession,
  type GameStatus,
  INITIAL_TEAM_SCORE,
  logger,
  type Player,
  type PlayerRole,
  type TeamColor,
} from '@inkling/shared';
import { z } from 'zod';
import {
  ChallengePhaseSchema,
  type ChallengeSubmission,
  GamePhaseSchema,
  GameStatusSchema,
  PlayerRoleSchema,
  RawChallengeListSchema,
  RawChallengeSchema,
  RawImageResponseSchema,
  type RawPlayer,
  type RawSession,
  RawSessionSchema,
  RawStatusSchema,
  RawTeamMemberSchema,
  TeamColorSchema,
} from './schemas.js';

/**
 * Error thrown when a payload cannot be turned into a domain entity.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(`Invalid payload: ${message}`);
    this.name = 'ProtocolError';
  }
}

// ============ Helpers ============

/**
 * First value that is neither null nor undefined.
 */
function firstOf<T>(...values: (T | null | undefined)[]): T | undefined {
  for (const value of values) {
    if (value !== null && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function parseTimestamp(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return value;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function parseEnum<T extends string>(
  schema: z.ZodType<T>,
  value: string | null | undefined
): T | null {
  if (value === null || value === undefined) {
    return null;
  }
  const result = schema.safeParse(value.toLowerCase());
  return result.success ? result.data : null;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, what: string): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ProtocolError(what, result.error.issues);
  }
  return result.data;
}

// ============ Players ============

export function parsePlayer(raw: RawPlayer, colorOverride?: TeamColor): Player {
  return {
    id: firstOf(raw.id, raw.player_id, raw._id) ?? '',
    name: raw.name ?? '',
    color: colorOverride ?? parseEnum<TeamColor>(TeamColorSchema, raw.color),
    role: parseEnum<PlayerRole>(PlayerRoleSchema, raw.role),
    isHost: raw.isHost ?? false,
    challengesSent: raw.challengesSent ?? 0,
    hasDrawn: raw.hasDrawn ?? false,
    hasGuessed: raw.hasGuessed ?? false,
  };
}

// ============ Sessions ============

/**
 * Statuses the service used before `playing` had sub-phases.
 */
const LEGACY_PLAYING_STATUSES: Record<string, GamePhase> = {
  drawing: 'drawing',
  guessing: 'guessing',
};

function parseStatusAndPhase(raw: RawSession): { status: GameStatus; gamePhase: GamePhase | null } {
  const rawStatus = (raw.status ?? 'lobby').toLowerCase();
  const legacyPhase = LEGACY_PLAYING_STATUSES[rawStatus];
  const explicitPhase = parseEnum<GamePhase>(GamePhaseSchema, firstOf(raw.gamePhase, raw.game_phase));

  if (legacyPhase) {
    return { status: 'playing', gamePhase: explicitPhase ?? legacyPhase };
  }

  const status = parseEnum<GameStatus>(GameStatusSchema, rawStatus);
  if (!status) {
    logger.warn('Unknown session status, treating as lobby', { status: raw.status });
  }
  return { status: status ?? 'lobby', gamePhase: explicitPhase };
}

/**
 * Per-player challenge counts from an embedded `challenges` array, if present.
 */
function countChallengesByPlayer(raw: RawSession): Map<string, number> | null {
  if (!raw.challenges) {
    return null;
  }
  const counts = new Map<string, number>();
  for (const challenge of raw.challenges) {
    const challengerId = challenge.challenger_id;
    if (challengerId) {
      counts.set(challengerId, (counts.get(challengerId) ?? 0) + 1);
    }
  }
  return counts;
}

function buildSession(raw: RawSession, players: Player[]): GameSession {
  const counts = countChallengesByPlayer(raw);
  const hostId = firstOf(raw.host_id, raw.hostId, raw.created_by, raw.createdBy) ?? null;
  const { status, gamePhase } = parseStatusAndPhase(raw);

  return {
    id: firstOf(raw.id, raw._id, raw.gameSessionId) ?? '',
    status,
    gamePhase,
    players: players.map((player) => ({
      ...player,
      challengesSent: counts ? (counts.get(player.id) ?? 0) : player.challengesSent,
      isHost: hostId !== null ? player.id === hostId : player.isHost,
    })),
    teamScores: {
      red: raw.teamScores?.red ?? INITIAL_TEAM_SCORE,
      blue: raw.teamScores?.blue ?? INITIAL_TEAM_SCORE,
    },
    currentChallengeIndex: firstOf(raw.currentChallengeIndex, raw.currentTurn, raw.current_turn) ?? 0,
    createdAt: parseTimestamp(firstOf(raw.createdAt, raw.created_at)),
    startedAt: parseTimestamp(firstOf(raw.startedAt, raw.started_at)),
    hostId,
  };
}

/**
 * A strategy that understands one session payload shape.
 */
export interface SessionFormatParser {
  readonly name: string;
  canParse(raw: RawSession): boolean;
  parse(raw: RawSession): GameSession;
}

/**
 * Payloads with a flat `players` list.
 */
export const standardFormatParser: SessionFormatParser = {
  name: 'standard',
  canParse: (raw) => Array.isArray(raw.players),
  parse: (raw) => buildSession(raw, (raw.players ?? []).map((p) => parsePlayer(p))),
};

function parseTeamMember(member: z.infer<typeof RawTeamMemberSchema>, color: TeamColor): Player {
  if (typeof member === 'string') {
    return parsePlayer({ id: member }, color);
  }
  return parsePlayer(member, color);
}

/**
 * Payloads with `red_team` / `blue_team` lists. Team order is red then blue.
 */
export const teamFormatParser: SessionFormatParser = {
  name: 'team',
  canParse: (raw) => !Array.isArray(raw.players) && (Boolean(raw.red_team) || Boolean(raw.blue_team)),
  parse: (raw) =>
    buildSession(raw, [
      ...(raw.red_team ?? []).map((m) => parseTeamMember(m, 'red')),
      ...(raw.blue_team ?? []).map((m) => parseTeamMember(m, 'blue')),
    ]),
};

export class CompositeSessionParser {
  private readonly parsers: SessionFormatParser[];

  constructor(parsers: SessionFormatParser[] = [standardFormatParser, teamFormatParser]) {
    this.parsers = [...parsers];
  }

  /**
   * Register an additional payload shape. Later parsers are tried last.
   */
  addParser(parser: SessionFormatParser): void {
    this.parsers.push(parser);
  }

  parse(json: unknown): GameSession {
    const raw = validate(RawSessionSchema, json, 'game session');
    const parser = this.parsers.find((p) => p.canParse(raw));
    if (!parser) {
      logger.warn('No session parser matched, using standard format');
      return standardFormatParser.parse(raw);
    }
    return parser.parse(raw);
  }
}

const defaultSessionParser = new CompositeSessionParser();

export function parseGameSession(json: unknown): GameSession {
  return defaultSessionParser.parse(json);
}

export function parseSessionStatus(json: unknown): GameStatus {
  const raw = validate(RawStatusSchema, json, 'session status');
  return parseStatusAndPhase({ status: raw.status }).status;
}

/**
 * Wire representation of a session in the standard format.
 */
export function serializeGameSession(session: GameSession): Record<string, unknown> {
  return {
    id: session.id,
    status: session.status,
    gamePhase: session.gamePhase,
    players: session.players.map((p) => ({ ...p })),
    teamScores: { ...session.teamScores },
    currentChallengeIndex: session.currentChallengeIndex,
    createdAt: session.createdAt === null ? null : new Date(session.createdAt).toISOString(),
    startedAt: session.startedAt === null ? null : new Date(session.startedAt).toISOString(),
    hostId: session.hostId,
  };
}

// ============ Challenges ============

/**
 * `forbidden_words` is sometimes a JSON-encoded array, sometimes a plain word.
 */
function parseForbiddenWords(raw: z.infer<typeof RawChallengeSchema>): string[] {
  const value = firstOf<(string | number)[] | string>(raw.forbidden_words, raw.forbiddenWords);
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map((word) => String(word));
  }
  try {
    const decoded: unknown = JSON.parse(value);
    if (Array.isArray(decoded)) {
      return decoded.map((word) => String(word));
    }
  } catch {
    // not JSON: a single word
  }
  return [value];
}

export function parseChallenge(json: unknown): Challenge {
  const raw = validate(RawChallengeSchema, json, 'challenge');

  return {
    id: firstOf(raw.id, raw._id, raw.challengeId) ?? '',
    gameSessionId: firstOf(raw.gameSessionId, raw.game_session_id) ?? '',
    article1: firstOf(raw.article1, raw.article_1, raw.first_word) ?? 'Un',
    input1: firstOf(raw.input1, raw.input_1, raw.second_word) ?? '',
    preposition: firstOf(raw.preposition, raw.third_word) ?? 'Sur',
    article2: firstOf(raw.article2, raw.article_2, raw.fourth_word) ?? 'Une',
    input2: firstOf(raw.input2, raw.input_2, raw.fifth_word) ?? '',
    forbiddenWords: parseForbiddenWords(raw),
    prompt: raw.prompt ?? null,
    imageUrl: firstOf(raw.imageUrl, raw.image_url, raw.image_path) ?? null,
    answer: raw.answer ?? null,
    isResolved: firstOf(raw.is_resolved, raw.isResolved) ?? null,
    drawerId: firstOf(raw.drawerId, raw.drawer_id) ?? null,
    guesserId: firstOf(raw.guesserId, raw.guesser_id) ?? null,
    currentPhase: parseEnum<ChallengePhase>(
      ChallengePhaseSchema,
      firstOf(raw.currentPhase, raw.current_phase)
    ),
    createdAt: parseTimestamp(raw.createdAt),
    completedAt: parseTimestamp(raw.completedAt),
  };
}

export function parseChallengeList(json: unknown): Challenge[] {
  const list = validate(RawChallengeListSchema, json, 'challenge list');
  const items = Array.isArray(list) ? list : (list.items ?? []);
  return items.map((item) => parseChallenge(item));
}

export function parseImageReference(json: unknown): string {
  const raw = validate(RawImageResponseSchema, json, 'image response');
  const url = firstOf(raw.imageUrl, raw.image_url, raw.image_path);
  if (!url) {
    throw new ProtocolError('image response without an image reference');
  }
  return url;
}

/**
 * Wire representation of a challenge (image reference under `image_path`).
 */
export function serializeChallenge(challenge: Challenge): Record<string, unknown> {
  return {
    id: challenge.id,
    gameSessionId: challenge.gameSessionId,
    ...serializeChallengeDraft(challenge),
    prompt: challenge.prompt,
    image_path: challenge.imageUrl,
    answer: challenge.answer,
    is_resolved: challenge.isResolved,
    drawerId: challenge.drawerId,
    guesserId: challenge.guesserId,
    currentPhase: challenge.currentPhase,
    createdAt: challenge.createdAt === null ? null : new Date(challenge.createdAt).toISOString(),
    completedAt:
      challenge.completedAt === null ? null : new Date(challenge.completedAt).toISOString(),
  };
}

/**
 * Challenge definition in the positional word format the service expects.
 */
export function serializeChallengeDraft(draft: ChallengeDraft): ChallengeSubmission {
  return {
    first_word: draft.article1.toLowerCase(),
    second_word: draft.input1,
    third_word: draft.preposition.toLowerCase(),
    fourth_word: draft.article2.toLowerCase(),
    fifth_word: draft.input2,
    forbidden_words: [...draft.forbiddenWords],
  };
}
