/**
 * @fileoverview Domain types for game sessions, players and challenges.
 *
 * All entities are treated as immutable values: every update produces a new
 * object, and snapshots handed to subscribers are never patched in place.
 */

// ============ Players & Teams ============

/**
 * Team color. A session always has exactly these two teams.
 */
export type TeamColor = 'red' | 'blue';

/**
 * Role a player holds inside their team.
 */
export type PlayerRole = 'drawer' | 'guesser';

/**
 * A participant in a game session.
 */
export interface Player {
  readonly id: string;
  readonly name: string;
  /** Team the player joined, null until they pick one */
  readonly color: TeamColor | null;
  /** Null until roles are assigned */
  readonly role: PlayerRole | null;
  readonly isHost: boolean;
  /** Number of challenges this player has submitted */
  readonly challengesSent: number;
  /** Whether the player has produced their drawing (image) */
  readonly hasDrawn: boolean;
  /** Whether the player has finished guessing */
  readonly hasGuessed: boolean;
}

// ============ Session ============

/**
 * Session lifecycle status as reported by the remote service.
 */
export type GameStatus = 'lobby' | 'challenge' | 'playing' | 'finished';

/**
 * Sub-phase of a session while its status is `playing`.
 */
export type GamePhase = 'drawing' | 'guessing';

/**
 * Authoritative session state. Replaced wholesale on every fetch.
 */
export interface GameSession {
  readonly id: string;
  readonly status: GameStatus;
  readonly gamePhase: GamePhase | null;
  /** Players in join order */
  readonly players: readonly Player[];
  readonly teamScores: Readonly<Record<TeamColor, number>>;
  readonly currentChallengeIndex: number;
  /** Epoch milliseconds */
  readonly createdAt: number | null;
  /** Epoch milliseconds */
  readonly startedAt: number | null;
  readonly hostId: string | null;
}

// ============ Challenges ============

/**
 * Server-assigned progress tag of a challenge.
 */
export type ChallengePhase =
  | 'waiting_prompt'
  | 'prompt_created'
  | 'image_generated'
  | 'guessing'
  | 'resolved';

/**
 * One round's word template, forbidden words, prompt, image and resolution.
 *
 * Sentence format: "{article1} {input1} {preposition} {article2} {input2}".
 */
export interface Challenge {
  readonly id: string;
  readonly gameSessionId: string;
  readonly article1: string;
  /** First word to guess */
  readonly input1: string;
  readonly preposition: string;
  readonly article2: string;
  /** Second word to guess */
  readonly input2: string;
  readonly forbiddenWords: readonly string[];
  /** Drawer's prompt; locally authoritative until echoed back */
  readonly prompt: string | null;
  /** Generated image reference; always server-authoritative */
  readonly imageUrl: string | null;
  /** Guesser's last submitted answer */
  readonly answer: string | null;
  /** Always server-authoritative */
  readonly isResolved: boolean | null;
  readonly drawerId: string | null;
  readonly guesserId: string | null;
  readonly currentPhase: ChallengePhase | null;
  /** Epoch milliseconds */
  readonly createdAt: number | null;
  /** Epoch milliseconds */
  readonly completedAt: number | null;
}

/**
 * Fields a player fills in when defining a challenge.
 */
export interface ChallengeDraft {
  readonly article1: string;
  readonly input1: string;
  readonly preposition: string;
  readonly article2: string;
  readonly input2: string;
  readonly forbiddenWords: readonly string[];
}

// ============ Scores ============

/**
 * Immutable record of one score change.
 */
export interface ScoreEvent {
  readonly team: TeamColor;
  readonly previousScore: number;
  readonly newScore: number;
  /** Requested signed change (before clamping) */
  readonly delta: number;
  readonly reason: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

// ============ Helpers ============

/**
 * Full challenge sentence, e.g. "Un chat Sur Une table".
 */
export function getFullPhrase(challenge: ChallengeDraft): string {
  return `${challenge.article1} ${challenge.input1} ${challenge.preposition} ${challenge.article2} ${challenge.input2}`;
}

/**
 * The two words the guesser has to find.
 */
export function getTargetWords(challenge: ChallengeDraft): string[] {
  return [challenge.input1, challenge.input2];
}

/**
 * Words the drawer may not use in a prompt: the targets plus the forbidden list.
 */
export function getAllForbiddenWords(challenge: ChallengeDraft): string[] {
  return [...getTargetWords(challenge), ...challenge.forbiddenWords];
}

/**
 * Players belonging to a team, in join order.
 */
export function getTeamPlayers(session: GameSession, color: TeamColor): Player[] {
  return session.players.filter((p) => p.color === color);
}
