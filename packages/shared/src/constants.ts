/**
 * @fileoverview Game rule constants shared by the rules engine, the session
 * client and the dev server.
 * These are compile-time constants that don't depend on runtime configuration.
 */

import type { TeamColor } from './types/index.js';

// ============ Teams ============

/**
 * Team colors in their canonical order (red first).
 */
export const TEAM_COLORS: readonly TeamColor[] = ['red', 'blue'] as const;

/**
 * A team is complete at exactly this many players.
 */
export const PLAYERS_PER_TEAM = 2;

/**
 * Players needed to start a session (two complete teams).
 */
export const MAX_PLAYERS = PLAYERS_PER_TEAM * TEAM_COLORS.length;

// ============ Challenges ============

/**
 * Challenges each player must submit before drawing starts.
 */
export const CHALLENGES_PER_PLAYER = 3;

/**
 * Forbidden words attached to every challenge.
 */
export const FORBIDDEN_WORDS_PER_CHALLENGE = 3;

/**
 * Image regenerations allowed per challenge.
 */
export const MAX_REGENERATIONS = 2;

/**
 * Articles allowed in the challenge sentence template.
 */
export const ARTICLES = ['Un', 'Une'] as const;

/**
 * Prepositions allowed in the challenge sentence template.
 */
export const PREPOSITIONS = ['Sur', 'Dans'] as const;

// ============ Scoring ============

/**
 * Score each team starts the round with.
 */
export const INITIAL_TEAM_SCORE = 100;

/**
 * Score rule magnitudes. Penalties are stored as positive amounts and
 * subtracted by the ledger.
 */
export const SCORE_RULES = {
  WORD_FOUND: 25,
  WRONG_GUESS: 1,
  IMAGE_REGENERATED: 10,
} as const;

// ============ Timing ============

/**
 * Length of the playing phase in milliseconds (5 minutes).
 */
export const ROUND_DURATION_MS = 5 * 60 * 1000;

/**
 * Default interval between session polls.
 */
export const SESSION_POLL_INTERVAL_MS = 1000;

/**
 * Default interval between phase transition checks.
 */
export const TRANSITION_POLL_INTERVAL_MS = 2000;

/**
 * Retry defaults for remote calls.
 */
export const RETRY_MAX_ATTEMPTS = 3;
export const RETRY_BASE_DELAY_MS = 100;
