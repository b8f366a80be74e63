/**
 * @fileoverview Main entry point for the game rules package.
 * Everything here is deterministic and free of network I/O.
 */

// Roles
export {
  allPlayersHaveRoles,
  areRolesValid,
  assignInitialRoles,
  getPlayerRole,
  isSessionReady,
  switchAllRoles,
} from './RoleAssigner.js';
// Referee
export {
  DEFAULT_REFEREE_CONFIG,
  type GuessAssessment,
  type GuessResult,
  RoundReferee,
  type RoundRefereeConfig,
} from './RoundReferee.js';
// Timer
export { formatTime, RoundTimer, type RoundTimerConfig, type RoundTimerState } from './RoundTimer.js';
// Scores
export {
  DEFAULT_LEDGER_CONFIG,
  ScoreLedger,
  type ScoreLedgerConfig,
  type ScoreObserver,
  type ScoreStats,
  type TeamScores,
} from './ScoreLedger.js';
// Teams
export {
  areTeamsBalanced,
  canSwitchTeam,
  getPlayerTeam,
  getTeamCounts,
  isTeamFull,
  pickAvailableTeam,
} from './teamRules.js';
// Validation
export {
  findForbiddenWordsInPrompt,
  MIN_WORD_LENGTH,
  normalizeWord,
  validateChallengeDraft,
  validatePrompt,
} from './validators.js';
