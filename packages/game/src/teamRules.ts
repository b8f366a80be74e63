import {
  type GameSession,
  getTeamPlayers,
  PLAYERS_PER_TEAM,
  type TeamColor,
} from '@inkling/shared';

export function getTeamCounts(session: GameSession): Record<TeamColor, number> {
  return {
    red: getTeamPlayers(session, 'red').length,
    blue: getTeamPlayers(session, 'blue').length,
  };
}

export function isTeamFull(session: GameSession, color: TeamColor): boolean {
  return getTeamPlayers(session, color).length >= PLAYERS_PER_TEAM;
}

/**
 * Team a newcomer should join: the one with fewer players, red on a tie, and
 * red when both are full.
 */
export function pickAvailableTeam(session: GameSession): TeamColor {
  const counts = getTeamCounts(session);
  if (counts.blue < counts.red && counts.blue < PLAYERS_PER_TEAM) {
    return 'blue';
  }
  return 'red';
}

/**
 * A player may move to `target` if they are not already on it and it has room.
 */
export function canSwitchTeam(session: GameSession, playerId: string, target: TeamColor): boolean {
  const player = session.players.find((p) => p.id === playerId);
  if (!player || player.color === target) {
    return false;
  }
  return !isTeamFull(session, target);
}

export function areTeamsBalanced(session: GameSession): boolean {
  const counts = getTeamCounts(session);
  return counts.red === counts.blue;
}

export function getPlayerTeam(session: GameSession, playerId: string): TeamColor | null {
  return session.players.find((p) => p.id === playerId)?.color ?? null;
}
