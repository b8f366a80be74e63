/**
 * @fileoverview Drawer/guesser role rules.
 *
 * Pure functions over a session; every change returns a new session object.
 * Join order is the order of `session.players`.
 */

import {
  type GameSession,
  getTeamPlayers,
  logger,
  MAX_PLAYERS,
  PLAYERS_PER_TEAM,
  type Player,
  type PlayerRole,
  TEAM_COLORS,
} from '@inkling/shared';

/**
 * Ready means two complete teams and nobody without a team.
 */
export function isSessionReady(session: GameSession): boolean {
  return (
    session.players.length === MAX_PLAYERS &&
    TEAM_COLORS.every((color) => getTeamPlayers(session, color).length === PLAYERS_PER_TEAM)
  );
}

/**
 * First player of each team draws, second guesses. Sessions that are not ready
 * are returned unchanged.
 */
export function assignInitialRoles(session: GameSession): GameSession {
  if (!isSessionReady(session)) {
    logger.warn('Session not ready for role assignment', {
      sessionId: session.id,
      players: session.players.length,
    });
    return session;
  }

  const roles = new Map<string, PlayerRole>();
  for (const color of TEAM_COLORS) {
    const [drawer, guesser] = getTeamPlayers(session, color);
    if (drawer && guesser) {
      roles.set(drawer.id, 'drawer');
      roles.set(guesser.id, 'guesser');
    }
  }

  const players = session.players.map(
    (player): Player => ({ ...player, role: roles.get(player.id) ?? player.role })
  );

  logger.info('Roles assigned', {
    sessionId: session.id,
    drawers: players.filter((p) => p.role === 'drawer').map((p) => p.id),
  });
  return { ...session, players };
}

export function allPlayersHaveRoles(session: GameSession): boolean {
  return session.players.every((player) => player.role !== null);
}

/**
 * Every team has exactly two players: one drawer and one guesser.
 */
export function areRolesValid(session: GameSession): boolean {
  return TEAM_COLORS.every((color) => {
    const team = getTeamPlayers(session, color);
    if (team.length !== PLAYERS_PER_TEAM) {
      return false;
    }
    const drawers = team.filter((p) => p.role === 'drawer').length;
    const guessers = team.filter((p) => p.role === 'guesser').length;
    return drawers === 1 && guessers === 1;
  });
}

/**
 * Swap drawer and guesser for every player that has a role.
 */
export function switchAllRoles(session: GameSession): GameSession {
  const players = session.players.map((player): Player => {
    if (player.role === null) {
      return player;
    }
    return { ...player, role: player.role === 'drawer' ? 'guesser' : 'drawer' };
  });
  return { ...session, players };
}

/**
 * Role of one player, or null when unknown.
 */
export function getPlayerRole(session: GameSession, playerId: string): PlayerRole | null {
  return session.players.find((p) => p.id === playerId)?.role ?? null;
}
