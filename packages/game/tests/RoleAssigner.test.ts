import { createFullSession, createPlayer, createSession } from '@inkling/testing';
import { describe, expect, it } from 'vitest';
import {
  allPlayersHaveRoles,
  areRolesValid,
  assignInitialRoles,
  getPlayerRole,
  isSessionReady,
  switchAllRoles,
} from '../src/index.js';

describe('RoleAssigner', () => {
  describe('isSessionReady', () => {
    it('should require two players on each team', () => {
      expect(isSessionReady(createFullSession())).toBe(true);
    });

    it('should reject three players on one team', () => {
      const session = createSession({
        players: [
          createPlayer({ id: 'A', color: 'red' }),
          createPlayer({ id: 'B', color: 'red' }),
          createPlayer({ id: 'C', color: 'red' }),
          createPlayer({ id: 'D', color: 'blue' }),
        ],
      });

      expect(isSessionReady(session)).toBe(false);
    });

    it('should reject a player without a team', () => {
      const full = createFullSession();
      const session = { ...full, players: [...full.players, createPlayer({ id: 'E' })] };

      expect(isSessionReady(session)).toBe(false);
    });
  });

  describe('assignInitialRoles', () => {
    it('should make the first joiner of each team the drawer', () => {
      const session = createSession({
        players: [
          createPlayer({ id: 'A', color: 'red' }),
          createPlayer({ id: 'C', color: 'blue' }),
          createPlayer({ id: 'B', color: 'red' }),
          createPlayer({ id: 'D', color: 'blue' }),
        ],
      });

      const assigned = assignInitialRoles(session);

      expect(assigned.players.map((p) => [p.id, p.role])).toEqual([
        ['A', 'drawer'],
        ['C', 'drawer'],
        ['B', 'guesser'],
        ['D', 'guesser'],
      ]);
      expect(areRolesValid(assigned)).toBe(true);
      expect(allPlayersHaveRoles(assigned)).toBe(true);
    });

    it('should not modify the input session', () => {
      const session = createFullSession();

      assignInitialRoles(session);

      expect(session.players.every((p) => p.role === null)).toBe(true);
    });

    it('should reassign identically when run again', () => {
      const once = assignInitialRoles(createFullSession());
      const twice = assignInitialRoles(once);

      expect(twice).toEqual(once);
    });

    it('should overwrite wrong existing roles', () => {
      const full = createFullSession();
      const session = {
        ...full,
        players: full.players.map((p) => ({ ...p, role: 'guesser' as const })),
      };

      expect(areRolesValid(assignInitialRoles(session))).toBe(true);
    });

    it('should return incomplete sessions unchanged', () => {
      const session = createSession({
        players: [
          createPlayer({ id: 'A', color: 'red' }),
          createPlayer({ id: 'B', color: 'red' }),
          createPlayer({ id: 'C', color: 'blue' }),
        ],
      });

      const result = assignInitialRoles(session);

      expect(result).toBe(session);
      expect(areRolesValid(result)).toBe(false);
      expect(allPlayersHaveRoles(result)).toBe(false);
    });
  });

  describe('areRolesValid', () => {
    it('should reject two drawers on one team', () => {
      const assigned = assignInitialRoles(createFullSession());
      const session = {
        ...assigned,
        players: assigned.players.map((p) => (p.id === 'B' ? { ...p, role: 'drawer' as const } : p)),
      };

      expect(areRolesValid(session)).toBe(false);
    });

    it('should reject a missing guesser', () => {
      const assigned = assignInitialRoles(createFullSession());
      const session = {
        ...assigned,
        players: assigned.players.map((p) => (p.id === 'D' ? { ...p, role: null } : p)),
      };

      expect(areRolesValid(session)).toBe(false);
      expect(allPlayersHaveRoles(session)).toBe(false);
    });
  });

  describe('switchAllRoles', () => {
    it('should swap drawer and guesser for everyone', () => {
      const switched = switchAllRoles(assignInitialRoles(createFullSession()));

      expect(switched.players.map((p) => p.role)).toEqual(['guesser', 'drawer', 'guesser', 'drawer']);
      expect(areRolesValid(switched)).toBe(true);
    });

    it('should leave players without a role untouched', () => {
      const session = createFullSession();

      expect(switchAllRoles(session).players.every((p) => p.role === null)).toBe(true);
    });
  });

  describe('getPlayerRole', () => {
    it('should look up a role by player id', () => {
      const assigned = assignInitialRoles(createFullSession());

      expect(getPlayerRole(assigned, 'C')).toBe('drawer');
      expect(getPlayerRole(assigned, 'missing')).toBeNull();
    });
  });
});
