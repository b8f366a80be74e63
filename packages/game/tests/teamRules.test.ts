import { createFullSession, createPlayer, createSession } from '@inkling/testing';
import { describe, expect, it } from 'vitest';
import {
  areTeamsBalanced,
  canSwitchTeam,
  getPlayerTeam,
  getTeamCounts,
  isTeamFull,
  pickAvailableTeam,
} from '../src/index.js';

describe('team rules', () => {
  const oneRed = createSession({ players: [createPlayer({ id: 'A', color: 'red' })] });

  it('should count players per team', () => {
    expect(getTeamCounts(oneRed)).toEqual({ red: 1, blue: 0 });
  });

  describe('pickAvailableTeam', () => {
    it('should pick red in an empty session', () => {
      expect(pickAvailableTeam(createSession())).toBe('red');
    });

    it('should pick the team with fewer players', () => {
      expect(pickAvailableTeam(oneRed)).toBe('blue');
    });

    it('should pick red on a tie', () => {
      const session = createSession({
        players: [createPlayer({ id: 'A', color: 'red' }), createPlayer({ id: 'B', color: 'blue' })],
      });

      expect(pickAvailableTeam(session)).toBe('red');
    });

    it('should fall back to red when both teams are full', () => {
      expect(pickAvailableTeam(createFullSession())).toBe('red');
    });
  });

  describe('isTeamFull', () => {
    it('should be full at two players', () => {
      const session = createFullSession();

      expect(isTeamFull(session, 'red')).toBe(true);
      expect(isTeamFull(oneRed, 'red')).toBe(false);
    });
  });

  describe('canSwitchTeam', () => {
    it('should allow moving to a team with room', () => {
      expect(canSwitchTeam(oneRed, 'A', 'blue')).toBe(true);
    });

    it('should refuse moving to the current team', () => {
      expect(canSwitchTeam(oneRed, 'A', 'red')).toBe(false);
    });

    it('should refuse moving to a full team', () => {
      expect(canSwitchTeam(createFullSession(), 'A', 'blue')).toBe(false);
    });

    it('should refuse unknown players', () => {
      expect(canSwitchTeam(oneRed, 'Z', 'blue')).toBe(false);
    });
  });

  it('should report balance and player team', () => {
    expect(areTeamsBalanced(oneRed)).toBe(false);
    expect(areTeamsBalanced(createFullSession())).toBe(true);
    expect(getPlayerTeam(oneRed, 'A')).toBe('red');
    expect(getPlayerTeam(oneRed, 'Z')).toBeNull();
  });
});
