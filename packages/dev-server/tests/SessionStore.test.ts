import { createChallengeDraft } from '@inkling/testing';
import { beforeEach, describe, expect, it } from 'vitest';
import { SessionStore, StoreError } from '../src/services/SessionStore.js';

const PLAYERS = [
  ['A', 'red'],
  ['B', 'red'],
  ['C', 'blue'],
  ['D', 'blue'],
] as const;

function captureStoreError(action: () => unknown): StoreError {
  try {
    action();
  } catch (error) {
    if (error instanceof StoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a StoreError');
}

describe('SessionStore', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore({ now: () => 5000 });
  });

  function startedSession(): void {
    store.create('A', 's1');
    for (const [id, color] of PLAYERS) {
      store.join('s1', id, color);
    }
    store.start('s1', 'A');
  }

  function sendAllChallenges(): void {
    for (const [id] of PLAYERS) {
      for (let i = 0; i < 3; i++) {
        store.addChallenge('s1', id, createChallengeDraft());
      }
    }
  }

  describe('generateSessionId', () => {
    it('should generate a 6-character alphanumeric ID', () => {
      expect(store.generateSessionId()).toMatch(/^[a-z0-9]{6}$/);
    });
  });

  describe('membership', () => {
    it('should create a lobby session hosted by the creator', () => {
      const session = store.create('A', 's1');

      expect(session.status).toBe('lobby');
      expect(session.hostId).toBe('A');
      expect(session.players).toEqual([]);
      expect(session.teamScores).toEqual({ red: 100, blue: 100 });
      expect(store.get('s1')).toBe(session);
    });

    it('should add players in join order and flag the host', () => {
      store.create('A', 's1');
      store.join('s1', 'B', 'blue');
      const session = store.join('s1', 'A', 'red');

      expect(session.players.map((p) => [p.id, p.color, p.isHost])).toEqual([
        ['B', 'blue', false],
        ['A', 'red', true],
      ]);
    });

    it('should answer a second join with the already-member text', () => {
      store.create('A', 's1');
      store.join('s1', 'A', 'red');

      const error = captureStoreError(() => store.join('s1', 'A', 'blue'));

      expect(error.status).toBe(400);
      expect(error.message).toBe('Player already in game session');
    });

    it('should refuse a third player on a team', () => {
      store.create('A', 's1');
      store.join('s1', 'A', 'red');
      store.join('s1', 'B', 'red');

      expect(captureStoreError(() => store.join('s1', 'C', 'red')).message).toBe('Team red is full');
    });

    it('should answer leaving a session twice with the not-member text', () => {
      store.create('A', 's1');
      store.join('s1', 'B', 'red');
      store.leave('s1', 'B');

      const error = captureStoreError(() => store.leave('s1', 'B'));

      expect(error.status).toBe(400);
      expect(error.message).toBe('Player not in game session');
    });

    it('should report unknown sessions', () => {
      expect(captureStoreError(() => store.leave('nope', 'A')).status).toBe(404);
    });
  });

  describe('start', () => {
    it('should let only the host start', () => {
      store.create('A', 's1');
      for (const [id, color] of PLAYERS) {
        store.join('s1', id, color);
      }

      expect(captureStoreError(() => store.start('s1', 'B')).status).toBe(403);
    });

    it('should require two complete teams', () => {
      store.create('A', 's1');
      store.join('s1', 'A', 'red');

      expect(captureStoreError(() => store.start('s1', 'A')).message).toBe('Both teams need two players');
    });

    it('should move to the challenge phase and assign roles', () => {
      startedSession();
      const session = store.get('s1');

      expect(session?.status).toBe('challenge');
      expect(session?.players.map((p) => p.role)).toEqual(['drawer', 'guesser', 'drawer', 'guesser']);
    });
  });

  describe('challenges', () => {
    it('should count challenges per player and cap them', () => {
      startedSession();
      for (let i = 0; i < 3; i++) {
        store.addChallenge('s1', 'A', createChallengeDraft());
      }

      expect(store.get('s1')?.players[0]?.challengesSent).toBe(3);
      expect(captureStoreError(() => store.addChallenge('s1', 'A', createChallengeDraft())).message).toBe(
        'All challenges already sent'
      );
    });

    it('should start drawing once every player sent all challenges', () => {
      startedSession();
      sendAllChallenges();
      const session = store.get('s1');

      expect(session?.status).toBe('playing');
      expect(session?.gamePhase).toBe('drawing');
      expect(session?.startedAt).toBe(5000);
    });

    it('should hand each challenge to the opposing team', () => {
      startedSession();
      sendAllChallenges();
      const challenges = store.listChallenges('s1');

      expect(challenges.map((c) => [c.id, c.drawerId, c.guesserId])).toEqual([
        ['c1', 'C', 'D'],
        ['c2', 'C', 'D'],
        ['c3', 'C', 'D'],
        ['c4', 'D', 'C'],
        ['c5', 'D', 'C'],
        ['c6', 'D', 'C'],
        ['c7', 'A', 'B'],
        ['c8', 'A', 'B'],
        ['c9', 'A', 'B'],
        ['c10', 'B', 'A'],
        ['c11', 'B', 'A'],
        ['c12', 'B', 'A'],
      ]);
    });
  });

  describe('drawing and guessing', () => {
    it('should only let the assigned drawer draw', () => {
      startedSession();
      sendAllChallenges();

      expect(captureStoreError(() => store.draw('s1', 'c1', 'A', 'a small feline')).status).toBe(403);
    });

    it('should return a new image reference per drawing', () => {
      startedSession();
      sendAllChallenges();

      expect(store.draw('s1', 'c1', 'C', 'a small feline')).toBe('/images/c1-1.png');
      expect(store.draw('s1', 'c1', 'C', 'a smaller feline')).toBe('/images/c1-2.png');
      expect(store.listChallenges('s1')[0]?.prompt).toBe('a smaller feline');
    });

    it('should walk the session through guessing to finished', () => {
      startedSession();
      sendAllChallenges();

      for (const challenge of store.listChallenges('s1')) {
        store.draw('s1', challenge.id, challenge.drawerId ?? '', 'a drawing');
      }
      expect(store.get('s1')?.gamePhase).toBe('guessing');
      expect(store.get('s1')?.players.every((p) => p.hasDrawn)).toBe(true);

      const [first] = store.listChallenges('s1');
      const wrong = store.answer('s1', 'c1', first?.guesserId ?? '', 'chien', false);
      expect(wrong.isResolved).toBe(false);
      expect(wrong.currentPhase).toBe('guessing');

      for (const challenge of store.listChallenges('s1')) {
        store.answer('s1', challenge.id, challenge.guesserId ?? '', 'chat table', true);
      }
      const session = store.get('s1');
      expect(session?.status).toBe('finished');
      expect(session?.players.every((p) => p.hasGuessed)).toBe(true);
      expect(store.listChallenges('s1')[0]?.completedAt).toBe(5000);
    });
  });
});
