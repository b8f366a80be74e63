/**
 * @fileoverview Tests for the testing utilities themselves.
 */

import { describe, expect, it } from 'vitest';
import {
  createChallenge,
  createChallengeDraft,
  createFullSession,
  createPlayer,
  FakeSessionApi,
} from '../src/index.js';

describe('fixtures', () => {
  it('should build a player with neutral defaults', () => {
    const player = createPlayer({ id: 'p1', color: 'red' });
    expect(player).toEqual({
      id: 'p1',
      name: 'Player p1',
      color: 'red',
      role: null,
      isHost: false,
      challengesSent: 0,
      hasDrawn: false,
      hasGuessed: false,
    });
  });

  it('should build a full session with the first two players on red', () => {
    const session = createFullSession(['w', 'x', 'y', 'z']);
    expect(session.players.map((p) => [p.id, p.color])).toEqual([
      ['w', 'red'],
      ['x', 'red'],
      ['y', 'blue'],
      ['z', 'blue'],
    ]);
    expect(session.hostId).toBe('w');
    expect(session.players[0]?.isHost).toBe(true);
  });

  it('should build a challenge from the default draft', () => {
    const challenge = createChallenge({ id: 'c1' });
    expect(challenge.input1).toBe('chat');
    expect(challenge.forbiddenWords).toEqual(createChallengeDraft().forbiddenWords);
    expect(challenge.currentPhase).toBe('waiting_prompt');
  });
});

describe('FakeSessionApi', () => {
  it('should add the current player on join', async () => {
    const api = new FakeSessionApi({ currentPlayerId: 'p1' });
    await api.joinSession('session-1', 'blue');

    expect(api.session.players).toHaveLength(1);
    expect(api.session.players[0]?.color).toBe('blue');
  });

  it('should reject a second join with the already-member text', async () => {
    const api = new FakeSessionApi({ currentPlayerId: 'p1' });
    await api.joinSession('session-1', 'red');

    await expect(api.joinSession('session-1', 'red')).rejects.toThrow(
      'Player already in game session'
    );
  });

  it('should reject leaving when not a member', async () => {
    const api = new FakeSessionApi({ currentPlayerId: 'p1' });
    await expect(api.leaveSession('session-1')).rejects.toThrow('Player not in game session');
  });

  it('should fail scripted calls in order, then succeed', async () => {
    const api = new FakeSessionApi();
    api.failNext('getSession', 'timeout', new Error('connection reset'));

    await expect(api.getSession('session-1')).rejects.toThrow('timeout');
    await expect(api.getSession('session-1')).rejects.toThrow('connection reset');
    await expect(api.getSession('session-1')).resolves.toBe(api.session);
    expect(api.callCount('getSession')).toBe(3);
  });

  it('should count submitted challenges on the sender', async () => {
    const api = new FakeSessionApi({ session: createFullSession(), currentPlayerId: 'B' });
    const created = await api.submitChallenge('session-1', createChallengeDraft());

    expect(created.id).toBe('challenge-1');
    expect(api.session.players.find((p) => p.id === 'B')?.challengesSent).toBe(1);
  });

  it('should generate numbered image references', async () => {
    const api = new FakeSessionApi({ challenges: [createChallenge({ id: 'c1' })] });
    const first = await api.submitPromptAndGenerateImage('session-1', 'c1', 'a cat');
    const second = await api.submitPromptAndGenerateImage('session-1', 'c1', 'a cat again');

    expect([first, second]).toEqual(['image-1.png', 'image-2.png']);
    expect(api.challenges[0]?.prompt).toBe('a cat again');
  });

  it('should hold calls until released', async () => {
    const api = new FakeSessionApi();
    const release = api.hold('getSessionStatus');
    let settled = false;
    const pending = api.getSessionStatus('session-1').then((status) => {
      settled = true;
      return status;
    });

    await Promise.resolve();
    expect(settled).toBe(false);

    release();
    await expect(pending).resolves.toBe('lobby');
  });
});
