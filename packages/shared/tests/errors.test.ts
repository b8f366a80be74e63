import { describe, expect, it } from 'vitest';
import {
  classifyRemoteError,
  RemoteRequestError,
  SessionError,
  toSessionError,
} from '../src/index.js';

describe('classifyRemoteError', () => {
  it('should detect network-class failures as transient', () => {
    const messages = [
      'ClientException: Connection closed before full header was received',
      'SocketException: Connection reset by peer',
      'TimeoutException: Request timeout',
      'ClientException: Network error',
      'read ECONNRESET on socket',
    ];

    for (const message of messages) {
      expect(classifyRemoteError(new Error(message))).toEqual({ kind: 'transient' });
    }
  });

  it('should detect re-join errors as already_member conflicts', () => {
    expect(classifyRemoteError(new Error('Erreur 400: Player already in game session'))).toEqual({
      kind: 'conflict',
      reason: 'already_member',
    });
    expect(classifyRemoteError(new Error('already in room'))).toEqual({
      kind: 'conflict',
      reason: 'already_member',
    });
  });

  it('should detect missing membership as not_member conflicts', () => {
    expect(classifyRemoteError(new Error('Erreur 400: Player not in game session'))).toEqual({
      kind: 'conflict',
      reason: 'not_member',
    });
  });

  it('should treat anything else as fatal', () => {
    const messages = ['Session not found', 'Team is full', 'Invalid credentials'];

    for (const message of messages) {
      expect(classifyRemoteError(new Error(message))).toEqual({ kind: 'fatal' });
    }
  });

  it('should classify non-Error values by their text', () => {
    expect(classifyRemoteError('socket hang up')).toEqual({ kind: 'transient' });
  });

  it('should use the error class name as well as the message', () => {
    const error = new Error('request aborted');
    error.name = 'TimeoutError';

    expect(classifyRemoteError(error)).toEqual({ kind: 'transient' });
  });

  it('should read socket failures from the cause of a fetch rejection', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), { code: 'ECONNREFUSED' });
    const closed = Object.assign(new Error('other side closed'), { code: 'UND_ERR_SOCKET' });

    expect(classifyRemoteError(new TypeError('fetch failed', { cause: refused }))).toEqual({ kind: 'transient' });
    expect(classifyRemoteError(new TypeError('fetch failed', { cause: closed }))).toEqual({ kind: 'transient' });
  });

  it('should read an error code without a matching message', () => {
    const cause = Object.assign(new Error('getaddrinfo failed'), { code: 'EAI_AGAIN' });

    expect(classifyRemoteError(new TypeError('fetch failed', { cause }))).toEqual({ kind: 'transient' });
  });

  it('should stay fatal when no error in the cause chain is network-class', () => {
    const error = new TypeError('fetch failed', { cause: new Error('invalid header value') });

    expect(classifyRemoteError(error)).toEqual({ kind: 'fatal' });
  });

  it('should keep the kind of an existing SessionError', () => {
    const conflict = new SessionError('conflict', 'x', { reason: 'not_member' });
    expect(classifyRemoteError(conflict)).toEqual({ kind: 'conflict', reason: 'not_member' });
    expect(classifyRemoteError(SessionError.invalid('empty_prompt', 'x'))).toEqual({
      kind: 'fatal',
    });
  });
});

describe('toSessionError', () => {
  it('should wrap remote errors with their classification and keep the cause', () => {
    const original = new RemoteRequestError(400, 'player already in game session', '/join');

    const error = toSessionError(original);

    expect(error.kind).toBe('conflict');
    expect(error.reason).toBe('already_member');
    expect(error.message).toBe('Erreur 400: player already in game session');
    expect(error.cause).toBe(original);
  });

  it('should pass SessionErrors through untouched', () => {
    const error = SessionError.invalid('empty_prompt', 'Prompt is empty');

    expect(toSessionError(error)).toBe(error);
  });
});
