import { validateChallengeDraft } from '@inkling/game';
import {
  AnswerRequestSchema,
  ChallengeSubmissionSchema,
  JoinRequestSchema,
  parseChallenge,
  PromptRequestSchema,
  serializeChallenge,
  serializeGameSession,
} from '@inkling/protocol';
import { describeError, logger, SessionError } from '@inkling/shared';
import { type Request, type Response, Router } from 'express';
import type { z } from 'zod';
import { type SessionStore, StoreError } from '../services/SessionStore.js';

/**
 * Player id carried by an `Authorization: Bearer <playerId>` header.
 */
export function bearerPlayerId(header: string | undefined): string | null {
  const match = /^Bearer\s+(\S+)$/i.exec(header?.trim() ?? '');
  return match?.[1] ?? null;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new StoreError(400, `Invalid request body: ${details.join('; ')}`);
  }
  return result.data;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof StoreError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof SessionError && err.kind === 'invalid') {
    res.status(422).json({ error: err.message, rule: err.rule });
    return;
  }
  logger.error('Request failed', describeError(err));
  res.status(500).json({ error: 'Internal server error' });
}

type Handler = (req: Request, res: Response, playerId: string) => void;

/**
 * Resolve the calling player and turn thrown errors into JSON answers.
 */
function authenticated(handler: Handler) {
  return (req: Request, res: Response): void => {
    const playerId = bearerPlayerId(req.get('Authorization'));
    if (!playerId) {
      res.status(401).json({ error: 'Missing bearer token' });
      return;
    }
    try {
      handler(req, res, playerId);
    } catch (err) {
      sendError(res, err);
    }
  };
}

export function createSessionRouter(store: SessionStore): Router {
  const router = Router();

  /**
   * POST /game_sessions - Create a session hosted by the caller
   */
  router.post(
    '/',
    authenticated((_req, res, playerId) => {
      res.status(201).json(serializeGameSession(store.create(playerId)));
    })
  );

  /**
   * GET /game_sessions/:id - Full session state
   */
  router.get(
    '/:id',
    authenticated((req, res) => {
      const session = store.get(req.params['id'] ?? '');
      if (!session) {
        res.status(404).json({ error: 'Game session not found' });
        return;
      }
      res.json(serializeGameSession(session));
    })
  );

  /**
   * GET /game_sessions/:id/status - Status only
   */
  router.get(
    '/:id/status',
    authenticated((req, res) => {
      const session = store.get(req.params['id'] ?? '');
      if (!session) {
        res.status(404).json({ error: 'Game session not found' });
        return;
      }
      res.json({ status: session.status });
    })
  );

  router.post(
    '/:id/join',
    authenticated((req, res, playerId) => {
      const { color } = parseBody(JoinRequestSchema, req.body);
      res.json(serializeGameSession(store.join(req.params['id'] ?? '', playerId, color)));
    })
  );

  router.get(
    '/:id/leave',
    authenticated((req, res, playerId) => {
      res.json(serializeGameSession(store.leave(req.params['id'] ?? '', playerId)));
    })
  );

  router.post(
    '/:id/start',
    authenticated((req, res, playerId) => {
      res.json(serializeGameSession(store.start(req.params['id'] ?? '', playerId)));
    })
  );

  /**
   * GET /game_sessions/:id/challenges - Every challenge of the session
   */
  router.get(
    '/:id/challenges',
    authenticated((req, res) => {
      res.json(store.listChallenges(req.params['id'] ?? '').map(serializeChallenge));
    })
  );

  /**
   * POST /game_sessions/:id/challenges - Submit a challenge in positional word format
   */
  router.post(
    '/:id/challenges',
    authenticated((req, res, playerId) => {
      const submission = parseBody(ChallengeSubmissionSchema, req.body);
      const draft = validateChallengeDraft(parseChallenge(submission));
      const challenge = store.addChallenge(req.params['id'] ?? '', playerId, draft);
      res.status(201).json(serializeChallenge(challenge));
    })
  );

  router.post(
    '/:id/challenges/:challengeId/draw',
    authenticated((req, res, playerId) => {
      const { prompt } = parseBody(PromptRequestSchema, req.body);
      const imagePath = store.draw(
        req.params['id'] ?? '',
        req.params['challengeId'] ?? '',
        playerId,
        prompt
      );
      res.json({ image_path: imagePath });
    })
  );

  router.post(
    '/:id/challenges/:challengeId/answer',
    authenticated((req, res, playerId) => {
      const body = parseBody(AnswerRequestSchema, req.body);
      const challenge = store.answer(
        req.params['id'] ?? '',
        req.params['challengeId'] ?? '',
        playerId,
        body.answer,
        body.is_resolved
      );
      res.json(serializeChallenge(challenge));
    })
  );

  return router;
}
