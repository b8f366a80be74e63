import express, { type Express } from 'express';
import { createSessionRouter } from './routes/sessions.js';
import { SessionStore } from './services/SessionStore.js';

export { createSessionRouter, bearerPlayerId } from './routes/sessions.js';
export { SessionStore, type SessionStoreConfig, StoreError } from './services/SessionStore.js';

export function createServer(sessionStore: SessionStore = new SessionStore()): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/game_sessions', createSessionRouter(sessionStore));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
