import { logger } from '@inkling/shared';
import { createServer } from './server.js';

// biome-ignore lint/complexity/useLiteralKeys: Required for noPropertyAccessFromIndexSignature
const PORT = Number(process.env['PORT']) || 3000;

logger.info('Starting dev session server...');

const app = createServer();

const httpServer = app.listen(PORT, '0.0.0.0', () => {
  logger.info('Dev session server running', { port: PORT });
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down...');
  httpServer.close();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down...');
  httpServer.close();
  process.exit(0);
});
