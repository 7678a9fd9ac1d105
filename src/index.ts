import { createServer } from 'http';
import { config } from './config';
import { app } from './app';
import knex, { migrateLatest } from './database/connection';
import { initSocket } from './socket';
import { cleanupService } from './services/CleanupService';
import { connectionManager } from './realtime/ConnectionManager';

const httpServer = createServer(app);

async function startServer(): Promise<void> {
  await migrateLatest();

  const io = initSocket(httpServer);
  cleanupService.start();

  httpServer.listen(config.server.port, () => {
    console.log(
      `[Server] Relay listening on port ${config.server.port} (${config.server.nodeEnv})`
    );
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    cleanupService.stop();
    connectionManager.closeAll();
    io.close(() => {
      knex
        .destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[Server] Failed to close database pool:', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

export { httpServer };
