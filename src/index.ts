import express from 'express';
import { createServer } from 'node:http';
import { createApiRoutes } from './api/routes.js';
import { config } from './config.js';
import { LevenshteinMatcher, TesseractRecognizer } from './extraction/recognizers.js';
import { logger } from './logger.js';
import { HistoryDb } from './roster/HistoryDb.js';
import { WarSessionManager } from './session/WarSessionManager.js';

async function main() {
  logger.info('Starting war star tracker...');

  // ─── Shared services ───
  const history = new HistoryDb(config.paths.historyDb);
  const recognizer = new TesseractRecognizer(config.ocr.lang);
  const sessions = new WarSessionManager(config, recognizer, new LevenshteinMatcher());

  // ─── HTTP ───
  const app = express();
  app.use(express.json({ limit: config.server.jsonLimit }));
  app.use('/api', createApiRoutes({ config, sessions, history }));

  const httpServer = createServer(app);
  httpServer.listen(config.server.port, () => {
    logger.info(`War star tracker listening on http://localhost:${config.server.port}`);
  });

  const shutdown = async () => {
    logger.info('Shutting down...');
    httpServer.close();
    await recognizer.terminate();
    history.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error('Shutdown failed', { err });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.error('Fatal error', { err });
  process.exit(1);
});
