import { createServer as createHttpServer } from 'http';
import { getEnv } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { createExtractionPipeline, loadCommodityClassifier } from './services/procurement/index.js';

async function start(): Promise<void> {
  const env = getEnv();

  // Classifier artifacts are required; a missing model aborts startup
  const classifier = await loadCommodityClassifier(env.COMMODITY_MODEL_DIR);
  const pipeline = createExtractionPipeline(env, classifier);

  const app = createApp({ pipeline, classifier, maxUploadBytes: env.MAX_UPLOAD_BYTES });
  const httpServer = createHttpServer(app);

  // Must outlast one extraction: every attempt's deadline plus backoff
  httpServer.requestTimeout = env.AI_REQUEST_TIMEOUT_MS * (env.AI_MAX_RETRIES + 1) + 60000;

  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    logger.fatal({ error, port: env.PORT }, 'HTTP server error');
    process.exit(1);
  });

  httpServer.listen(env.PORT, () => {
    logger.info(
      {
        port: env.PORT,
        nodeEnv: env.NODE_ENV,
        model: env.OPENAI_MODEL,
        maxChars: env.EXTRACTION_MAX_CHARS,
        timeoutMs: env.AI_REQUEST_TIMEOUT_MS,
        maxRetries: env.AI_MAX_RETRIES,
      },
      'Server started successfully and listening'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    httpServer.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.fatal({ error }, 'Server failed to start');
  process.exit(1);
});
