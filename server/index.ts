/**
 * Production API Server
 * Serves assignment generation, export downloads and health endpoints
 */

import 'dotenv/config';
import { SETTINGS, validateConfiguration } from '../config/settings.js';
import { createAppState, createPipelineServices } from '../content-engine/fsm/src/index.js';
import { createConsoleLogger } from '../content-engine/utils/logger.js';
import { ConfigurationError } from '../content-engine/shared/errors.js';
import { errorMessage } from '../content-engine/shared/types.js';
import { createApp } from './app.js';

const logger = createConsoleLogger(SETTINGS.LOG_LEVEL, 'server');

function startServer(): void {
  const config = validateConfiguration();
  if (!config.valid) {
    for (const error of config.errors) {
      logger('warn', error);
    }
  }

  // Every request would be rejected
  if (SETTINGS.REQUIRE_API_KEY && SETTINGS.API_KEYS.length === 0) {
    throw new ConfigurationError('Refusing to start: REQUIRE_API_KEY is true but API_KEYS is empty');
  }

  const services = createPipelineServices(SETTINGS, logger);
  const app = createApp(services, createAppState(), { settings: SETTINGS, logger });

  const server = app.listen(SETTINGS.PORT, () => {
    console.log(`🚀 Assignment API server running on http://localhost:${SETTINGS.PORT}`);
    console.log(`🧠 Model: ${SETTINGS.OPENAI_MODEL}`);
    console.log(`🖼️  Illustrations: ${SETTINGS.IMAGE_API_URL ? 'enabled' : 'disabled'}`);
    console.log(`💓 Health endpoints: /health, /ready, /live, /metrics`);
    console.log(`🔒 API keys: ${SETTINGS.REQUIRE_API_KEY ? 'required' : 'not required'}`);
  });

  server.on('error', error => {
    logger('error', 'Failed to start server', { error: error.message });
    process.exit(1);
  });
}

try {
  startServer();
} catch (error) {
  logger('error', 'Failed to start server', { error: errorMessage(error) });
  process.exit(1);
}
