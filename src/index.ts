#!/usr/bin/env node

import { loadConfig } from './config.js';
import { createHttpApp } from './http.js';
import { initializeDocuments, initServices } from './services.js';

const SESSION_SWEEP_INTERVAL_MS = 60_000;

const config = loadConfig();
const { logger } = initServices(config);

logger.info(`State path: ${config.statePath}`);
logger.info(`Backlog path: ${config.backlogPath}`);
logger.info(`Accomplishments path: ${config.accomplishmentsPath}`);

await initializeDocuments();

const { app, sessions } = createHttpApp({ host: config.host, logger });

if (config.sessionIdleTimeoutMs > 0) {
  setInterval(() => {
    sessions.sweep(config.sessionIdleTimeoutMs).then(
      (evicted) => {
        if (evicted > 0) {
          logger.info(`[session-gc] evicted=${evicted} active=${sessions.size} idle_timeout_ms=${config.sessionIdleTimeoutMs}`);
        }
      },
      (error: unknown) => logger.error({ err: error }, '[session-gc] error')
    );
  }, SESSION_SWEEP_INTERVAL_MS).unref();
}

app.listen(config.port, config.host, () => {
  logger.info(
    `Wake-Cycle Tools running at http://${config.host}:${config.port}/mcp (webhook=${config.notificationWebhook ? 'on' : 'off'})`
  );
});
