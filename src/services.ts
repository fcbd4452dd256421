import { AccomplishmentLog } from './accomplishments.js';
import { BacklogManager } from './backlog.js';
import { loadConfig, type AppConfig } from './config.js';
import { defineDocuments, type DocumentSet } from './documents.js';
import { createLogger, type Logger } from './logger.js';
import { NotificationDispatcher, type FetchLike } from './notifications.js';
import { StateManager } from './state.js';
import { DocumentStore, type DocumentDefinition } from './store.js';
import type { Clock } from './types.js';
import { systemClock } from './utils.js';

export interface Services {
  config: AppConfig;
  logger: Logger;
  documents: DocumentSet;
  store: DocumentStore;
  state: StateManager;
  backlog: BacklogManager;
  accomplishments: AccomplishmentLog;
  notifications: NotificationDispatcher;
}

export interface ServiceOverrides {
  logger?: Logger;
  clock?: Clock;
  fetch?: FetchLike;
}

let services: Services | null = null;

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const clock = overrides.clock ?? systemClock;
  const documents = defineDocuments(config);
  const store = new DocumentStore(logger);
  const state = new StateManager({ store, document: documents.state, logger, clock });

  return {
    config,
    logger,
    documents,
    store,
    state,
    backlog: new BacklogManager({ store, document: documents.backlog, state, logger, clock }),
    accomplishments: new AccomplishmentLog({ store, document: documents.accomplishments, state, logger, clock }),
    notifications: new NotificationDispatcher({
      state,
      logger,
      clock,
      webhookUrl: config.notificationWebhook,
      timeoutMs: config.notificationTimeoutMs,
      fetch: overrides.fetch,
    }),
  };
}

export function initServices(config: AppConfig = loadConfig(), overrides: ServiceOverrides = {}): Services {
  services = createServices(config, overrides);
  return services;
}

export function getServices(): Services {
  if (!services) {
    return initServices();
  }
  return services;
}

export function closeServices(): void {
  services = null;
}

/** Writes default documents for any that do not exist yet; returns the names it created. */
export async function initializeDocuments(target: Services = getServices()): Promise<string[]> {
  const { store, documents, logger } = target;
  const created: string[] = [];
  const ensure = async <T>(doc: DocumentDefinition<T>) => {
    if (!(await store.ensure(doc))) return;
    logger.info(`Initialized ${doc.name} file at ${doc.path}`);
    created.push(doc.name);
  };
  await ensure(documents.state);
  await ensure(documents.backlog);
  await ensure(documents.accomplishments);
  return created;
}
