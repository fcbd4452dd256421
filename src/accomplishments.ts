import type { StateManager } from './state.js';
import type { DocumentDefinition, DocumentStore } from './store.js';
import type { Logger } from './logger.js';
import type { AccomplishmentEntry, AccomplishmentLog as AccomplishmentDocument, Clock, NewAccomplishment } from './types.js';
import { preview } from './utils.js';

export interface AccomplishmentLogOptions {
  store: DocumentStore;
  document: DocumentDefinition<AccomplishmentDocument>;
  state: StateManager;
  logger: Logger;
  clock: Clock;
}

/** Append-only ledger; entries are never edited or removed. */
export class AccomplishmentLog {
  private readonly store: DocumentStore;
  private readonly document: DocumentDefinition<AccomplishmentDocument>;
  private readonly state: StateManager;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: AccomplishmentLogOptions) {
    this.store = options.store;
    this.document = options.document;
    this.state = options.state;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async append(input: NewAccomplishment): Promise<AccomplishmentEntry> {
    this.logger.info(`Logging accomplishment: ${preview(input.description)}`);
    const entry = await this.store.update(this.document, (log) => {
      const appended: AccomplishmentEntry = {
        timestamp: this.clock(),
        category: input.category,
        description: input.description,
        impact: input.impact,
        artifacts: [...(input.artifacts ?? [])],
      };
      return { next: { ...log, accomplishments: [...log.accomplishments, appended] }, result: appended };
    });

    await this.state.bumpMetric('total_accomplishments');
    this.logger.info(`Accomplishment logged (${input.impact} impact)`);
    return entry;
  }
}
