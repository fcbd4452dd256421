import { agentStateSchema } from './schemas.js';
import type { DocumentDefinition, DocumentStore } from './store.js';
import type { Logger } from './logger.js';
import type { AgentState, Clock, MetricName, StateInput, StateMetrics } from './types.js';

export interface StateManagerOptions {
  store: DocumentStore;
  document: DocumentDefinition<AgentState>;
  logger: Logger;
  clock: Clock;
}

export class StateManager {
  private readonly store: DocumentStore;
  private readonly document: DocumentDefinition<AgentState>;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: StateManagerOptions) {
    this.store = options.store;
    this.document = options.document;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  /** Records a wake: every read bumps `wake_count` and stamps `last_wake`. */
  async read(): Promise<AgentState> {
    const state = await this.store.update(this.document, (current) => {
      const now = this.clock();
      const next: AgentState = {
        ...current,
        wake_count: current.wake_count + 1,
        last_wake: now,
        created_at: current.created_at || now,
      };
      return { next, result: next };
    });
    this.logger.info(`State loaded: wake #${state.wake_count}, focus: ${state.current_focus ?? 'none'}`);
    return state;
  }

  /**
   * Replaces the state document with `input`, except for the server-owned
   * `version`, `wake_count`, `created_at` and `last_wake`, which keep their
   * stored values. Not a merge: fields missing from `input` are dropped.
   */
  async write(input: StateInput): Promise<AgentState> {
    const state = await this.store.update(this.document, (existing) => {
      const next = agentStateSchema.parse({
        ...input,
        version: existing.version,
        wake_count: existing.wake_count,
        created_at: existing.created_at,
        last_wake: existing.last_wake,
      });
      return { next, result: next };
    });
    this.logger.info(`State updated: focus: ${state.current_focus ?? 'none'}`);
    return state;
  }

  /** Increments one metrics counter and returns its new value. */
  async bumpMetric(name: MetricName): Promise<number> {
    return this.store.update(this.document, (current) => {
      const metrics: StateMetrics = { ...current.metrics };
      const previous = metrics[name];
      const value = (typeof previous === 'number' ? previous : 0) + 1;
      metrics[name] = value;
      return { next: { ...current, metrics }, result: value };
    });
  }
}
