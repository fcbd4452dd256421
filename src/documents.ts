import { accomplishmentLogSchema, agentStateSchema, backlogSchema } from './schemas.js';
import type { DocumentDefinition } from './store.js';
import type { AccomplishmentLog, AgentState, Backlog } from './types.js';

export interface DocumentSet {
  state: DocumentDefinition<AgentState>;
  backlog: DocumentDefinition<Backlog>;
  accomplishments: DocumentDefinition<AccomplishmentLog>;
}

export function defaultState(): AgentState {
  return {
    version: '1.0',
    wake_count: 0,
    created_at: null,
    last_wake: null,
    current_focus: 'Initial setup',
    active_tasks: [],
    capabilities: {
      read_state: true,
      write_state: true,
      read_backlog: true,
      update_task: true,
      log_accomplishment: true,
      send_notification: true,
    },
    metrics: {
      total_accomplishments: 0,
      tasks_completed: 0,
      notifications_sent: 0,
    },
  };
}

export function defaultBacklog(): Backlog {
  return { tasks: [] };
}

export function defaultAccomplishments(): AccomplishmentLog {
  return { accomplishments: [] };
}

export function defineDocuments(paths: {
  statePath: string;
  backlogPath: string;
  accomplishmentsPath: string;
}): DocumentSet {
  return {
    state: { name: 'state', path: paths.statePath, schema: agentStateSchema, defaults: defaultState },
    backlog: { name: 'backlog', path: paths.backlogPath, schema: backlogSchema, defaults: defaultBacklog },
    accomplishments: {
      name: 'accomplishments',
      path: paths.accomplishmentsPath,
      schema: accomplishmentLogSchema,
      defaults: defaultAccomplishments,
    },
  };
}
