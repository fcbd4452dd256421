import { TaskNotFoundError } from './errors.js';
import { taskPrioritySchema } from './schemas.js';
import type { StateManager } from './state.js';
import type { DocumentDefinition, DocumentStore } from './store.js';
import type { Logger } from './logger.js';
import type {
  Backlog,
  BacklogFilter,
  BacklogListing,
  Clock,
  NewTask,
  Task,
  TaskPriority,
  TaskStatusChange,
} from './types.js';
import { formatTaskId } from './utils.js';

const PRIORITY_RANK: Record<TaskPriority, number> = {
  urgent: 0,
  high: 1,
  normal: 2,
  low: 3,
};

/** Unknown or missing priorities rank as normal. */
export function priorityRank(priority: unknown): number {
  const parsed = taskPrioritySchema.safeParse(priority);
  return parsed.success ? PRIORITY_RANK[parsed.data] : PRIORITY_RANK.normal;
}

export function sortByPriority(tasks: readonly Task[]): Task[] {
  // Array.prototype.sort is stable, so equal priorities keep insertion order.
  return [...tasks].sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
}

export interface BacklogManagerOptions {
  store: DocumentStore;
  document: DocumentDefinition<Backlog>;
  state: StateManager;
  logger: Logger;
  clock: Clock;
}

export class BacklogManager {
  private readonly store: DocumentStore;
  private readonly document: DocumentDefinition<Backlog>;
  private readonly state: StateManager;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: BacklogManagerOptions) {
    this.store = options.store;
    this.document = options.document;
    this.state = options.state;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async list(filter: BacklogFilter = 'all'): Promise<BacklogListing> {
    const backlog = await this.store.load(this.document);
    const matching = filter === 'all'
      ? backlog.tasks
      : backlog.tasks.filter((task) => task.status === filter);
    const tasks = sortByPriority(matching);
    this.logger.info(`Found ${tasks.length} tasks (filter: ${filter})`);
    return { tasks, total: tasks.length };
  }

  /**
   * IDs are `task-NNN` from the current task count. Tasks are never removed and
   * assignment runs inside the serialized update, so the count only grows.
   */
  async add(input: NewTask): Promise<Task> {
    const task = await this.store.update(this.document, (backlog) => {
      const created: Task = {
        id: formatTaskId(backlog.tasks.length + 1),
        title: input.title,
        description: input.description,
        priority: input.priority,
        status: 'pending',
        created_at: this.clock(),
        updated_at: null,
        completed_at: null,
      };
      return { next: { ...backlog, tasks: [...backlog.tasks, created] }, result: created };
    });
    this.logger.info(`Task ${task.id} added: ${input.title}`);
    return task;
  }

  /**
   * Moves a task to `status`. Completing bumps `tasks_completed` after the
   * backlog write, on every call: completing an already completed task counts
   * again, while its original `completed_at` is kept.
   */
  async updateStatus(change: TaskStatusChange): Promise<Task> {
    const task = await this.store.update(this.document, (backlog) => {
      const index = backlog.tasks.findIndex((candidate) => candidate.id === change.task_id);
      if (index === -1) throw new TaskNotFoundError(change.task_id);

      const now = this.clock();
      const current = backlog.tasks[index];
      const updated: Task = { ...current, status: change.status, updated_at: now };
      if (change.notes) updated.notes = change.notes;
      if (change.status === 'completed' && !current.completed_at) updated.completed_at = now;

      const tasks = backlog.tasks.map((candidate, position) => (position === index ? updated : candidate));
      return { next: { ...backlog, tasks }, result: updated };
    });

    if (change.status === 'completed') {
      await this.state.bumpMetric('tasks_completed');
    }
    this.logger.info(`Task ${task.id} updated to ${task.status}`);
    return task;
  }
}
