import { TaskNotFoundError } from '../errors.js';
import { getServices } from '../services.js';
import type { BacklogFilter, NewTask, TaskStatusChange } from '../types.js';

export async function handleReadBacklog(args: { status_filter?: BacklogFilter } = {}) {
  const { backlog } = getServices();
  const listing = await backlog.list(args.status_filter ?? 'all');
  return { success: true as const, tasks: listing.tasks, total: listing.total };
}

export async function handleAddTask(args: NewTask) {
  const { backlog } = getServices();
  const task = await backlog.add(args);
  return { success: true as const, task_id: task.id, message: `Task added: ${args.title}` };
}

export async function handleUpdateTask(args: TaskStatusChange) {
  const { backlog, logger } = getServices();
  try {
    await backlog.updateStatus(args);
  } catch (error) {
    if (error instanceof TaskNotFoundError) {
      logger.warn(`Task ${error.taskId} not found`);
      return { success: false as const, error_code: error.code, error: error.message };
    }
    throw error;
  }
  return { success: true as const, message: `Task ${args.task_id} updated to ${args.status}` };
}

export const backlogTools = {
  read_backlog: {
    description: 'Read the task backlog sorted by priority (urgent, high, normal, low), optionally filtered by status.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        status_filter: {
          type: 'string',
          description: 'all, pending, in_progress or completed (default all)',
        },
      },
    },
    handler: handleReadBacklog,
  },
  add_task: {
    description: 'Add a new pending task to the backlog and return its id (task-NNN).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        title: { type: 'string', description: 'Task title' },
        description: { type: 'string', description: 'Task description' },
        priority: { type: 'string', enum: ['low', 'normal', 'high', 'urgent'], description: 'Task priority' },
      },
      required: ['title', 'description', 'priority'],
    },
    handler: handleAddTask,
  },
  update_task: {
    description: 'Update a task status. Completing a task stamps completed_at and counts toward metrics.tasks_completed on every call.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        task_id: { type: 'string', description: 'ID of task to update' },
        status: { type: 'string', enum: ['pending', 'in_progress', 'completed'], description: 'New status' },
        notes: { type: 'string', description: 'Optional progress notes (replaces previous notes)' },
      },
      required: ['task_id', 'status'],
    },
    handler: handleUpdateTask,
  },
};
