import type { z } from 'zod';
import type {
  accomplishmentEntrySchema,
  accomplishmentLogSchema,
  agentStateSchema,
  backlogFilterSchema,
  backlogSchema,
  impactLevelSchema,
  notificationPrioritySchema,
  stateInputSchema,
  taskPrioritySchema,
  taskSchema,
  taskStatusSchema,
} from './schemas.js';

export type TaskPriority = z.infer<typeof taskPrioritySchema>;
export type TaskStatus = z.infer<typeof taskStatusSchema>;
export type BacklogFilter = z.infer<typeof backlogFilterSchema>;
export type ImpactLevel = z.infer<typeof impactLevelSchema>;
export type NotificationPriority = z.infer<typeof notificationPrioritySchema>;

export type AgentState = z.output<typeof agentStateSchema>;
export type StateInput = z.output<typeof stateInputSchema>;
export type StateMetrics = NonNullable<AgentState['metrics']>;
export type MetricName = 'total_accomplishments' | 'tasks_completed' | 'notifications_sent';

export type Task = z.output<typeof taskSchema>;
export type Backlog = z.output<typeof backlogSchema>;

export type AccomplishmentEntry = z.output<typeof accomplishmentEntrySchema>;
export type AccomplishmentLog = z.output<typeof accomplishmentLogSchema>;

export interface NewTask {
  title: string;
  description: string;
  priority: TaskPriority;
}

export interface TaskStatusChange {
  task_id: string;
  status: TaskStatus;
  notes?: string;
}

export interface BacklogListing {
  tasks: Task[];
  total: number;
}

export interface NewAccomplishment {
  category: string;
  description: string;
  impact: ImpactLevel;
  artifacts?: string[];
}

export interface Notification {
  message: string;
  priority: NotificationPriority;
  channel?: string;
}

export interface NotificationReceipt {
  channel: string;
  notifications_sent: number;
  forwarded: boolean;
}

export interface WebhookPayload {
  message: string;
  priority: NotificationPriority;
  timestamp: string;
}

/** Returns the current time as an ISO-8601 UTC string. */
export type Clock = () => string;
