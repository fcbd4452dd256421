import { z } from 'zod';

export const TASK_PRIORITIES = ['urgent', 'high', 'normal', 'low'] as const;
export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export const IMPACT_LEVELS = ['low', 'medium', 'high'] as const;
export const NOTIFICATION_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export const taskPrioritySchema = z.enum(TASK_PRIORITIES);
export const taskStatusSchema = z.enum(TASK_STATUSES);
export const impactLevelSchema = z.enum(IMPACT_LEVELS);
export const notificationPrioritySchema = z.enum(NOTIFICATION_PRIORITIES);
/** 'all', or any stored status; a status no task carries matches nothing. */
export const backlogFilterSchema = z.string();

const inputCounter = z.number().int().nonnegative();

/** Client side of write_state: server-owned fields are accepted in any shape and then discarded. */
export const stateInputSchema = z.object({
  version: z.unknown(),
  wake_count: z.unknown(),
  created_at: z.unknown(),
  last_wake: z.unknown(),
  current_focus: z.string().optional(),
  active_tasks: z.array(z.unknown()).optional(),
  capabilities: z.record(z.string(), z.boolean()).optional(),
  metrics: z.object({
    total_accomplishments: inputCounter.optional(),
    tasks_completed: inputCounter.optional(),
    notifications_sent: inputCounter.optional(),
  }).passthrough().optional(),
}).passthrough();

// Stored documents are read field by field. A hand-edited value of the wrong
// type is kept as written, or falls back for that field alone; it never turns
// the whole document into a default that the next save would write back.

/** Array of `item`; entries that do not parse are dropped. */
function readableItems<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.array(z.unknown()).transform((entries) => entries.flatMap((entry) => {
    const parsed = item.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  }));
}

/** Counters are whatever JSON was stored; a non-number counts as zero when bumped. */
export const metricsSchema = z.object({
  total_accomplishments: z.unknown(),
  tasks_completed: z.unknown(),
  notifications_sent: z.unknown(),
}).passthrough();

// Key order here is the on-disk key order of a freshly loaded state document.
export const agentStateSchema = z.object({
  version: z.string().catch('1.0'),
  wake_count: z.number().catch(0),
  created_at: z.string().nullable().catch(null),
  last_wake: z.string().nullable().catch(null),
  current_focus: z.unknown(),
  active_tasks: z.unknown(),
  capabilities: z.unknown(),
  metrics: metricsSchema.optional().catch(undefined),
}).passthrough();

/** Any object is a task; priorities it does not know rank as normal. */
export const taskSchema = z.object({
  id: z.unknown(),
  title: z.unknown(),
  description: z.unknown(),
  priority: z.unknown(),
  status: z.unknown(),
  created_at: z.unknown(),
  updated_at: z.unknown(),
  completed_at: z.unknown(),
  notes: z.unknown(),
}).passthrough();

export const backlogSchema = z.object({
  tasks: readableItems(taskSchema).default([]),
}).passthrough();

export const accomplishmentEntrySchema = z.object({
  timestamp: z.unknown(),
  category: z.unknown(),
  description: z.unknown(),
  impact: z.unknown(),
  artifacts: z.unknown().default([]),
}).passthrough();

export const accomplishmentLogSchema = z.object({
  accomplishments: readableItems(accomplishmentEntrySchema).default([]),
}).passthrough();
