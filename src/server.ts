import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  backlogFilterSchema,
  impactLevelSchema,
  notificationPrioritySchema,
  stateInputSchema,
  taskPrioritySchema,
  taskStatusSchema,
} from './schemas.js';
import { accomplishmentTools, handleLogAccomplishment } from './tools/accomplishments.js';
import { backlogTools, handleAddTask, handleReadBacklog, handleUpdateTask } from './tools/backlog.js';
import { handleSendNotification, notificationTools } from './tools/notifications.js';
import { handleReadState, handleWriteState, stateTools } from './tools/state.js';

export const SERVER_INFO = {
  name: 'wake-cycle-tools',
  version: '1.0.0',
  description: 'MCP tool server for autonomous agent state management',
} as const;

export const toolInputShapes = {
  read_state: {},
  write_state: {
    state: stateInputSchema.describe('Complete state object to persist'),
  },
  read_backlog: {
    status_filter: backlogFilterSchema.optional().describe('all, pending, in_progress or completed (default all)'),
  },
  add_task: {
    title: z.string().describe('Task title'),
    description: z.string().describe('Task description'),
    priority: taskPrioritySchema.describe('Priority: low, normal, high, urgent'),
  },
  update_task: {
    task_id: z.string().describe('ID of task to update'),
    status: taskStatusSchema.describe('New status: pending, in_progress, completed'),
    notes: z.string().optional().describe('Optional progress notes'),
  },
  log_accomplishment: {
    category: z.string().describe('Category of work'),
    description: z.string().describe('What was accomplished'),
    impact: impactLevelSchema.describe('Impact level: low, medium, high'),
    artifacts: z.array(z.string()).optional().describe('Created artifacts'),
  },
  send_notification: {
    message: z.string().describe('Notification message'),
    priority: notificationPrioritySchema.describe('Priority: low, normal, high, urgent'),
    channel: z.string().optional().describe('Notification channel (default webhook)'),
  },
} satisfies Record<string, z.ZodRawShape>;

export type ToolName = keyof typeof toolInputShapes;

export const toolCatalog = {
  ...stateTools,
  ...backlogTools,
  ...accomplishmentTools,
  ...notificationTools,
} satisfies Record<ToolName, unknown>;

export function listToolDefinitions() {
  return Object.entries(toolCatalog).map(([name, tool]) => ({
    name,
    description: tool.description,
    inputSchema: tool.inputSchema,
  }));
}

export function mcpTextResponse(payload: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
  };
}

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_INFO.name,
    version: SERVER_INFO.version,
  });
  registerTools(server);
  return server;
}

function registerTools(server: McpServer) {
  // --- State tools ---

  server.tool(
    'read_state',
    stateTools.read_state.description,
    async () => mcpTextResponse(await handleReadState())
  );

  server.tool(
    'write_state',
    stateTools.write_state.description,
    toolInputShapes.write_state,
    async (args) => mcpTextResponse(await handleWriteState(args))
  );

  // --- Backlog tools ---

  server.tool(
    'read_backlog',
    backlogTools.read_backlog.description,
    toolInputShapes.read_backlog,
    async (args) => mcpTextResponse(await handleReadBacklog(args))
  );

  server.tool(
    'add_task',
    backlogTools.add_task.description,
    toolInputShapes.add_task,
    async (args) => mcpTextResponse(await handleAddTask(args))
  );

  server.tool(
    'update_task',
    backlogTools.update_task.description,
    toolInputShapes.update_task,
    async (args) => mcpTextResponse(await handleUpdateTask(args))
  );

  // --- Accomplishment and notification tools ---

  server.tool(
    'log_accomplishment',
    accomplishmentTools.log_accomplishment.description,
    toolInputShapes.log_accomplishment,
    async (args) => mcpTextResponse(await handleLogAccomplishment(args))
  );

  server.tool(
    'send_notification',
    notificationTools.send_notification.description,
    toolInputShapes.send_notification,
    async (args) => mcpTextResponse(await handleSendNotification(args))
  );
}
