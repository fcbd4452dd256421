import { randomUUID } from 'crypto';
import type { Request } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { z } from 'zod';
import type { Logger } from './logger.js';
import { createServer, listToolDefinitions, SERVER_INFO, toolCatalog, toolInputShapes } from './server.js';

type RouteOutcome =
  | { ok: true; result: unknown }
  | { ok: false; issues: z.ZodIssue[] };

type ToolRoute = (input: unknown) => Promise<RouteOutcome>;

interface ConnectedSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
  lastActivityAt: number;
}

function bindRoute<Shape extends z.ZodRawShape>(
  shape: Shape,
  handler: (args: z.infer<z.ZodObject<Shape>>) => Promise<unknown>
): ToolRoute {
  const schema = z.object(shape);
  return async (input) => {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) return { ok: false, issues: parsed.error.issues };
    return { ok: true, result: await handler(parsed.data) };
  };
}

const toolRoutes = new Map<string, ToolRoute>([
  ['read_state', bindRoute(toolInputShapes.read_state, toolCatalog.read_state.handler)],
  ['write_state', bindRoute(toolInputShapes.write_state, toolCatalog.write_state.handler)],
  ['read_backlog', bindRoute(toolInputShapes.read_backlog, toolCatalog.read_backlog.handler)],
  ['add_task', bindRoute(toolInputShapes.add_task, toolCatalog.add_task.handler)],
  ['update_task', bindRoute(toolInputShapes.update_task, toolCatalog.update_task.handler)],
  ['log_accomplishment', bindRoute(toolInputShapes.log_accomplishment, toolCatalog.log_accomplishment.handler)],
  ['send_notification', bindRoute(toolInputShapes.send_notification, toolCatalog.send_notification.handler)],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isNotFoundEnvelope(value: unknown): boolean {
  return isRecord(value) && value.success === false && value.error_code === 'TASK_NOT_FOUND';
}

function upsertRawHeader(rawHeaders: string[], name: string, value: string) {
  const target = name.toLowerCase();
  let replaced = false;

  for (let i = 0; i < rawHeaders.length; i += 2) {
    if ((rawHeaders[i] ?? '').toLowerCase() === target) {
      rawHeaders[i + 1] = value;
      replaced = true;
    }
  }

  if (!replaced) {
    rawHeaders.push(name, value);
  }
}

function isInitializeMethod(body: unknown): boolean {
  return isRecord(body) && body.method === 'initialize';
}

function jsonRpcErrorResponse(id: unknown, code: number, message: string) {
  return {
    jsonrpc: '2.0',
    error: { code, message },
    id: id ?? null,
  };
}

function sessionIdFrom(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, ConnectedSession>();

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string | undefined): ConnectedSession | undefined {
    if (!sessionId) return undefined;
    const session = this.sessions.get(sessionId);
    if (session) session.lastActivityAt = Date.now();
    return session;
  }

  add(sessionId: string, server: McpServer, transport: StreamableHTTPServerTransport) {
    this.sessions.set(sessionId, { server, transport, lastActivityAt: Date.now() });
  }

  remove(sessionId: string) {
    this.sessions.delete(sessionId);
  }

  /** Closes sessions idle for longer than `idleMs`; returns how many were evicted. */
  async sweep(idleMs: number, now = Date.now()): Promise<number> {
    const stale = [...this.sessions.entries()].filter(([, session]) => now - session.lastActivityAt > idleMs);
    for (const [sessionId] of stale) {
      this.sessions.delete(sessionId);
    }
    await Promise.allSettled(stale.map(([, session]) => closeSession(session.server, session.transport)));
    return stale.length;
  }
}

async function closeSession(server: McpServer, transport: StreamableHTTPServerTransport) {
  await Promise.allSettled([transport.close(), server.close()]);
}

export function createHttpApp(options: { host: string; logger: Logger }) {
  const { logger } = options;
  const app = createMcpExpressApp({ host: options.host });
  const sessions = new SessionRegistry();

  app.post('/mcp', async (req, res) => {
    // Some clients only advertise one of the two media types the transport requires.
    const acceptHeader = Array.isArray(req.headers.accept)
      ? req.headers.accept.join(', ')
      : (req.headers.accept ?? '');
    if (!acceptHeader.includes('application/json') || !acceptHeader.includes('text/event-stream')) {
      const normalizedAccept = 'application/json, text/event-stream';
      req.headers.accept = normalizedAccept;
      upsertRawHeader(req.rawHeaders, 'Accept', normalizedAccept);
    }

    const sessionId = sessionIdFrom(req);
    const existing = sessions.get(sessionId);
    if (existing) {
      await existing.transport.handleRequest(req, res, req.body);
      return;
    }

    if (!isInitializeMethod(req.body)) {
      const requestId = isRecord(req.body) ? req.body.id : null;
      const message = sessionId
        ? 'Bad Request: Unknown or expired MCP session. Re-run initialize.'
        : 'Bad Request: Server not initialized. Call initialize first.';
      res.status(400).json(jsonRpcErrorResponse(requestId, -32000, message));
      return;
    }

    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
    });
    transport.onclose = () => {
      if (transport.sessionId) sessions.remove(transport.sessionId);
    };
    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);

    if (transport.sessionId) {
      sessions.add(transport.sessionId, server, transport);
    }
  });

  app.get('/mcp', async (req, res) => {
    const session = sessions.get(sessionIdFrom(req));
    if (!session) {
      res.status(400).json({ error: 'No active session. Send POST /mcp first.' });
      return;
    }
    await session.transport.handleRequest(req, res, req.body);
  });

  app.delete('/mcp', async (req, res) => {
    const sessionId = sessionIdFrom(req);
    const session = sessions.get(sessionId);
    if (!sessionId || !session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    await session.transport.handleRequest(req, res, req.body);
    sessions.remove(sessionId);
  });

  app.post('/tools/:toolName', async (req, res) => {
    const toolName = req.params.toolName;
    const route = toolRoutes.get(toolName);
    if (!route) {
      res.status(404).json({ success: false, error: `Unknown tool: ${toolName}` });
      return;
    }

    const statusFilter = typeof req.query.status_filter === 'string' ? { status_filter: req.query.status_filter } : {};
    const input = { ...statusFilter, ...(isRecord(req.body) ? req.body : {}) };

    try {
      const outcome = await route(input);
      if (!outcome.ok) {
        res.status(422).json({ success: false, error: 'Invalid tool input', issues: outcome.issues });
        return;
      }
      res.status(isNotFoundEnvelope(outcome.result) ? 404 : 200).json(outcome.result);
    } catch (error) {
      logger.error({ err: error, tool: toolName }, `[tools/${toolName}] error`);
      res.status(500).json({ success: false, error: `${toolName}_failed` });
    }
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      sessions: sessions.size,
    });
  });

  app.get('/', (_req, res) => {
    res.json({
      ...SERVER_INFO,
      tools: listToolDefinitions().map((tool) => tool.name),
    });
  });

  app.get('/mcp/tools', (_req, res) => {
    res.json({ tools: listToolDefinitions() });
  });

  return { app, sessions };
}
