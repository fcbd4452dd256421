import type { Server } from 'http';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createHttpApp } from '../src/http.js';
import { createServer, listToolDefinitions } from '../src/server.js';
import { closeServices, type Services } from '../src/services.js';
import { initTestServices, makeDataDir, manualClock, removeDataDir, silentLogger } from './helpers.js';

const TOOL_NAMES = [
  'read_state',
  'write_state',
  'read_backlog',
  'add_task',
  'update_task',
  'log_accomplishment',
  'send_notification',
];

let dataDir: string;
let services: Services;

beforeEach(async () => {
  dataDir = await makeDataDir();
  services = initTestServices(dataDir, { clock: manualClock().now });
});

afterEach(async () => {
  closeServices();
  await removeDataDir(dataDir);
});

describe('tool catalog', () => {
  it('lists the seven tools in registration order', () => {
    expect(listToolDefinitions().map((tool) => tool.name)).toEqual(TOOL_NAMES);
  });

  it('marks required arguments in the published schemas', () => {
    const addTask = listToolDefinitions().find((tool) => tool.name === 'add_task');
    expect(addTask?.inputSchema).toMatchObject({ required: ['title', 'description', 'priority'] });
  });
});

describe('MCP server', () => {
  async function connect() {
    const server = createServer();
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    return { server, client };
  }

  async function call(client: Client, name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== 'text') throw new Error(`Unexpected content from ${name}`);
    return JSON.parse(first.text);
  }

  it('advertises every tool', async () => {
    const { server, client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([...TOOL_NAMES].sort());
    await client.close();
    await server.close();
  });

  it('runs a wake cycle through the tools', async () => {
    const { server, client } = await connect();

    const woken = await call(client, 'read_state');
    expect(woken).toMatchObject({ success: true, state: { wake_count: 1 } });

    expect(await call(client, 'add_task', { title: 't1', description: 'd1', priority: 'high' }))
      .toEqual({ success: true, task_id: 'task-001', message: 'Task added: t1' });
    expect(await call(client, 'add_task', { title: 't2', description: 'd2', priority: 'urgent' }))
      .toEqual({ success: true, task_id: 'task-002', message: 'Task added: t2' });

    const backlog = await call(client, 'read_backlog', { status_filter: 'all' });
    expect(backlog).toMatchObject({ success: true, total: 2, tasks: [{ id: 'task-002' }, { id: 'task-001' }] });

    expect(await call(client, 'update_task', { task_id: 'task-001', status: 'completed' }))
      .toEqual({ success: true, message: 'Task task-001 updated to completed' });
    expect(await call(client, 'update_task', { task_id: 'task-404', status: 'completed' }))
      .toEqual({ success: false, error_code: 'TASK_NOT_FOUND', error: 'Task task-404 not found' });

    expect(await call(client, 'log_accomplishment', { category: 'code', description: 'Shipped', impact: 'high' }))
      .toEqual({ success: true, message: 'Accomplishment logged' });
    expect(await call(client, 'send_notification', { message: 'done', priority: 'low' }))
      .toEqual({ success: true, message: 'Notification sent', channel: 'webhook', forwarded: false });

    const state = await services.store.load(services.documents.state);
    expect(state.metrics).toEqual({ total_accomplishments: 1, tasks_completed: 1, notifications_sent: 1 });

    await client.close();
    await server.close();
  });
});

describe('HTTP app', () => {
  let httpServer: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const { app } = createHttpApp({ host: '127.0.0.1', logger: silentLogger() });
    httpServer = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = httpServer.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function postTool(name: string, body: unknown, query = '') {
    return fetch(`${baseUrl}/tools/${name}${query}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('answers health checks', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'healthy', sessions: 0 });
  });

  it('describes the server at the root', async () => {
    const response = await fetch(`${baseUrl}/`);
    expect(await response.json()).toEqual({
      name: 'wake-cycle-tools',
      version: '1.0.0',
      description: 'MCP tool server for autonomous agent state management',
      tools: TOOL_NAMES,
    });
  });

  it('lists tool definitions under /mcp/tools', async () => {
    const response = await fetch(`${baseUrl}/mcp/tools`);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ tools: TOOL_NAMES.map((name) => ({ name })) });
  });

  it('calls a tool over REST', async () => {
    const response = await postTool('add_task', { title: 'REST task', description: 'via http', priority: 'normal' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ success: true, task_id: 'task-001', message: 'Task added: REST task' });
  });

  it('takes status_filter from the query string', async () => {
    await postTool('add_task', { title: 'a', description: '', priority: 'low' });
    const response = await postTool('read_backlog', {}, '?status_filter=completed');
    expect(await response.json()).toEqual({ success: true, tasks: [], total: 0 });
  });

  it('returns an empty listing for an unknown status filter', async () => {
    await postTool('add_task', { title: 'a', description: '', priority: 'low' });
    const response = await postTool('read_backlog', { status_filter: 'archived' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ success: true, tasks: [], total: 0 });
  });

  it('answers 404 for an unknown task', async () => {
    const response = await postTool('update_task', { task_id: 'task-123', status: 'completed' });
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ success: false, error_code: 'TASK_NOT_FOUND', error: 'Task task-123 not found' });
  });

  it('answers 422 for an invalid enum value', async () => {
    const response = await postTool('add_task', { title: 't', description: 'd', priority: 'critical' });
    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ success: false, error: 'Invalid tool input' });
  });

  it('answers 422 when a required argument is missing', async () => {
    const response = await postTool('send_notification', { priority: 'low' });
    expect(response.status).toBe(422);
  });

  it('answers 404 for an unknown tool', async () => {
    const response = await postTool('delete_everything', {});
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ success: false, error: 'Unknown tool: delete_everything' });
  });

  it('rejects MCP requests before initialize', async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/list' }),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Bad Request: Server not initialized. Call initialize first.' },
      id: 1,
    });
  });

  it('answers 404 when deleting an unknown session', async () => {
    const response = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'mcp-session-id': 'nope' } });
    expect(response.status).toBe(404);
  });
});
