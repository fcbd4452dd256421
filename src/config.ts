import path from 'path';
import { normalizeLogLevel, type LogLevel } from './logger.js';

export interface AppConfig {
  statePath: string;
  backlogPath: string;
  accomplishmentsPath: string;
  logLevel: LogLevel;
  notificationWebhook: string | null;
  notificationTimeoutMs: number;
  port: number;
  host: string;
  /** 0 disables idle MCP session eviction. */
  sessionIdleTimeoutMs: number;
}

const DEFAULT_DATA_DIR = '/data';
const DEFAULT_PORT = 8000;
const DEFAULT_NOTIFICATION_TIMEOUT_MS = 10_000;
const DEFAULT_SESSION_IDLE_TIMEOUT_MS = 6 * 60 * 60 * 1000;

function nonEmpty(value: string | undefined): string | null {
  const trimmed = (value || '').trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) return DEFAULT_PORT;
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = nonEmpty(env.DATA_DIR) ?? DEFAULT_DATA_DIR;
  const notificationTimeoutMs = Number.isFinite(Number(env.NOTIFICATION_TIMEOUT_MS)) && nonEmpty(env.NOTIFICATION_TIMEOUT_MS)
    ? Math.max(100, Math.min(60_000, Math.floor(Number(env.NOTIFICATION_TIMEOUT_MS))))
    : DEFAULT_NOTIFICATION_TIMEOUT_MS;
  const sessionIdleTimeoutMs = (() => {
    const raw = Number(env.SESSION_IDLE_TIMEOUT_MS);
    if (!nonEmpty(env.SESSION_IDLE_TIMEOUT_MS) || !Number.isFinite(raw)) return DEFAULT_SESSION_IDLE_TIMEOUT_MS;
    const normalized = Math.floor(raw);
    if (normalized <= 0) return 0;
    return Math.max(60_000, Math.min(7 * 24 * 60 * 60 * 1000, normalized));
  })();

  return {
    statePath: nonEmpty(env.STATE_PATH) ?? path.join(dataDir, 'state.json'),
    backlogPath: nonEmpty(env.BACKLOG_PATH) ?? path.join(dataDir, 'backlog.json'),
    accomplishmentsPath: nonEmpty(env.ACCOMPLISHMENTS_PATH) ?? path.join(dataDir, 'accomplishments.json'),
    logLevel: normalizeLogLevel(env.LOG_LEVEL),
    notificationWebhook: nonEmpty(env.NOTIFICATION_WEBHOOK),
    notificationTimeoutMs,
    port: nonEmpty(env.PORT) ? parsePort(env.PORT) : DEFAULT_PORT,
    host: nonEmpty(env.HOST) ?? '0.0.0.0',
    sessionIdleTimeoutMs,
  };
}
