import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { normalizeLogLevel } from '../src/logger.js';

describe('loadConfig', () => {
  it('places every document under /data by default', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      statePath: '/data/state.json',
      backlogPath: '/data/backlog.json',
      accomplishmentsPath: '/data/accomplishments.json',
      logLevel: 'info',
      notificationWebhook: null,
      notificationTimeoutMs: 10_000,
      port: 8000,
      host: '0.0.0.0',
      sessionIdleTimeoutMs: 21_600_000,
    });
  });

  it('derives document paths from DATA_DIR', () => {
    const config = loadConfig({ DATA_DIR: '/srv/agent' });
    expect(config.statePath).toBe('/srv/agent/state.json');
    expect(config.backlogPath).toBe('/srv/agent/backlog.json');
    expect(config.accomplishmentsPath).toBe('/srv/agent/accomplishments.json');
  });

  it('lets explicit paths override DATA_DIR', () => {
    const config = loadConfig({ DATA_DIR: '/srv/agent', BACKLOG_PATH: '/tmp/tasks.json' });
    expect(config.backlogPath).toBe('/tmp/tasks.json');
    expect(config.statePath).toBe('/srv/agent/state.json');
  });

  it('treats a blank webhook as unset', () => {
    expect(loadConfig({ NOTIFICATION_WEBHOOK: '   ' }).notificationWebhook).toBeNull();
    expect(loadConfig({ NOTIFICATION_WEBHOOK: 'http://hooks.test/x' }).notificationWebhook).toBe('http://hooks.test/x');
  });

  it('clamps the webhook timeout', () => {
    expect(loadConfig({ NOTIFICATION_TIMEOUT_MS: '5' }).notificationTimeoutMs).toBe(100);
    expect(loadConfig({ NOTIFICATION_TIMEOUT_MS: '999999' }).notificationTimeoutMs).toBe(60_000);
    expect(loadConfig({ NOTIFICATION_TIMEOUT_MS: 'soon' }).notificationTimeoutMs).toBe(10_000);
  });

  it('falls back to port 8000 for an invalid PORT', () => {
    expect(loadConfig({ PORT: '9100' }).port).toBe(9100);
    expect(loadConfig({ PORT: 'http' }).port).toBe(8000);
    expect(loadConfig({ PORT: '70000' }).port).toBe(8000);
  });

  it('disables session eviction for a zero idle timeout', () => {
    expect(loadConfig({ SESSION_IDLE_TIMEOUT_MS: '0' }).sessionIdleTimeoutMs).toBe(0);
    expect(loadConfig({ SESSION_IDLE_TIMEOUT_MS: '10' }).sessionIdleTimeoutMs).toBe(60_000);
  });
});

describe('normalizeLogLevel', () => {
  it('accepts pino levels in any case', () => {
    expect(normalizeLogLevel('DEBUG')).toBe('debug');
    expect(normalizeLogLevel(' error ')).toBe('error');
  });

  it('maps warning and critical onto pino levels', () => {
    expect(normalizeLogLevel('WARNING')).toBe('warn');
    expect(normalizeLogLevel('critical')).toBe('fatal');
  });

  it('falls back for unknown or missing levels', () => {
    expect(normalizeLogLevel('loud')).toBe('info');
    expect(normalizeLogLevel(undefined, 'warn')).toBe('warn');
  });
});
