import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig, type AppConfig } from '../src/config.js';
import { createLogger, type Logger } from '../src/logger.js';
import { initServices, type ServiceOverrides, type Services } from '../src/services.js';

export const T0 = '2026-03-01T08:00:00.000Z';

export function makeDataDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'wake-tools-'));
}

export function removeDataDir(dataDir: string): Promise<void> {
  return fsp.rm(dataDir, { recursive: true, force: true });
}

export function testConfig(dataDir: string, env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ DATA_DIR: dataDir, LOG_LEVEL: 'silent', ...env });
}

export function silentLogger(): Logger {
  return createLogger('silent');
}

/** A clock that returns the same instant until moved with `set`. */
export function manualClock(start = T0) {
  let now = start;
  return {
    now: () => now,
    set(value: string) {
      now = value;
    },
  };
}

export function initTestServices(dataDir: string, overrides: ServiceOverrides = {}, env: NodeJS.ProcessEnv = {}): Services {
  return initServices(testConfig(dataDir, env), { logger: silentLogger(), ...overrides });
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fsp.readFile(filePath, 'utf8'));
}
