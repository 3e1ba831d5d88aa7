import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { MockAgent } from 'undici';
import { createLogger, type Logger } from '../../src/concerns/logger.js';
import { HttpClient } from '../../src/concerns/http-client.js';

export function silentLogger(): Logger {
  return createLogger({ level: 'silent', format: 'json' });
}

export async function createTempDir(prefix = 'dorkscan-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * HttpClient wired to an undici MockAgent with real network access disabled.
 * Register interceptors on `agent`, e.g.
 * `agent.get('https://example.com').intercept({ path: '/' }).reply(200, 'ok')`.
 */
export function createMockHttp(): { agent: MockAgent; http: HttpClient } {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return { agent, http: new HttpClient({ dispatcher: agent }) };
}
