/**
 * Shared HTTP connection pool
 * One undici Agent per process, created on first use and closed on shutdown.
 */

import { Agent } from 'undici';
import { logger } from '../logger/structured-logger.js';

let agent: Agent | null = null;

export function getHttpAgent(): Agent {
  if (!agent) {
    agent = new Agent({
      keepAliveTimeout: 10_000,
      connections: 32,
    });
    logger.debug({ event: 'http_agent_created' }, '[HTTP] Connection pool created');
  }
  return agent;
}

export async function closeHttpClient(): Promise<void> {
  if (!agent) return;
  const closing = agent;
  agent = null;
  await closing.close();
  logger.info({ event: 'http_agent_closed' }, '[HTTP] Connection pool closed');
}
