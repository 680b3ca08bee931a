/**
 * Engine Worker - Redis consumer entry point.
 *
 * Consumes investigation tasks from the `netinvest:tasks` queue, runs them
 * through one long-lived agent, streams log lines over Redis Pub/Sub and
 * publishes each result. See src/worker/tasks.ts for the task protocol.
 *
 * Prerequisites:
 *   - Redis reachable at REDIS_HOST:REDIS_PORT
 *   - ANTHROPIC_API_KEY set in .env
 *   - MCP server with the device tools running at MCP_SERVER_URL
 *
 * Usage:
 *   npm run worker          # Build + run
 *   npm run worker:dev      # Run directly with tsx
 */

import 'dotenv/config';
import { Redis } from 'ioredis';
import { NetworkInvestigationAgent } from './agent/index.js';
import type { LogEntry } from './agent/core/types.js';
import { startTracing, shutdownTracing } from './agent/utils/instrumentation.js';
import { loadAgentConfig, loadRedisConfig, type RedisConfig } from './config/index.js';
import { Logger, combineSinks, createJsonlSink } from './utils/logger.js';
import { TASK_QUEUE, logChannel, parseTaskMessage, processTask } from './worker/tasks.js';

const logger = new Logger('worker');

function createRedisClient(name: string, config: RedisConfig): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    maxRetriesPerRequest: null,
  });
  client.on('error', (err: Error) => logger.error(`[redis:${name}] ${err.message}`));
  client.on('connect', () => logger.info(`[redis:${name}] connected`));
  return client;
}

async function main(): Promise<void> {
  const config = loadAgentConfig();
  const redisConfig = loadRedisConfig();
  startTracing();

  // BRPOP blocks its connection, so it gets its own client
  const redis = createRedisClient('worker', redisConfig);
  const blockingRedis = createRedisClient('blocking', redisConfig);

  let currentLogChannel: string | null = null;
  const relay = (entry: LogEntry): void => {
    if (!currentLogChannel) return;
    const line = `[${entry.level}][${entry.phase}] ${entry.message}`;
    redis.publish(currentLogChannel, line).catch((err: unknown) => {
      console.error(`[worker] log relay failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  };

  const agent = new NetworkInvestigationAgent(config, {
    onLog: combineSinks(relay, config.logFile ? createJsonlSink(config.logFile) : undefined),
  });
  await agent.initialize();

  logger.info(`Listening on queue: ${TASK_QUEUE}`);

  // Aborting this controller cancels the running session on shutdown
  const running = new AbortController();
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    running.abort();
    await agent.shutdown();
    await shutdownTracing();
    blockingRedis.disconnect();
    redis.disconnect();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  while (!shuttingDown) {
    const item = await blockingRedis.brpop(TASK_QUEUE, 0);
    if (!item) continue;

    const [, payload] = item;
    const message = parseTaskMessage(payload);
    if (!message) {
      logger.error(`Failed to parse task payload: ${payload}`);
      continue;
    }

    currentLogChannel = logChannel(message.task_id);
    try {
      await processTask(redis, message, (query, options) => agent.investigate(query, options), {
        signal: running.signal,
        logger,
      });
    } finally {
      currentLogChannel = null;
    }
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
