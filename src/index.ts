#!/usr/bin/env node
/**
 * Main Entry Point - Interactive CLI for the network investigation agent.
 *
 * Supports:
 * 1. **Investigations**: `investigate <request>` or the request typed directly
 * 2. **Knowledge**: `plans`, `devices`, `learnings`
 * 3. **Cancellation**: Ctrl+C while an investigation runs cancels it
 */

import 'dotenv/config';
import * as readline from 'readline';
import { NetworkInvestigationAgent } from './agent/index.js';
import { startTracing, shutdownTracing } from './agent/utils/instrumentation.js';
import { HELP_TEXT, formatDevices, formatLearnings, formatPlans, parseCommand } from './commands.js';
import { loadAgentConfig } from './config/index.js';
import { createJsonlSink } from './utils/logger.js';

function displayBanner(): void {
  console.log('');
  console.log('  Network Investigation Agent');
  console.log('  Plans, fans out across devices, checks the objective, retries what is missing.');
  console.log('');
  console.log('─'.repeat(65));
  console.log(HELP_TEXT);
  console.log('─'.repeat(65));
}

function separator(): void {
  console.log('\n' + '─'.repeat(65) + '\n');
}

async function main(): Promise<void> {
  const config = loadAgentConfig();
  startTracing();

  const agent = new NetworkInvestigationAgent(config, {
    onLog: config.logFile ? createJsonlSink(config.logFile) : undefined,
  });
  await agent.initialize();

  displayBanner();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let running: AbortController | null = null;
  rl.on('SIGINT', () => {
    if (running) {
      console.log('\n  Cancelling investigation...');
      running.abort();
    } else {
      rl.close();
    }
  });

  let closing = false;
  const shutdown = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    console.log('\n  Shutting down...');
    await agent.shutdown();
    await shutdownTracing();
    rl.close();
    process.exit(0);
  };

  const handle = async (input: string): Promise<boolean> => {
    const command = parseCommand(input);
    switch (command.kind) {
      case 'empty':
        return true;
      case 'exit':
        await shutdown();
        return false;
      case 'help':
        console.log(HELP_TEXT);
        return true;
      case 'usage':
        console.log(`\n  ${command.message}\n`);
        return true;
      case 'plans':
        console.log('\n' + formatPlans(agent.listPlans()) + '\n');
        return true;
      case 'devices':
        console.log('\n' + formatDevices(await agent.listDevices()) + '\n');
        return true;
      case 'learnings':
        console.log('\n' + formatLearnings(await agent.recallLearnings()) + '\n');
        return true;
      case 'investigate': {
        running = new AbortController();
        try {
          const session = await agent.investigate(command.query, { signal: running.signal });
          separator();
          console.log(session.summary ?? '');
          separator();
        } finally {
          running = null;
        }
        return true;
      }
    }
  };

  const prompt = (): void => {
    rl.question('\n> ', (input: string) => {
      handle(input)
        .catch((error: unknown) => {
          const errorMessage = error instanceof Error ? error.message : String(error);
          console.error(`\n  Error: ${errorMessage}\n`);
          return true;
        })
        .then((keepGoing) => {
          if (keepGoing) prompt();
        })
        .catch((error: unknown) => {
          console.error('Fatal error:', error);
          process.exit(1);
        });
    });
  };

  rl.on('close', () => {
    if (!running) {
      shutdown().catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    }
  });

  prompt();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
