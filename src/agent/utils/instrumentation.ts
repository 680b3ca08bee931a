/**
 * Langfuse tracing through OpenTelemetry.
 *
 * Entry points call `startTracing()` before building the agent so every
 * `startActiveObservation` span of a session is exported. Without
 * LANGFUSE_SECRET_KEY and LANGFUSE_PUBLIC_KEY the spans go to the no-op
 * tracer. LANGFUSE_BASE_URL defaults to https://cloud.langfuse.com.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { Logger } from '../../utils/logger.js';

let sdk: NodeSDK | null = null;

export function isTracingConfigured(env: Record<string, string | undefined> = process.env): boolean {
  return !!env.LANGFUSE_SECRET_KEY && !!env.LANGFUSE_PUBLIC_KEY;
}

/**
 * Starts the OpenTelemetry SDK with the Langfuse span processor. Idempotent.
 * Returns whether tracing is active.
 */
export function startTracing(logger: Logger = new Logger('Langfuse')): boolean {
  if (sdk) return true;
  if (!isTracingConfigured()) {
    logger.info('Tracing disabled (missing LANGFUSE_SECRET_KEY or LANGFUSE_PUBLIC_KEY)');
    return false;
  }
  sdk = new NodeSDK({ spanProcessors: [new LangfuseSpanProcessor()] });
  sdk.start();
  logger.info('Tracing enabled');
  return true;
}

/**
 * Flushes pending spans and stops the SDK. Call before process exit.
 */
export async function shutdownTracing(logger: Logger = new Logger('Langfuse')): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
  sdk = null;
  logger.info('Tracing shut down');
}
