/**
 * Application entry point for the shopping cart service
 * Initializes storage and the gRPC server; telemetry is preloaded with --require
 */

import { shutdownTelemetry } from './telemetry/instrumentation';
import { config } from './utils/config';
import { logger } from './utils/logger';
import { MemoryStore } from './storage/memory-store';
import { CartServer } from './server';

async function main(): Promise<void> {
  try {
    logger.info('Starting shopping cart service', {
      serviceName: config.serviceName,
      version: config.serviceVersion,
      host: config.host,
      port: config.port,
      logLevel: config.logLevel,
      otelEndpoint: config.otelExporterEndpoint || 'not configured',
    });

    const store = new MemoryStore();
    const server = new CartServer(store);
    await server.start();

    logger.info('Shopping cart service is ready to accept requests');

    setupShutdownHandlers(server);
  } catch (error) {
    logger.error('Failed to start shopping cart service', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown on process signals
 */
function setupShutdownHandlers(server: CartServer): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }

    isShuttingDown = true;
    logger.info('Received shutdown signal', { signal });

    try {
      await server.shutdown();

      // Flush pending telemetry
      await shutdownTelemetry();

      logger.info('Shopping cart service shut down successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  // Kubernetes sends SIGTERM for graceful shutdown
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack,
    });
    server.forceShutdown();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    server.forceShutdown();
    process.exit(1);
  });
}

void main();
