// Tracing must start before express, mongoose and ioredis are loaded
import { initTracing, shutdownTracing } from './observability/tracing';
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createLedgerContainer } from './container';
import { eventBus } from './events/eventBus';
import { createServiceLogger } from './observability/logger';
import { registerCustomerEventHandlers, unregisterCustomerEventHandlers } from './services/customer';

const log = createServiceLogger('server');

const container = createLedgerContainer();
const app = createApp(container);

const startServer = async (): Promise<void> => {
  try {
    log.info(getEnvironmentInfo(), 'Starting ledger service');

    // Connect to database
    if (container.store.driver === 'mongo') {
      await connectDatabase();
    } else {
      log.warn('Using the in-memory ledger store; data is lost on restart');
    }

    // Connect to event bus
    await eventBus.connect();

    // Feed the customer projection from the lifecycle stream
    await registerCustomerEventHandlers(eventBus, container.customers, config.topics.CUSTOMER_EVENTS);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      log.info({ port: config.port, env: config.nodeEnv }, `Server running on port ${config.port}`);
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      log.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        log.info('HTTP server closed');

        const release = async (): Promise<void> => {
          await unregisterCustomerEventHandlers(eventBus, config.topics.CUSTOMER_EVENTS);
          await container.publisher.flush();
          await eventBus.disconnect();
          if (container.store.driver === 'mongo') {
            await disconnectDatabase();
          }
          await shutdownTracing();
        };

        release()
          .then(() => {
            log.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
