import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { LedgerContainer } from './container';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createHealthRoutes } from './routes/health';
import { AccountController, createAccountRoutes, createCustomerAccountRoutes } from './services/account';
import { MovementController, createMovementRoutes } from './services/movement';
import { StatementController, createStatementRoutes } from './services/statement';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (container: LedgerContainer): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(config.isProduction ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  const accountController = new AccountController(container.accountService, container.movementService);
  const movementController = new MovementController(container.movementService);
  const statementController = new StatementController(container.statementService);

  // Routes
  app.use('/health', createHealthRoutes(() => container.health()));
  app.use('/accounts', createAccountRoutes(accountController));
  app.use('/customers', createCustomerAccountRoutes(accountController));
  app.use('/movements', createMovementRoutes(movementController));
  app.use('/reports', createStatementRoutes(statementController));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Ledger Service',
      version: '1.0.0',
      description: 'Account ledger with idempotent movements and customer event projection',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
