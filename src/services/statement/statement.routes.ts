import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';

import { StatementController } from './statement.controller';
import { movementsSummaryValidation, statementQueryValidation } from './statement.validation';

export const createStatementRoutes = (controller: StatementController): Router => {
  const router = Router();

  // GET /reports/statement - Customer statement over a date range
  router.get('/statement', statementQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.getStatement(req, res, next)
  );

  // GET /reports/movements-summary - Movement statistics for an account or customer
  router.get(
    '/movements-summary',
    movementsSummaryValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getMovementsSummary(req, res, next)
  );

  return router;
};
