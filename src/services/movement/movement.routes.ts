import { Router, Request, Response, NextFunction } from 'express';

import { validateIdempotencyKey } from '../../middlewares/idempotency';
import { validateRequest } from '../../middlewares/validateRequest';

import { MovementController } from './movement.controller';
import {
  createMovementValidation,
  movementIdValidation,
  reverseMovementValidation,
  searchMovementsValidation,
} from './movement.validation';

export const createMovementRoutes = (controller: MovementController): Router => {
  const router = Router();

  // POST /movements - Apply a credit or debit (X-Idempotency-Key optional)
  router.post('/', validateIdempotencyKey, createMovementValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.create(req, res, next)
  );

  // GET /movements - Paged search
  router.get('/', searchMovementsValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.search(req, res, next)
  );

  // GET /movements/:movementId - Get a movement
  router.get('/:movementId', movementIdValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    controller.get(req, res, next)
  );

  // POST /movements/:movementId/reversal - Reverse a movement
  router.post(
    '/:movementId/reversal',
    validateIdempotencyKey,
    reverseMovementValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.reverse(req, res, next)
  );

  return router;
};
