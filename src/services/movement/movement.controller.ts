import { Request, Response, NextFunction } from 'express';

import { readIdempotencyKey } from '../../middlewares/idempotency';
import { MovementKind } from '../../types/ledger';
import { toMinorUnits } from '../../utils/money';
import { toMovementView } from '../../utils/presenters';

import { DEFAULT_PAGE_SIZE, MovementService } from './movement.service';

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const optionalKind = (value: unknown): MovementKind | undefined =>
  Object.values(MovementKind).find((kind) => kind === value);

export class MovementController {
  constructor(private readonly movements: MovementService) {}

  /**
   * Apply a credit or debit
   * POST /movements
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { accountNumber, kind, amount, transactionId, description, reference } = req.body;

      const movement = await this.movements.applyMovement({
        accountNumber: Number(accountNumber),
        kind: kind === MovementKind.DEBIT ? MovementKind.DEBIT : MovementKind.CREDIT,
        amount: toMinorUnits(amount),
        transactionId: String(transactionId),
        idempotencyKey: readIdempotencyKey(req),
        description: optionalString(description),
        reference: optionalString(reference),
      });

      // Replays answer exactly like the first success
      res.status(201).json({
        success: true,
        data: { movement: toMovementView(movement) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /movements/:movementId
   */
  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const movement = await this.movements.getMovement(req.params.movementId);

      res.status(200).json({
        success: true,
        data: { movement: toMovementView(movement) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Reverse an earlier credit or debit
   * POST /movements/:movementId/reversal
   */
  async reverse(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { transactionId, description } = req.body;

      const movement = await this.movements.reverseMovement({
        movementId: req.params.movementId,
        transactionId: String(transactionId),
        idempotencyKey: readIdempotencyKey(req),
        description: optionalString(description),
      });

      res.status(201).json({
        success: true,
        data: { movement: toMovementView(movement) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Paged movement search
   * GET /movements?accountNumber=&customerId=&kind=&startDate=&endDate=&page=&size=
   */
  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { accountNumber, customerId, kind, startDate, endDate, page, size } = req.query;

      const result = await this.movements.searchMovements({
        accountNumber: accountNumber !== undefined ? Number(accountNumber) : undefined,
        customerId: optionalString(customerId),
        kind: optionalKind(kind),
        startDate: optionalString(startDate),
        endDate: optionalString(endDate),
        page: page !== undefined ? Number(page) : 0,
        size: size !== undefined ? Number(size) : DEFAULT_PAGE_SIZE,
      });

      res.status(200).json({
        success: true,
        data: {
          content: result.content.map(toMovementView),
          page: result.page,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
