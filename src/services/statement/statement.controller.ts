import { Request, Response, NextFunction } from 'express';

import { StatementService } from './statement.service';

export class StatementController {
  constructor(private readonly statements: StatementService) {}

  /**
   * Account statement for a customer over whole UTC days
   * GET /reports/statement?customerId=&startDate=&endDate=
   */
  async getStatement(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { customerId, startDate, endDate } = req.query;
      const report = await this.statements.generateStatement(String(customerId), String(startDate), String(endDate));

      res.status(200).json({
        success: true,
        data: report,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Counts, totals and amount statistics over whole UTC days
   * GET /reports/movements-summary?startDate=&endDate=&accountNumber=&customerId=
   */
  async getMovementsSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { accountNumber, customerId, startDate, endDate } = req.query;
      const summary = await this.statements.summarizeMovements(
        {
          accountNumber: accountNumber !== undefined ? Number(accountNumber) : undefined,
          customerId: typeof customerId === 'string' && customerId.length > 0 ? customerId : undefined,
        },
        String(startDate),
        String(endDate)
      );

      res.status(200).json({
        success: true,
        data: summary,
      });
    } catch (error) {
      next(error);
    }
  }
}
