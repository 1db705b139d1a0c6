import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';

import { StatementService } from './statement.service';

const intOf = (value: unknown): number | undefined => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value !== '') return Number(value);
  return undefined;
};

export class StatementController {
  constructor(private readonly statementService: StatementService) {}

  /**
   * GET /accounts/:accountId/statements?year=&month=
   */
  async get(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const statement = await this.statementService.getStatement(
        holderIdOf(req),
        req.params.accountId,
        intOf(req.query.year),
        intOf(req.query.month)
      );

      res.status(200).json({
        success: true,
        data: { statement },
      });
    } catch (error) {
      next(error);
    }
  }
}
