import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';

import { CardService } from './card.service';

export class CardController {
  constructor(private readonly cardService: CardService) {}

  /**
   * POST /accounts/:accountId/card
   */
  async issue(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const card = await this.cardService.issue(holderIdOf(req), req.params.accountId);

      res.status(201).json({
        success: true,
        data: { card },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /accounts/:accountId/card
   */
  async get(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const card = await this.cardService.get(holderIdOf(req), req.params.accountId);

      res.status(200).json({
        success: true,
        data: { card },
      });
    } catch (error) {
      next(error);
    }
  }
}
