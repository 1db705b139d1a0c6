import { Response, NextFunction } from 'express';

import { holderIdOf, MemberRequest } from '../../auth';
import { AccountHolderUpdate } from '../../types/identity';

import { AccountHolderService } from './account-holder.service';

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

export class AccountHolderController {
  constructor(private readonly accountHolderService: AccountHolderService) {}

  /**
   * GET /account-holders/me
   */
  async getMe(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const accountHolder = await this.accountHolderService.getProfile(holderIdOf(req));

      res.status(200).json({
        success: true,
        data: { accountHolder },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /account-holders/me
   */
  async updateMe(req: MemberRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const update: AccountHolderUpdate = {
        firstName: optionalString(req.body.firstName),
        lastName: optionalString(req.body.lastName),
      };
      if (req.body.phone === null) {
        update.phone = null;
      } else if (typeof req.body.phone === 'string') {
        update.phone = req.body.phone;
      }

      const accountHolder = await this.accountHolderService.updateProfile(holderIdOf(req), update);

      res.status(200).json({
        success: true,
        data: { accountHolder },
      });
    } catch (error) {
      next(error);
    }
  }
}
