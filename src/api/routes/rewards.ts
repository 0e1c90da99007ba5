import { Router, Request, Response } from 'express';
import { ApiState } from '../state';
import { requireAdminKey } from '../middleware/adminAuth';
import { readAccount, sendError } from '../http';
import { AccountRequest } from '../types';
import { normalizeAccount } from '../../types';

/**
 * Create router for reward claims and allocation lookups
 */
export function createRewardsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /rewards/earned/:account
   * Reward claimable right now
   */
  router.get('/earned/:account', (req: Request, res: Response) => {
    try {
      const account = normalizeAccount(req.params.account);
      res.status(200).json({
        success: true,
        account,
        earned: state.distributor.earned(account).toString(),
      });
    } catch (error) {
      sendError(res, error, 'to compute earned');
    }
  });

  /**
   * GET /rewards/allocations/:account
   * What the allocation ledger holds for an account
   */
  router.get('/allocations/:account', (req: Request, res: Response) => {
    const account = normalizeAccount(req.params.account);
    const balance = state.allocation.balances(account);
    res.status(200).json({
      success: true,
      account,
      allocatedTokens: balance.allocatedTokens.toString(),
    });
  });

  /**
   * POST /rewards/claim
   * Pay out an account's earned reward through the allocation ledger.
   * Body: { account }
   */
  router.post('/claim', requireAdminKey(state.adminKey), (req: Request, res: Response) => {
    const body = req.body as AccountRequest;

    try {
      const account = normalizeAccount(readAccount(body.account));
      const paid = state.distributor.getReward(account);
      res.status(200).json({ success: true, account, paid: paid.toString() });
    } catch (error) {
      sendError(res, error, 'to claim reward');
    }
  });

  return router;
}
