import { Router, Request, Response } from 'express';
import { requireAdminKey } from '../middleware/adminAuth';
import { ApiState } from '../state';
import { readAccount, readAmount, sendError } from '../http';
import {
  AccountRequest,
  AmountRequest,
  TransferHookRequest,
  participantToJson,
} from '../types';

/**
 * Create router for admin endpoints. Gated calls run as state.operatorAccount.
 */
export function createAdminRouter(state: ApiState): Router {
  const router = Router();

  // All admin routes require X-Admin-Key
  router.use(requireAdminKey(state.adminKey));

  /**
   * POST /admin/rewards/notify
   * Inject a reward for the next period. Body: { amount }
   */
  router.post('/rewards/notify', (req: Request, res: Response) => {
    const body = req.body as AmountRequest;

    try {
      const amount = readAmount(body.amount);
      const result = state.distributor.notifyRewardAmount(state.operatorAccount, amount);
      res.status(200).json({
        success: true,
        amount: result.amount.toString(),
        leftover: result.leftover.toString(),
        rewardRate: result.rewardRate.toString(),
        periodFinish: result.periodFinish,
      });
    } catch (error) {
      sendError(res, error, 'to notify reward');
    }
  });

  /**
   * POST /admin/reward-distribution
   * Owner only. Body: { account }
   */
  router.post('/reward-distribution', (req: Request, res: Response) => {
    const body = req.body as AccountRequest;

    try {
      const authority = state.distributor.setRewardDistribution(
        state.operatorAccount,
        readAccount(body.account)
      );
      res.status(200).json({ success: true, ...authority });
    } catch (error) {
      sendError(res, error, 'to set reward distribution');
    }
  });

  /**
   * POST /admin/ownership
   * Owner only. Body: { account }
   */
  router.post('/ownership', (req: Request, res: Response) => {
    const body = req.body as AccountRequest;

    try {
      const authority = state.distributor.transferOwnership(
        state.operatorAccount,
        readAccount(body.account)
      );
      res.status(200).json({ success: true, ...authority });
    } catch (error) {
      sendError(res, error, 'to transfer ownership');
    }
  });

  /**
   * POST /admin/hook/transfer
   * Hooked-token notification. Body: { from, to, amount }
   */
  router.post('/hook/transfer', (req: Request, res: Response) => {
    const body = req.body as TransferHookRequest;

    try {
      const outcome = state.distributor.onTransfer(
        readAccount(body.from, 'from'),
        readAccount(body.to, 'to'),
        readAmount(body.amount)
      );
      res.status(200).json({
        success: true,
        kind: outcome.kind,
        rewardPaid: outcome.rewardPaid.toString(),
      });
    } catch (error) {
      sendError(res, error, 'to apply transfer');
    }
  });

  /**
   * POST /admin/stake
   * Body: { account, amount }
   */
  router.post('/stake', (req: Request, res: Response) => {
    const body = req.body as AmountRequest;

    try {
      const participant = state.distributor.stake(readAccount(body.account), readAmount(body.amount));
      res.status(200).json({ success: true, participant: participantToJson(participant) });
    } catch (error) {
      sendError(res, error, 'to stake');
    }
  });

  /**
   * POST /admin/withdraw
   * Body: { account, amount }
   */
  router.post('/withdraw', (req: Request, res: Response) => {
    const body = req.body as AmountRequest;

    try {
      const participant = state.distributor.withdraw(readAccount(body.account), readAmount(body.amount));
      res.status(200).json({ success: true, participant: participantToJson(participant) });
    } catch (error) {
      sendError(res, error, 'to withdraw');
    }
  });

  /**
   * POST /admin/exit
   * Withdraw the whole stake and claim. Body: { account }
   */
  router.post('/exit', (req: Request, res: Response) => {
    const body = req.body as AccountRequest;

    try {
      const paid = state.distributor.exit(readAccount(body.account));
      res.status(200).json({ success: true, paid: paid.toString() });
    } catch (error) {
      sendError(res, error, 'to exit');
    }
  });

  return router;
}
