import { Router, Request, Response } from 'express';
import { ApiState } from '../state';
import { sendError } from '../http';
import { PoolResponse, ParticipantResponse, participantToJson, poolToJson } from '../types';

/**
 * Create router for read-only pool endpoints
 */
export function createPoolRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /pool
   * Accumulator, reward period and authority
   */
  router.get('/', (_req: Request, res: Response) => {
    try {
      const authority = state.distributor.getAuthority();
      const response: PoolResponse = {
        success: true,
        pool: poolToJson(state.distributor.getPool()),
        owner: authority.owner,
        rewardDistribution: authority.rewardDistribution,
      };
      res.status(200).json(response);
    } catch (error) {
      sendError(res, error, 'to read pool');
    }
  });

  /**
   * GET /pool/participants
   * All participants ever seen (zero balances included)
   */
  router.get('/participants', (_req: Request, res: Response) => {
    try {
      const participants = state.distributor.listParticipants().map(participantToJson);
      res.status(200).json({ success: true, participants });
    } catch (error) {
      sendError(res, error, 'to list participants');
    }
  });

  /**
   * GET /pool/participants/:account
   * Stake, checkpoint and current earned() for one account
   */
  router.get('/participants/:account', (req: Request, res: Response) => {
    try {
      const response: ParticipantResponse = {
        success: true,
        participant: participantToJson(state.distributor.getParticipant(req.params.account)),
      };
      res.status(200).json(response);
    } catch (error) {
      sendError(res, error, 'to read participant');
    }
  });

  return router;
}
