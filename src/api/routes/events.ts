import { Router, Request, Response } from 'express';
import { ApiState } from '../state';
import { sendError } from '../http';
import { EventsResponse } from '../types';
import { DistributorError, ErrorCodes } from '../../errors';
import { isDistributorEventType } from '../../persistence/eventTypes';
import { EventFilter } from '../../persistence/interfaces';
import { normalizeAccount } from '../../types';

/**
 * Create router for the event log
 */
export function createEventsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /events
   * Query params: type, account, limit (all optional)
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      const filter: EventFilter = {};
      const { type, account, limit } = req.query;

      if (typeof type === 'string') {
        if (!isDistributorEventType(type)) {
          throw new DistributorError(ErrorCodes.INVALID_QUERY, `Unknown event type: ${type}`);
        }
        filter.eventType = type;
      }
      if (typeof account === 'string') {
        filter.account = normalizeAccount(account);
      }
      if (typeof limit === 'string') {
        const parsed = /^\d+$/.test(limit) ? parseInt(limit, 10) : NaN;
        if (!Number.isSafeInteger(parsed) || parsed <= 0) {
          throw new DistributorError(ErrorCodes.INVALID_QUERY, `Invalid limit: ${limit}`);
        }
        filter.limit = parsed;
      }

      const response: EventsResponse = {
        success: true,
        events: state.distributor.getEvents(filter),
      };
      res.status(200).json(response);
    } catch (error) {
      sendError(res, error, 'to query events');
    }
  });

  return router;
}
