import express, { Express, Request, Response, NextFunction } from 'express';
import { ApiState } from './state';
import { createPoolRouter } from './routes/pool';
import { createEventsRouter } from './routes/events';
import { createRewardsRouter } from './routes/rewards';
import { createAdminRouter } from './routes/admin';
import { ErrorCodes } from '../errors';

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const pool = state.distributor.getPool();
    res.json({
      status: 'ok',
      store: state.storeBackend,
      totalStaked: pool.totalStaked.toString(),
      rewardRate: pool.rewardRate.toString(),
      periodFinish: pool.periodFinish,
      periodActive: pool.now < pool.periodFinish,
    });
  });

  // Mount routes
  app.use('/pool', createPoolRouter(state));
  app.use('/events', createEventsRouter(state));
  app.use('/rewards', createRewardsRouter(state));
  app.use('/admin', createAdminRouter(state));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
