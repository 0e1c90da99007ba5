import { createApp } from './app';
import { createApiState } from './state';
import { loadConfig } from '../config';
import { SystemClock } from '../distributor/clock';
import { formatTokens } from '../fixedPoint';
import { createInMemoryStore } from '../persistence/inMemoryStores';
import { createSqliteStores } from '../persistence/sqlite';
import { IDistributorStore } from '../persistence/interfaces';

function main(): void {
  const config = loadConfig();

  let store: IDistributorStore;
  let closeStore: () => void = () => undefined;

  if (config.storeBackend === 'sqlite') {
    const sqlite = createSqliteStores(config.dbPath);
    store = sqlite.distributor;
    closeStore = () => sqlite.db.close();
  } else {
    store = createInMemoryStore();
    console.log('Using in-memory store (data will not persist)');
  }

  const state = createApiState(config, store, new SystemClock());
  const pool = state.distributor.getPool();
  console.log(
    `Distributor ready: totalStaked=${formatTokens(pool.totalStaked)}, ` +
    `rewardRate=${pool.rewardRate}/s, periodFinish=${pool.periodFinish}, duration=${pool.duration}s`
  );

  const app = createApp(state);

  const server = app.listen(config.port, () => {
    console.log(`Reward distributor API running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend}`);
    console.log(`Admin key: ${process.env.ADMIN_KEY ? '[SET]' : 'test-admin-key (default)'}`);
    console.log(`Allocation budget: ${formatTokens(config.allocationBudget)}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => {
      closeStore();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  console.error('Startup failed:', err);
  process.exit(1);
}
