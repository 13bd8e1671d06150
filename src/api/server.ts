import { createApp } from './app';
import { loadServerConfig } from './config';
import { restoreApiState } from './restore';
import { persistState } from './state';
import { BlockScheduler } from './scheduler';
import { createInMemoryStores } from '../persistence/inMemoryStores';
import { createSqliteStores, SqliteStores } from '../persistence/sqlite';
import { IEventStore, ILedgerStore } from '../persistence/interfaces';

async function main() {
  const config = loadServerConfig();

  let sqlite: SqliteStores | undefined;
  let stores: { event: IEventStore; ledger: ILedgerStore };
  if (config.storeBackend === 'sqlite') {
    sqlite = createSqliteStores(config.dbPath);
    stores = { event: sqlite.event, ledger: sqlite.ledger };
  } else {
    stores = createInMemoryStores();
    console.log('Using in-memory stores (data will not persist)');
  }

  const { state, restored } = await restoreApiState(stores, config);
  // Collaborator links on a fresh ledger
  await persistState(state);

  const accumulator = state.ledger.accumulator();
  console.log(
    restored
      ? `Ledger restored: total rewards ${accumulator.totalRewards}, version ${accumulator.version}, ` +
        `${state.ledger.accountIds().length} checkpoints, ${state.principals.stakerCount} stakers`
      : 'Ledger initialised'
  );

  const app = createApp(state);

  const scheduler = new BlockScheduler(state.clock, {
    blockCron: config.blockCron,
    timezone: config.blockTimezone,
  });
  scheduler.start();

  const server = app.listen(config.port, () => {
    console.log(`Reward ledger API server running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend === 'sqlite' ? `sqlite (${config.dbPath})` : 'in-memory'}`);
    console.log(`Admin key: ${process.env.ADMIN_KEY ? '[SET]' : 'test-admin-key (default)'}`);
    console.log(`Block clock: starting at ${state.clock.currentBlock()}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    scheduler.stop();
    server.close(() => {
      sqlite?.db.close();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
