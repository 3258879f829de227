import 'dotenv/config';
import { resolveAppConfig } from '../shared/config/appConfig.js';
import { runMigrations } from '../shared/database/migrations.js';
import { createPostgresPool } from '../shared/database/postgres.client.js';
import { createCollectionStores } from '../shared/storage/storeFactory.js';
import { createAppContext } from './appContext.js';
import { createApp } from './createApp.js';

const bootstrap = async () => {
  const config = resolveAppConfig();

  const executor = config.storageDriver === 'postgres' ? createPostgresPool() : undefined;
  if (executor) {
    // Ensure the database is ready before serving requests
    await runMigrations(executor);
  }

  const stores = createCollectionStores(config, { executor });
  const app = createApp(createAppContext({ config, stores }));

  app.listen(config.port, config.host, () => {
    console.log(`[http] API server is running on ${config.host}:${config.port} (storage: ${config.storageDriver})`);
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
