import { systemClock } from 'enrollment-engine';
import { loadConfig, ConfigError } from './config.js';
import type { AppConfig } from './config.js';
import { createStore } from './store.js';
import { Catalog } from './catalog.js';
import { buildServer } from './api/server.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const store = createStore(config.databaseUrl);
await store.initializeSchema();
const catalog = await Catalog.load(store, systemClock);

const app = buildServer(catalog, {
  policy: config.enrollment,
  cleanupDaysOld: config.cleanupDaysOld,
  logger: { level: config.logLevel },
});

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await store.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await store.close();
});
