import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { buildServer } from './api/server.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = readConfig();
const app = buildServer(config);

try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`query-api v${config.version} ready`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
});
