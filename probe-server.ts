import { config } from './lib/config';
import { logger } from './lib/logger';
import { families } from './lib/probes';
import { createApp } from './lib/server';

const app = createApp(families);

app.listen(config.port, () => {
  logger.info({
    port: config.port,
    network: config.network,
    dialTimeoutMs: config.dialTimeoutMs,
    families: Object.keys(families),
  }, 'Probe server started');
});
