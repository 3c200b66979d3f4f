import { createApp } from './app';
import { loadServerConfig } from './config';
import { createLogger } from './logger';

const config = loadServerConfig();
const logger = createLogger(config.logLevel);
const app = createApp(config, { logger });

app.listen(config.port, () => {
  logger.info('server_listening', {
    port: config.port,
    transcript_provider: config.transcriptProvider,
    transcript_timeout_ms: config.transcriptTimeoutMs,
  });
});
