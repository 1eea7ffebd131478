import { createServer } from './app';
import { loadConfig } from './config';
import { loadEnv } from './utils/env';
import { logger } from './utils/logger';

async function bootstrap() {
  loadEnv();
  const config = loadConfig();
  logger.setLevel(config.LOG_LEVEL);
  const app = createServer({ config });

  app.listen(config.PORT, () => {
    logger.info(`Link inspector listening on port ${config.PORT}`);
  });
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});
