import 'dotenv/config';
import { createChatSession } from '../assistant';
import { loadConfig } from '../config/env';
import { logger } from '../logger';
import { createApp } from './app';

function main() {
  const config = loadConfig();
  const session = createChatSession(config);
  const app = createApp(session);

  app.listen(config.port, () => {
    logger.info(`Travel Booking Assistant on http://localhost:${config.port}`);
  });
}

try {
  main();
} catch (error) {
  logger.fatal({ err: error }, 'startup failed');
  process.exit(1);
}
