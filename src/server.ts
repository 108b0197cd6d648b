import { createApp } from './app.js';
import { createCollector } from './collector.js';
import { config } from './config.js';
import { logger } from './utils/logger.js';

const app = createApp(createCollector());

app.listen(config.port, () => {
  logger.info(`Server running at http://localhost:${config.port}`);
});
