import { loadConfig } from './config.js';
import { logger } from './log.js';
import { sleep } from './overpass.js';
import { createServer } from './server.js';

const config = loadConfig();

const server = createServer({ config, log: logger, fetch, sleep });

server.listen(config.port, () => {
  logger.info('Server started', { port: config.port, filterMode: config.filterMode });
});

export default server;
