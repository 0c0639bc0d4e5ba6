import { loadConfig } from "./config.js";
import { startServer } from "./server.js";
import { createLogger } from "./utils/logger.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);

startServer({ dbPath: config.dbPath, port: config.port, host: config.host, logger }).catch((error) => {
  logger.error(error);
  process.exit(1);
});
