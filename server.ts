import { createApp } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { logger } from "./lib/logger.js";

const { port } = loadConfig();

createApp().listen(port, () => {
  logger.info(`[server] BOM API running on port ${port}`);
});
