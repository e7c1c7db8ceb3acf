import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    log.error(errorMessage(error));
    process.exit(1);
  }
}

const config = readConfig();
const { port, host, repoName, jsonPath } = config;

createApp(config).listen(port, host, () => {
  log.info(`Listening on http://${host}:${port}`);
  log.info(`Publishing to ${repoName}, post index ${jsonPath}`);
});
