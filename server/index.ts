import { createApp } from "./app";
import { loadConfig } from "./config";
import { createStorage } from "./storage";
import { log } from "./utils";

function main() {
  const config = loadConfig();
  const storage = createStorage(config.countriesFile);

  const app = createApp({
    storage,
    apiVersion: config.apiVersion,
    logRequests: config.logRequests,
  });

  const server = app.listen(config.port, config.host, () => {
    log(`World Countries API serving on http://${config.host}:${config.port}`);
    log(`OpenAPI document at http://${config.host}:${config.port}/api-docs/openapi.json`);
    log(`API documentation at http://${config.host}:${config.port}/swagger-ui/`);
  });

  server.on("error", (error) => {
    console.error("Server error:", error);
    process.exit(1);
  });
}

try {
  main();
} catch (error) {
  console.error("Failed to start server:", error);
  process.exit(1);
}
