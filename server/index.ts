import "dotenv/config";

import { createContainer } from "./container";
import { createHttpApp } from "./http";
import { loadConfig } from "./lib/external/env";

const config = loadConfig();
const container = createContainer(config);
const app = createHttpApp({ service: container.service });

const server = app.listen(config.http.port, () => {
  console.info(`[http] listening on port ${config.http.port}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  console.info(`[http] ${signal} received, shutting down`);
  server.close((error) => {
    container.close();
    if (error) {
      console.error("[http] server close failed", error);
      process.exitCode = 1;
    }
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
