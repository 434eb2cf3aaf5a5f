import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger, errorMessage } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp(config);

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: errorMessage(error) }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(
      { host: config.host, port: config.port, gateway: config.gatewayBackend, store: config.storeBackend },
      "mobile money payment API listening",
    );
  })
  .catch((error: unknown) => {
    logger.error({ err: errorMessage(error) }, "failed to start");
    process.exit(1);
  });
