import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    app.log.info(`Risk scoring API listening on http://${config.host}:${config.port}`);
  })
  .catch((error: unknown) => {
    app.log.error({ err: error }, "Risk scoring API failed to start");
    process.exit(1);
  });
