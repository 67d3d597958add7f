/**
 * Energy Usage Collector - Application Entry Point
 *
 * Loads the accounts, opens the sink, runs the poll loop and serves the
 * status API. Shuts down cleanly on SIGINT, SIGTERM and SIGHUP.
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { formatAccountsError, loadAccountsFile } from "./accounts/index.js";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import { createCollector } from "./collector/index.js";
import { config, getCollectorSettings, getInfluxConfig } from "./config.js";
import { loginEmporia } from "./emporia/index.js";
import { createLogger } from "./logger.js";
import { createSink, formatSinkError } from "./sink/index.js";

const log = createLogger("api");

const settings = getCollectorSettings();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    accountsFile: config.ACCOUNTS_FILE,
    sinkType: config.SINK_TYPE,
    ...settings,
  },
  "Configuration loaded",
);

// =============================================================================
// Accounts and Sink
// =============================================================================

const accountsResult = await loadAccountsFile(config.ACCOUNTS_FILE);
if (accountsResult.isErr()) {
  log.fatal(
    { errorType: accountsResult.error.type },
    formatAccountsError(accountsResult.error),
  );
  process.exit(1);
}

const sinkResult = createSink();
if (sinkResult.isErr()) {
  log.fatal({ errorType: sinkResult.error.type }, formatSinkError(sinkResult.error));
  process.exit(1);
}
const sink = sinkResult.value;

if (getInfluxConfig()?.reset) {
  const resetResult = await sink.reset(new Date());
  if (resetResult.isErr()) {
    log.fatal(
      { errorType: resetResult.error.type },
      formatSinkError(resetResult.error),
    );
    await sink.close();
    process.exit(1);
  }
}

// =============================================================================
// Collector Loop
// =============================================================================

const collector = createCollector({
  accounts: accountsResult.value,
  login: loginEmporia,
  sink,
  settings,
});

const loop = collector.start().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log.error({ error: message }, "Collector loop crashed");
});

// =============================================================================
// HTTP Server
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", createRoutes({ getCollectorState: collector.getState }));

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  log.info(
    { port: info.port, appName: config.APP_NAME },
    `${config.APP_NAME} listening on port ${info.port}`,
  );
});

// =============================================================================
// Graceful Shutdown
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  collector.stop();
  await loop;
  await sink.close();

  server.close((error) => {
    if (error) {
      log.error({ error: error.message }, "HTTP server close failed");
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
