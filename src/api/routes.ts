/**
 * API routes for the energy usage collector.
 *
 * - /api/health - Health check
 * - /api/version - App version
 * - /api/status - Collector and per-account state
 */
import { Hono } from "hono";
import type { CollectorState } from "../collector/index.js";
import { config, getCollectorSettings } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export type RouteDeps = Readonly<{
  getCollectorState: () => CollectorState;
}>;

export function createRoutes(deps: RouteDeps): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const settings = getCollectorSettings();

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
      config: {
        sinkType: config.SINK_TYPE,
        updateIntervalSecs: settings.updateIntervalSecs,
        detailedDataEnabled: settings.detailedDataEnabled,
        historyDays: settings.historyDays,
      },
    });
  });

  routes.get("/api/version", (c) => {
    return c.json({ version: APP_VERSION });
  });

  // ===========================================================================
  // Collector State
  // ===========================================================================

  routes.get("/api/status", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "GET /api/status");

    const state = deps.getCollectorState();

    return c.json({
      running: state.isRunning,
      cycle: state.cycle,
      lastCycleAt: state.lastCycleAt,
      detailedStart: state.detailedStart,
      accounts: state.accounts,
      requestId,
    });
  });

  return routes;
}
