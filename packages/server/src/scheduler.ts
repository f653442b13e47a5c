// =============================================================================
// @feedsieve/server: Cycle timer for feed updates
// =============================================================================
// node-cron ticks every CRON_TICK. On each tick the update_interval setting
// is re-read and a cycle starts once that many seconds have passed since the
// previous cycle started. A tick that finds a cycle still running does
// nothing. CRON_ENABLED=false turns the timer off.
// =============================================================================

import cron from "node-cron";
import {
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  MIN_UPDATE_INTERVAL_SECONDS,
  errorMessage,
  parseIntSetting,
} from "@feedsieve/shared";
import type { AppDependencies } from "./server.js";

export interface SchedulerHandle {
  /** Evaluates the timer once, as a cron tick does. */
  tick(): Promise<void>;
  /** Stops ticking and aborts running updates, whoever started them. */
  stop(): void;
}

export interface SchedulerOptions {
  now?: () => number;
}

export function startScheduler(
  deps: Pick<AppDependencies, "config" | "logger" | "store" | "pipeline">,
  options: SchedulerOptions = {},
): SchedulerHandle {
  const { config, store, pipeline } = deps;
  const logger = deps.logger.child({ component: "scheduler" });
  const now = options.now ?? Date.now;

  if (!config.CRON_ENABLED) {
    logger.info("Update timer disabled (CRON_ENABLED=false)");
    return { tick: async () => {}, stop() {} };
  }

  // With UPDATE_ON_START off, the first cycle waits a full interval
  let lastStarted: number | null = config.UPDATE_ON_START ? null : now();
  let controller: AbortController | null = null;
  let stopped = false;

  async function intervalMs(): Promise<number> {
    try {
      const seconds =
        parseIntSetting(await store.getSetting("update_interval")) ??
        DEFAULT_UPDATE_INTERVAL_SECONDS;
      return Math.max(seconds, MIN_UPDATE_INTERVAL_SECONDS) * 1000;
    } catch (err) {
      logger.warn("Could not read update_interval, using default", {
        error: errorMessage(err),
      });
      return DEFAULT_UPDATE_INTERVAL_SECONDS * 1000;
    }
  }

  async function tick(): Promise<void> {
    if (stopped || pipeline.updater.running) return;

    const interval = await intervalMs();
    const startedAt = now();
    if (lastStarted !== null && startedAt - lastStarted < interval) return;
    lastStarted = startedAt;

    const cycle = new AbortController();
    controller = cycle;
    const start = performance.now();
    logger.info("Update cycle starting");
    try {
      const summary = await pipeline.updater.updateFeeds(cycle.signal);
      logger.info("Update cycle completed", {
        durationMs: Math.round(performance.now() - start),
        summary,
      });
    } catch (err) {
      logger.error("Update cycle failed", {
        durationMs: Math.round(performance.now() - start),
        error: errorMessage(err),
      });
    } finally {
      if (controller === cycle) controller = null;
    }
  }

  const task = cron.schedule(config.CRON_TICK, () => {
    tick().catch((err: unknown) => {
      logger.error("Update timer tick failed", { error: errorMessage(err) });
    });
  });

  logger.info("Update timer started", {
    tick: config.CRON_TICK,
    updateOnStart: config.UPDATE_ON_START,
  });

  return {
    tick,
    stop() {
      stopped = true;
      task.stop();
      controller?.abort();
      pipeline.updater.cancel();
      logger.info("Update timer stopped");
    },
  };
}
