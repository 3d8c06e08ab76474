/**
 * @potkeeper/node: Entry point.
 *
 * Loads config, builds the clients and the service, resumes transfers
 * left reserved, starts the scheduler and the HTTP server, and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import {
  FileCredentialProvider,
  HomeAssistantClient,
  MonzoClient,
  SpotifyClient,
  TrueLayerAccountSource,
} from "@potkeeper/clients";
import { JsonlEventStore } from "@potkeeper/event-store";
import { ConfigError, loadAppsConfig, loadConfig } from "./config.js";
import type { FrozenAppsConfig } from "./config.js";
import { createApp } from "./app.js";
import { PotkeeperService } from "./services/potkeeper-service.js";
import { Scheduler } from "./services/scheduler.js";

/** Home Assistant's default notify service */
const DEFAULT_NOTIFY_SERVICE = "notify";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let apps: FrozenAppsConfig;
  try {
    apps = loadAppsConfig(config.APPS_CONFIG_PATH);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      logger.fatal({ code: err.code }, err.message);
      process.exit(1);
    }
    throw err;
  }

  const credentials = new FileCredentialProvider({ dir: config.CREDENTIALS_DIR });
  const monzo = new MonzoClient({
    baseUrl: config.MONZO_API_URL,
    timeout: config.HTTP_TIMEOUT_MS,
    credentials,
    logger: logger.child({ client: "monzo" }),
  });
  const homeAssistant =
    config.HOME_ASSISTANT_TOKEN === undefined
      ? undefined
      : new HomeAssistantClient({
          baseUrl: config.HOME_ASSISTANT_URL,
          timeout: config.HTTP_TIMEOUT_MS,
          token: config.HOME_ASSISTANT_TOKEN,
          notifyService: apps.notifications?.notifyService ?? DEFAULT_NOTIFY_SERVICE,
          logger: logger.child({ client: "home-assistant" }),
        });
  if (homeAssistant === undefined) {
    logger.warn("HOME_ASSISTANT_TOKEN not set; balances are not published and notifications are logged only");
  }

  const trueLayer = new TrueLayerAccountSource({
    baseUrl: config.TRUELAYER_API_URL,
    timeout: config.HTTP_TIMEOUT_MS,
    credentials,
    logger: logger.child({ client: "truelayer" }),
  });

  const service = new PotkeeperService({
    apps,
    store: new JsonlEventStore({ filePath: config.LEDGER_PATH, logger }),
    accountSource: trueLayer,
    transferApi: monzo,
    pots: monzo,
    accountTransactions: monzo,
    cardTransactions: trueLayer,
    likedTracks:
      apps.savingsSweep === undefined || apps.savingsSweep.perLikedTrackMinorUnits === 0
        ? undefined
        : new SpotifyClient({
            baseUrl: config.SPOTIFY_API_URL,
            timeout: config.HTTP_TIMEOUT_MS,
            credentials,
            logger: logger.child({ client: "spotify" }),
          }),
    stateSink: homeAssistant,
    notifier: homeAssistant,
    logger,
  });

  await service.resumeReserved();

  const scheduler = new Scheduler({
    logger: logger.child({ component: "scheduler" }),
    deadlineMs: config.TASK_DEADLINE_MS,
    timeZone: apps.timeZone,
  });
  scheduler.every("poll-balances", config.POLL_INTERVAL_MS, () => service.pollAll());
  if (apps.creditCardPot !== undefined) {
    scheduler.dailyAt("credit-card-pot", apps.creditCardPot.runAt, async () => {
      const result = await service.runCreditCardPot();
      logger.info({ outcome: result.outcome }, "Credit card pot run finished");
    });
  }
  if (service.savingsSweep !== undefined) {
    scheduler.every("savings-estimate", config.POLL_INTERVAL_MS, async () => {
      await service.calculateSavings();
    });
  }
  const sweepAt = apps.savingsSweep?.runAt;
  if (sweepAt !== undefined) {
    scheduler.dailyAt("savings-sweep", sweepAt, async () => {
      const result = await service.runSavingsSweep();
      logger.info(
        { outcome: result.outcome, amount: result.calculation.totalMinorUnits },
        "Savings sweep finished",
      );
    });
  }
  void scheduler.trigger("poll-balances");

  const app = createApp({ service, logger, apiKey: config.API_KEY });
  if (config.API_KEY === undefined) {
    logger.warn("API_KEY not set; /api/* is unauthenticated");
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, banks: service.aggregator.banks() },
    "Potkeeper node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    scheduler.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
