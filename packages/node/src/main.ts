/**
 * @pledgebook/node — Entry point.
 *
 * Loads config, wires the price feed, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino, type Logger } from "pino";
import type { PriceFeed } from "@pledgebook/types";
import { EvmPriceFeed, MockPriceFeed } from "@pledgebook/price-feed";
import { loadConfig, parseApiKeys } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Price Feed
// =============================================================================

interface WiredFeed {
  readonly feed: PriceFeed;
  readonly stop: () => void;
}

async function wirePriceFeed(config: AppConfig, logger: Logger): Promise<WiredFeed> {
  if (config.PRICE_FEED_ADDRESS === undefined || config.RPC_URL === undefined) {
    logger.warn(
      { decimals: config.MOCK_FEED_DECIMALS, answer: config.MOCK_FEED_INITIAL_ANSWER.toString() },
      "No on-chain price feed configured — using mock feed",
    );
    return {
      feed: new MockPriceFeed(config.MOCK_FEED_DECIMALS, config.MOCK_FEED_INITIAL_ANSWER),
      stop: () => undefined,
    };
  }

  const feed = new EvmPriceFeed({
    address: config.PRICE_FEED_ADDRESS,
    rpcUrl: config.RPC_URL,
  });
  const round = await feed.sync();
  logger.info(
    { address: feed.address, roundId: round.roundId.toString(), answer: round.answer.toString() },
    "Price feed synced",
  );

  const timer = setInterval(() => {
    feed
      .sync()
      .then((latest) => {
        logger.debug({ roundId: latest.roundId.toString() }, "Price feed refreshed");
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Price feed refresh failed — serving cached round");
      });
  }, config.FEED_REFRESH_MS);

  return { feed, stop: () => clearInterval(timer) };
}

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "API keys configured");
  } else {
    logger.warn("No API keys configured — trusting X-Caller-Id header");
  }

  const priceFeed = await wirePriceFeed(config, logger);

  const { app } = createApp({
    serviceConfig: {
      owner: config.OWNER_ID,
      priceFeed: priceFeed.feed,
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, owner: config.OWNER_ID },
    "Pledgebook node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    priceFeed.stop();
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
