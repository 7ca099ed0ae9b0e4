/**
 * Executor Main Entry Point
 *
 * - Composition root: one MarketSession per configured symbol on the paper venue
 * - Interval-driven tick loop
 * - Non-blocking performance and audit event delivery
 * - Graceful shutdown: cancel live orders, drain queues, flush the repository
 */

import "dotenv/config";

import { QUOTE_STRATEGIES } from "@perp-mm/core";
import {
  InMemoryPerformanceTracker,
  PaperExecutionAdapter,
  PaperMarketDataAdapter,
} from "@perp-mm/adapters";
import type { PerformanceTrackerPort } from "@perp-mm/adapters";
import { getDb } from "@perp-mm/db";
import type { DbHandle } from "@perp-mm/db";
import { createPostgresEventRepository } from "@perp-mm/repositories";
import type { EventRepository } from "@perp-mm/repositories";
import { createIntervalWorker, logger } from "@perp-mm/utils";

import { loadExecutorConfig } from "./env";
import {
  createFanOutPerformanceSink,
  createRepositoryPerformanceSink,
  MarketSession,
  PerformancePublisher,
} from "./services";

const SHUTDOWN_CANCEL_TIMEOUT_MS = 3_000;

async function main(): Promise<void> {
  const configResult = loadExecutorConfig(process.env);
  if (configResult.isErr()) {
    logger.error("Invalid configuration", configResult.error);
    process.exitCode = 1;
    return;
  }
  const config = configResult.value;

  logger.info("Starting executor", {
    exchange: config.exchange,
    symbols: config.symbols.join(","),
    strategy: config.quoteStrategy,
    tickIntervalMs: config.tickIntervalMs,
  });

  // Persistence (optional)
  let dbHandle: DbHandle | undefined;
  let eventRepo: EventRepository | undefined;
  if (config.databaseUrl) {
    dbHandle = getDb(config.databaseUrl);
    eventRepo = createPostgresEventRepository(dbHandle.db);
    eventRepo.startPeriodicFlush(config.eventFlushIntervalMs);
    logger.info("Audit persistence enabled");
  } else {
    logger.info("DATABASE_URL not set; audit persistence disabled");
  }

  // Performance tracking
  const tracker = new InMemoryPerformanceTracker();
  const sinks: PerformanceTrackerPort[] = [tracker];
  if (eventRepo) sinks.push(createRepositoryPerformanceSink(eventRepo, config.exchange));
  const publisher = new PerformancePublisher(createFanOutPerformanceSink(sinks), {
    capacity: config.perfQueueCapacity,
  });
  publisher.start(config.perfDrainIntervalMs);

  // Paper venue
  const marketData = new PaperMarketDataAdapter({
    exchange: config.exchange,
    markets: config.symbols.map(symbol => ({
      symbol,
      initialMid: config.paper.initialMid,
      tickSize: config.venue.tickSize,
      spreadBps: config.paper.spreadBps,
      stepBps: config.paper.stepBps,
      displaySize: config.paper.displaySize,
    })),
    bboIntervalMs: config.paper.bboIntervalMs,
    fundingIntervalMs: config.paper.fundingIntervalMs,
    maxFundingRate: config.paper.maxFundingRate,
  });
  const execution = new PaperExecutionAdapter({
    latencyMs: config.paper.latencyMs,
    makerFeeBps: config.paper.makerFeeBps,
  });

  // Sessions
  const strategy = QUOTE_STRATEGIES[config.quoteStrategy];
  const sessions = config.symbols.map(
    symbol =>
      new MarketSession({
        exchange: config.exchange,
        symbol,
        strategy,
        quoteConfig: config.quote,
        riskLimits: config.risk,
        venue: config.venue,
        toleranceBps: config.toleranceBps,
        placeTimeoutMs: config.placeTimeoutMs,
        startingEquity: config.startingEquity,
        gateway: execution,
        performance: publisher,
        eventRepository: eventRepo,
        onAlert: alert => {
          logger.error("ALERT: session halted, operator action required", {
            symbol: alert.symbol,
            reasonCodes: alert.reasonCodes,
            consecutiveRejects: alert.consecutiveRejects,
          });
        },
      }),
  );

  marketData.onEvent(event => {
    switch (event.type) {
      case "bbo":
        execution.updateBook(event);
        break;
      case "connected":
        logger.info("Market data connected");
        break;
      case "disconnected":
        logger.warn("Market data disconnected", { reason: event.reason ?? "-" });
        break;
      case "funding":
        break;
    }
    for (const session of sessions) session.handleMarketData(event);
  });

  for (const symbol of config.symbols) {
    const subscribed = marketData.subscribe({ exchange: config.exchange, symbol, channels: ["bbo", "funding"] });
    if (subscribed.isErr()) {
      logger.error("Failed to subscribe to market data", { symbol, error: subscribed.error });
      process.exitCode = 1;
      return;
    }
  }

  const connected = await marketData.connect();
  if (connected.isErr()) {
    logger.error("Failed to connect to market data", connected.error);
    process.exitCode = 1;
    return;
  }

  // Periodic performance snapshots
  const snapshotTimer =
    config.snapshotLogIntervalMs > 0 ?
      setInterval(() => {
        for (const session of sessions) {
          const status = session.status();
          logger.info("Session snapshot", { ...status, performance: tracker.snapshot(session.symbol) });
        }
        logger.info("Performance totals", { ...tracker.snapshot(), droppedEvents: publisher.droppedCount() });
      }, config.snapshotLogIntervalMs)
    : undefined;

  createIntervalWorker({
    name: "executor",
    intervalMs: config.tickIntervalMs,
    startupMetadata: { symbols: config.symbols.join(",") },
    runOnce: async () => {
      await Promise.all(sessions.map(session => session.tick()));
    },
    cleanup: async () => {
      clearInterval(snapshotTimer);
      await Promise.all(sessions.map(session => session.shutdown(SHUTDOWN_CANCEL_TIMEOUT_MS)));
      await marketData.disconnect();
      execution.close();
      await publisher.stop();
      logger.info("Final performance", tracker.snapshot());

      if (eventRepo) {
        const flushed = await eventRepo.stop();
        if (flushed.isErr()) logger.error("Final event flush failed", flushed.error);
      }
      if (dbHandle) await dbHandle.close();
    },
  });
}

main().catch((error: unknown) => {
  logger.error("Executor crashed", error);
  process.exit(1);
});
