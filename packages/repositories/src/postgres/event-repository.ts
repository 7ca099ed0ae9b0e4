/**
 * Postgres Event Repository
 *
 * - Non-blocking async batch writes for events
 * - Queues events in memory and flushes periodically
 * - Failed batches are re-queued for the next flush
 */

import { ok, err } from "neverthrow";
import type { Result } from "neverthrow";
import { exOrderEvent, exFill } from "@perp-mm/db";
import type { Db } from "@perp-mm/db";
import { logger } from "@perp-mm/utils";

import type {
  EventRepository,
  EventRepositoryError,
  EventStore,
  OrderEventRecord,
  FillRecord,
} from "../interfaces/event-repository";

/**
 * Drizzle-backed store for the ex_order_event / ex_fill tables
 */
export function createDrizzleEventStore(db: Db): EventStore {
  return {
    async insertOrderEvents(records: OrderEventRecord[]): Promise<void> {
      await db.insert(exOrderEvent).values(
        records.map(e => ({
          ts: e.ts,
          exchange: e.exchange,
          symbol: e.symbol,
          clientOrderId: e.clientOrderId,
          exchangeOrderId: e.exchangeOrderId,
          eventType: e.eventType,
          side: e.side,
          level: e.level,
          generation: e.generation,
          px: e.px,
          sz: e.sz,
          postOnly: e.postOnly,
          reduceOnly: e.reduceOnly,
          reason: e.reason,
          directive: e.directive,
          rawJson: e.rawJson,
        })),
      );
    },

    async insertFills(records: FillRecord[]): Promise<void> {
      await db.insert(exFill).values(
        records.map(f => ({
          ts: f.ts,
          exchange: f.exchange,
          symbol: f.symbol,
          clientOrderId: f.clientOrderId,
          exchangeOrderId: f.exchangeOrderId,
          side: f.side,
          fillPx: f.fillPx,
          fillSz: f.fillSz,
          fee: f.fee,
          liquidity: f.liquidity,
          inventoryAfter: f.inventoryAfter,
          realizedPnlDelta: f.realizedPnlDelta,
          rawJson: f.rawJson,
        })),
      );
    },
  };
}

/**
 * Create an event repository with async batch writes over any store
 */
export function createEventRepository(store: EventStore): EventRepository {
  const orderEventQueue: OrderEventRecord[] = [];
  const fillQueue: FillRecord[] = [];
  let flushIntervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<Result<void, EventRepositoryError>> | null = null;

  async function doFlush(): Promise<Result<void, EventRepositoryError>> {
    const eventsToFlush = orderEventQueue.splice(0);
    const fillsToFlush = fillQueue.splice(0);

    if (eventsToFlush.length === 0 && fillsToFlush.length === 0) {
      return ok(undefined);
    }

    let eventsWritten = false;
    try {
      // Batch insert order events
      if (eventsToFlush.length > 0) {
        await store.insertOrderEvents(eventsToFlush);
      }
      eventsWritten = true;

      // Batch insert fills
      if (fillsToFlush.length > 0) {
        await store.insertFills(fillsToFlush);
      }

      logger.debug("Flushed events", {
        orderEvents: eventsToFlush.length,
        fills: fillsToFlush.length,
      });

      return ok(undefined);
    } catch (error) {
      // Re-queue what was not written, ahead of anything queued meanwhile
      if (!eventsWritten) orderEventQueue.unshift(...eventsToFlush);
      fillQueue.unshift(...fillsToFlush);

      return err({
        type: "DB_ERROR",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  // Serialize flushes so a batch is never written twice
  function flushOnce(): Promise<Result<void, EventRepositoryError>> {
    if (inFlight) {
      return inFlight.then(() => flushOnce());
    }
    inFlight = doFlush().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  return {
    queueOrderEvent(event: OrderEventRecord): void {
      orderEventQueue.push(event);
    },

    queueFill(fill: FillRecord): void {
      fillQueue.push(fill);
    },

    async flush(): Promise<Result<void, EventRepositoryError>> {
      return flushOnce();
    },

    startPeriodicFlush(intervalMs: number): void {
      if (flushIntervalId) return;

      flushIntervalId = setInterval(() => {
        flushOnce()
          .then(result => {
            // Err here means events stay queued; surface it instead of failing silently
            if (result.isErr()) {
              logger.error("Periodic flush failed", result.error);
            }
          })
          .catch((error: unknown) => {
            logger.error("Periodic flush crashed", { error });
          });
      }, intervalMs);
    },

    async stop(): Promise<Result<void, EventRepositoryError>> {
      if (flushIntervalId) {
        clearInterval(flushIntervalId);
        flushIntervalId = null;
      }
      return flushOnce();
    },

    pendingCount() {
      return { orderEvents: orderEventQueue.length, fills: fillQueue.length };
    },
  };
}

/**
 * Create a Postgres event repository with async batch writes
 */
export function createPostgresEventRepository(db: Db): EventRepository {
  return createEventRepository(createDrizzleEventStore(db));
}
