/**
 * Performance Publisher - Non-blocking bridge to the performance sink
 *
 * publish() only enqueues into a bounded drop-oldest queue; a timer drains it
 * into the sink. Sink failures re-queue the undelivered events for the next drain.
 */

import { okAsync, ResultAsync } from "neverthrow";
import type {
  PerformanceEvent,
  PerformanceSinkError,
  PerformanceTrackerPort,
} from "@perp-mm/adapters";
import type { EventRepository } from "@perp-mm/repositories";
import { BoundedQueue, logger } from "@perp-mm/utils";
import type { Logger } from "@perp-mm/utils";

export interface PerformancePublisherOptions {
  capacity: number;
  /** Max events per drain (default: all queued) */
  batchSize?: number;
  log?: Logger;
}

export class PerformancePublisher {
  private readonly queue: BoundedQueue<PerformanceEvent>;
  private readonly batchSize?: number;
  private readonly log: Logger;
  private draining: Promise<number> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly sink: PerformanceTrackerPort,
    options: PerformancePublisherOptions,
  ) {
    this.queue = new BoundedQueue(options.capacity);
    this.batchSize = options.batchSize;
    this.log = options.log ?? logger;
  }

  /**
   * Enqueue an event; never blocks
   */
  publish(event: PerformanceEvent): void {
    const evicted = this.queue.push(event);
    if (evicted) {
      this.log.debug("Performance queue full, dropped oldest event", {
        type: evicted.type,
        dropped: this.queue.droppedCount,
      });
    }
  }

  /**
   * Deliver queued events to the sink
   *
   * Concurrent calls share the drain in flight.
   *
   * @returns number of events delivered
   */
  drain(): Promise<number> {
    if (this.draining) return this.draining;

    this.draining = this.deliver().finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.drain();
    }, intervalMs);
  }

  /**
   * Stop the timer and make a final delivery attempt
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.drain();
    if (!this.queue.isEmpty()) {
      this.log.warn("Performance events left undelivered at shutdown", { pending: this.queue.size });
    }
  }

  pendingCount(): number {
    return this.queue.size;
  }

  droppedCount(): number {
    return this.queue.droppedCount;
  }

  private async deliver(): Promise<number> {
    const batch = this.queue.drain(this.batchSize);
    let delivered = 0;

    for (const [i, event] of batch.entries()) {
      const result = await this.sink.record(event);
      if (result.isErr()) {
        this.queue.requeue(batch.slice(i));
        this.log.warn("Performance sink write failed; will retry", {
          error: result.error,
          pending: this.queue.size,
        });
        break;
      }
      delivered++;
    }

    return delivered;
  }
}

/**
 * Sink that records into every given sink
 *
 * A retried event only goes to the sinks that have not recorded it yet.
 */
export function createFanOutPerformanceSink(sinks: PerformanceTrackerPort[]): PerformanceTrackerPort {
  const delivered = new WeakMap<PerformanceEvent, Set<PerformanceTrackerPort>>();

  return {
    record: (event: PerformanceEvent): ResultAsync<void, PerformanceSinkError> => {
      const done = delivered.get(event) ?? new Set<PerformanceTrackerPort>();
      delivered.set(event, done);
      return ResultAsync.combine(
        sinks
          .filter(sink => !done.has(sink))
          .map(sink =>
            sink.record(event).map(() => {
              done.add(sink);
            }),
          ),
      ).map(() => undefined);
    },
  };
}

/**
 * Sink that persists fills through the event repository
 *
 * Realized PnL rides on the fill row, so realized_pnl events add nothing.
 */
export function createRepositoryPerformanceSink(repository: EventRepository, exchange: string): PerformanceTrackerPort {
  return {
    record: (event: PerformanceEvent): ResultAsync<void, PerformanceSinkError> => {
      if (event.type === "fill") {
        repository.queueFill({
          ts: event.ts,
          exchange,
          symbol: event.symbol,
          clientOrderId: event.clientOrderId,
          exchangeOrderId: event.exchangeOrderId,
          side: event.side,
          fillPx: event.price,
          fillSz: event.size,
          fee: event.fee,
          liquidity: event.liquidity ?? null,
          inventoryAfter: event.inventoryAfter,
          realizedPnlDelta: event.realizedPnlDelta ?? null,
          rawJson: null,
        });
      }
      return okAsync(undefined);
    },
  };
}
