/**
 * WHAT: Bounded FIFO between the message listener and detection.
 * WHY: Spam arrives in bursts. The listener only enqueues; a fixed-rate consumer
 *      drains K events per tick, so worst-case detection latency is roughly
 *      ceil(depth / K) * tick and a flood can't starve the event loop.
 * FLOWS:
 *  - submit(event) → accepted, or dropped (and counted) when at capacity
 *  - start() → setInterval(drain, tickMs)
 *  - drain() → handler(event) for up to batchSize events, in arrival order
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";

export interface IngestQueueOptions {
  capacity: number;
  batchSize: number;
  tickMs: number;
  /** Label for logs ("spam_ingest") */
  name?: string;
}

export const DEFAULT_INGEST_OPTIONS: IngestQueueOptions = {
  capacity: 1000,
  batchSize: 10,
  tickMs: 100,
};

export interface IngestQueueStats {
  depth: number;
  accepted: number;
  dropped: number;
  processed: number;
  failed: number;
}

/**
 * The handler must stay synchronous: anything slow (platform calls) is
 * spawned by the handler, not awaited by the queue.
 */
export class IngestQueue<T> {
  private readonly items: T[] = [];
  private head = 0;
  private timer: NodeJS.Timeout | null = null;
  private dropWarnedThisTick = false;
  private readonly stats = { accepted: 0, dropped: 0, processed: 0, failed: 0 };
  private readonly options: IngestQueueOptions;

  constructor(
    private readonly handler: (item: T) => void,
    options: Partial<IngestQueueOptions> = {}
  ) {
    this.options = { ...DEFAULT_INGEST_OPTIONS, ...options };
    if (this.options.capacity < 1 || this.options.batchSize < 1 || this.options.tickMs < 1) {
      throw new Error("IngestQueue: capacity, batchSize and tickMs must be >= 1");
    }
  }

  /**
   * Never blocks. @returns false when the event was dropped because the queue is full.
   */
  submit(item: T): boolean {
    if (this.depth >= this.options.capacity) {
      this.stats.dropped++;
      if (!this.dropWarnedThisTick) {
        this.dropWarnedThisTick = true;
        logger.warn(
          {
            evt: "ingest_queue_full",
            queue: this.options.name ?? "ingest",
            capacity: this.options.capacity,
            dropped: this.stats.dropped,
          },
          "[ingest] queue full, dropping events"
        );
      }
      return false;
    }
    this.items.push(item);
    this.stats.accepted++;
    return true;
  }

  /**
   * Process up to batchSize events. Exposed for tests and for a final flush
   * on shutdown.
   * @returns number of events handed to the handler
   */
  drain(max: number = this.options.batchSize): number {
    this.dropWarnedThisTick = false;
    let handled = 0;

    while (handled < max && this.head < this.items.length) {
      const item = this.items[this.head];
      this.head++;
      handled++;
      try {
        this.handler(item);
        this.stats.processed++;
      } catch (err) {
        this.stats.failed++;
        logger.error(
          { evt: "ingest_handler_error", queue: this.options.name ?? "ingest", err },
          "[ingest] handler threw, event skipped"
        );
      }
    }

    // Compact once the consumed prefix dominates; shift() per item is O(n)
    if (this.head > 0 && this.head * 2 >= this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }

    return handled;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.drain(), this.options.tickMs);
    this.timer.unref();
    logger.info(
      { evt: "ingest_started", queue: this.options.name ?? "ingest", ...this.options },
      "[ingest] consumer started"
    );
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info({ evt: "ingest_stopped", queue: this.options.name ?? "ingest" }, "[ingest] consumer stopped");
  }

  get depth(): number {
    return this.items.length - this.head;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  getStats(): IngestQueueStats {
    return { depth: this.depth, ...this.stats };
  }
}
