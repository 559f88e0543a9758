import type { StructuredLogger } from "../logger.js";

/** Default per-subscriber buffer capacity. */
export const DEFAULT_EVENT_BUFFER_SIZE = 1_024;

/**
 * Bounded single-consumer stream fed by an {@link EventBroadcaster}. Offers
 * never block: when the buffer is full the offered item is refused and the
 * items already buffered are kept.
 */
export class EventStream<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private resolve: ((result: IteratorResult<T, undefined>) => void) | undefined;
  private ended = false;
  private detached = false;

  private static readonly DONE: IteratorReturnResult<undefined> = Object.freeze({
    value: undefined,
    done: true as const,
  });

  constructor(
    readonly capacity: number,
    private readonly onDetach: (stream: EventStream<T>) => void = () => {},
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`stream capacity must be a positive integer, received ${capacity}`);
    }
  }

  /** Number of buffered items not yet read. */
  get size(): number {
    return this.buffer.length;
  }

  /** True once no further items will ever be produced. */
  get isEnded(): boolean {
    return this.ended;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head !== undefined) {
      return { value: head, done: false };
    }
    if (this.ended) {
      return EventStream.DONE;
    }
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  /** Stops the iteration early; buffered items are discarded. */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return EventStream.DONE;
  }

  /**
   * Attempts to deliver `item` without blocking. Returns `false` when the
   * stream has ended or its buffer is full.
   */
  offer(item: T): boolean {
    if (this.ended) {
      return false;
    }
    if (this.resolve) {
      const resolve = this.resolve;
      this.resolve = undefined;
      resolve({ value: item, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(item);
    return true;
  }

  /** Ends the stream after the buffered items have been read. */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.detach();
    if (this.resolve) {
      const resolve = this.resolve;
      this.resolve = undefined;
      resolve(EventStream.DONE);
    }
  }

  /** Ends the stream immediately and drops whatever is still buffered. */
  close(): void {
    this.buffer.length = 0;
    this.end();
  }

  private detach(): void {
    if (this.detached) {
      return;
    }
    this.detached = true;
    this.onDetach(this);
  }
}

export interface EventBroadcasterOptions {
  readonly capacity?: number;
  readonly logger?: StructuredLogger;
  /** Identifier included in diagnostics (usually the session id). */
  readonly label?: string;
}

/**
 * Fan-out of one event source to many independent subscribers. Each
 * subscriber owns a bounded {@link EventStream}; a full subscriber loses the
 * event while every other subscriber still receives it. Closing the
 * broadcaster ends every current stream, and streams requested afterwards
 * start out ended.
 */
export class EventBroadcaster<T> {
  private readonly subscribers = new Set<EventStream<T>>();
  private readonly capacity: number;
  private readonly logger: StructuredLogger | undefined;
  private readonly label: string | undefined;
  private closed = false;

  constructor(options: EventBroadcasterOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_EVENT_BUFFER_SIZE;
    this.logger = options.logger;
    this.label = options.label;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(capacity: number = this.capacity): EventStream<T> {
    const stream = new EventStream<T>(capacity, (detached) => {
      this.subscribers.delete(detached);
    });
    if (this.closed) {
      stream.end();
      return stream;
    }
    this.subscribers.add(stream);
    return stream;
  }

  /** Detaches `stream`; other subscribers are unaffected. */
  unsubscribe(stream: EventStream<T>): boolean {
    const known = this.subscribers.has(stream);
    stream.close();
    return known;
  }

  /** Offers `item` to every subscriber and returns how many accepted it. */
  publish(item: T): number {
    if (this.closed) {
      return 0;
    }
    let delivered = 0;
    for (const stream of [...this.subscribers]) {
      if (stream.offer(item)) {
        delivered += 1;
      } else {
        this.logger?.debug("event_dropped_subscriber_full", {
          session_id: this.label ?? null,
          capacity: stream.capacity,
        });
      }
    }
    return delivered;
  }

  /** Ends every subscriber stream. Idempotent. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const stream of [...this.subscribers]) {
      stream.end();
    }
    this.subscribers.clear();
  }
}
