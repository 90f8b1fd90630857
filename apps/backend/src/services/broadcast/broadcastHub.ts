import type { Logger } from "pino";
import type { Clock } from "../../platform/clock";
import { toIso } from "../../platform/clock";
import { BoundedQueue } from "./boundedQueue";

export interface HubEnvelope {
  /** Hub-wide, strictly increasing. A consumer seeing a gap knows it lost events. */
  seq: number;
  emitted_at: string;
}

export interface SubscribeOptions {
  name?: string;
  capacity?: number;
}

export interface SubscriberStats {
  id: number;
  name: string;
  size: number;
  dropped: number;
}

export interface HubStats {
  subscribers: SubscriberStats[];
  published: number;
  last_seq: number;
  dropped_total: number;
}

export class Subscription<E> {
  constructor(
    readonly id: number,
    readonly name: string,
    private readonly queue: BoundedQueue<E>,
    private readonly onClose: (subscription: Subscription<E>) => void,
  ) {}

  /** Wait for the next event; null once the subscription is closed. */
  next(signal?: AbortSignal): Promise<E | null> {
    return this.queue.take(signal);
  }

  drain(): E[] {
    return this.queue.drain();
  }

  /** @internal used by the hub */
  offer(event: E): boolean {
    return this.queue.offer(event);
  }

  close(): void {
    if (this.queue.isClosed) return;
    this.queue.close();
    this.onClose(this);
  }

  get closed(): boolean {
    return this.queue.isClosed;
  }

  get dropped(): number {
    return this.queue.dropped;
  }

  get size(): number {
    return this.queue.size;
  }
}

/**
 * One-to-many fan-out with a bounded queue per subscriber. Publishing is
 * synchronous and never waits on a consumer: a full queue loses its oldest
 * event instead.
 */
export class BroadcastHub<TBody extends { kind: string }> {
  private readonly subscribers = new Map<number, Subscription<TBody & HubEnvelope>>();
  private seq = 0;
  private nextId = 1;
  private published = 0;
  private droppedByClosed = 0;

  constructor(
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly defaultCapacity = 50,
  ) {}

  publish(body: TBody): TBody & HubEnvelope {
    this.seq += 1;
    this.published += 1;
    const event = { ...body, seq: this.seq, emitted_at: toIso(this.clock.now()) };

    // Iterate a copy: a consumer may unsubscribe while we deliver.
    for (const subscription of [...this.subscribers.values()]) {
      if (!subscription.offer(event) && !subscription.closed) {
        this.logger.debug(
          { subscriber: subscription.name, dropped: subscription.dropped, seq: event.seq },
          "Subscriber queue full, dropped oldest event",
        );
      }
    }
    return event;
  }

  subscribe(options: SubscribeOptions = {}): Subscription<TBody & HubEnvelope> {
    const id = this.nextId;
    this.nextId += 1;
    const name = options.name ?? `subscriber-${id}`;
    const queue = new BoundedQueue<TBody & HubEnvelope>(options.capacity ?? this.defaultCapacity);
    const subscription = new Subscription(id, name, queue, (closed) => this.detach(closed));
    this.subscribers.set(id, subscription);
    this.logger.debug({ subscriber: name, capacity: queue.capacity }, "Subscriber added");
    return subscription;
  }

  /** Idempotent. */
  unsubscribe(subscription: Subscription<TBody & HubEnvelope>): void {
    subscription.close();
  }

  get lastSeq(): number {
    return this.seq;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  stats(): HubStats {
    const subscribers = [...this.subscribers.values()].map((s) => ({
      id: s.id,
      name: s.name,
      size: s.size,
      dropped: s.dropped,
    }));
    return {
      subscribers,
      published: this.published,
      last_seq: this.seq,
      dropped_total: this.droppedByClosed + subscribers.reduce((sum, s) => sum + s.dropped, 0),
    };
  }

  closeAll(): void {
    for (const subscription of [...this.subscribers.values()]) {
      subscription.close();
    }
  }

  private detach(subscription: Subscription<TBody & HubEnvelope>): void {
    if (this.subscribers.delete(subscription.id)) {
      this.droppedByClosed += subscription.dropped;
      this.logger.debug({ subscriber: subscription.name }, "Subscriber removed");
    }
  }
}
