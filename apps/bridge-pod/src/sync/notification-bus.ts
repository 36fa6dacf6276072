import type { SyncNotification } from '@roomthread/protocol';

export const DEFAULT_SUBSCRIBER_CAPACITY = 256;

export type Delivery =
    | { type: 'notification'; notification: SyncNotification }
    /** Entries dropped because the subscriber fell behind; re-fetch through the query path. */
    | { type: 'lagged'; missed: number };

export type NotificationFilter = (notification: SyncNotification) => boolean;

/**
 * One subscriber's bounded buffer. When it is full the oldest entry is dropped
 * and counted; the count is delivered before the next notification.
 */
export class Subscription implements AsyncIterable<Delivery> {
    private readonly buffer: SyncNotification[] = [];
    private missed = 0;
    private waiter: ((delivery: Delivery | null) => void) | null = null;
    private closed = false;

    constructor(
        private readonly capacity: number,
        private readonly filter: NotificationFilter,
        private readonly onClose: (subscription: Subscription) => void,
    ) {}

    offer(notification: SyncNotification): void {
        if (this.closed || !this.filter(notification)) return;

        // a waiting reader implies an empty buffer
        if (this.waiter) {
            const waiter = this.waiter;
            this.waiter = null;
            waiter({ type: 'notification', notification });
            return;
        }

        this.buffer.push(notification);
        if (this.buffer.length > this.capacity) {
            this.buffer.shift();
            this.missed += 1;
        }
    }

    /** Next delivery, or null after close(). */
    next(): Promise<Delivery | null> {
        const ready = this.takeLagged() ?? this.takeBuffered();
        if (ready) return Promise.resolve(ready);
        if (this.closed) return Promise.resolve(null);
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.buffer.length = 0;
        this.waiter?.(null);
        this.waiter = null;
        this.onClose(this);
    }

    async *[Symbol.asyncIterator](): AsyncIterator<Delivery> {
        for (;;) {
            const delivery = await this.next();
            if (delivery === null) return;
            yield delivery;
        }
    }

    private takeLagged(): Delivery | null {
        if (this.missed === 0) return null;
        const missed = this.missed;
        this.missed = 0;
        return { type: 'lagged', missed };
    }

    private takeBuffered(): Delivery | null {
        const notification = this.buffer.shift();
        return notification ? { type: 'notification', notification } : null;
    }
}

/**
 * Broadcast of comment notifications to any number of subscribers.
 * Publishing never waits on a subscriber.
 */
export class NotificationBus {
    private readonly subscriptions = new Set<Subscription>();

    constructor(private readonly capacity = DEFAULT_SUBSCRIBER_CAPACITY) {}

    get subscriberCount(): number {
        return this.subscriptions.size;
    }

    subscribe(filter: NotificationFilter = () => true, capacity = this.capacity): Subscription {
        const subscription = new Subscription(capacity, filter, (closed) => {
            this.subscriptions.delete(closed);
        });
        this.subscriptions.add(subscription);
        return subscription;
    }

    publish(notification: SyncNotification): void {
        for (const subscription of this.subscriptions) {
            subscription.offer(notification);
        }
    }
}
