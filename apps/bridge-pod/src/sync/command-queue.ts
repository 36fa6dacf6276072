import {
    CommandTimeoutError,
    InternalError,
    type AppCommand,
    type CommandResult,
} from '@roomthread/protocol';

/**
 * One-shot reply channel paired with a command. Only the first settle counts;
 * a reply whose caller gave up is `abandoned` and later settles are ignored.
 */
export class Reply<T> {
    private state: 'pending' | 'settled' | 'abandoned' = 'pending';
    readonly promise: Promise<T>;
    private resolveFn: (value: T) => void = () => undefined;
    private rejectFn: (error: unknown) => void = () => undefined;

    constructor() {
        this.promise = new Promise<T>((resolve, reject) => {
            this.resolveFn = resolve;
            this.rejectFn = reject;
        });
    }

    get isOpen(): boolean {
        return this.state === 'pending';
    }

    /** Returns false when the reply was already settled or abandoned. */
    resolve(value: T): boolean {
        if (this.state !== 'pending') return false;
        this.state = 'settled';
        this.resolveFn(value);
        return true;
    }

    reject(error: unknown): boolean {
        if (this.state !== 'pending') return false;
        this.state = 'settled';
        this.rejectFn(error);
        return true;
    }

    abandon(error: unknown): boolean {
        if (this.state !== 'pending') return false;
        this.state = 'abandoned';
        this.rejectFn(error);
        return true;
    }
}

export interface PendingCommand {
    command: AppCommand;
    reply: Reply<CommandResult>;
    enqueuedAt: number;
}

type Waiter<T> = (value: T) => void;

/**
 * Bounded FIFO between the HTTP layer and the command loop.
 * Producers wait for room when the queue is full; the whole wait, queueing
 * included, counts against the caller's timeout.
 */
export class CommandQueue {
    private readonly items: PendingCommand[] = [];
    private readonly consumers: Waiter<PendingCommand | null>[] = [];
    private readonly producers: Waiter<boolean>[] = [];
    private closed = false;

    constructor(private readonly capacity: number) {}

    get size(): number {
        return this.items.length;
    }

    /**
     * Enqueues a command and waits for its outcome.
     * @throws CommandTimeoutError when no outcome arrived within `timeoutMs`
     */
    async submit(command: AppCommand, timeoutMs: number): Promise<CommandResult> {
        const reply = new Reply<CommandResult>();
        const timer = setTimeout(() => reply.abandon(new CommandTimeoutError(timeoutMs)), timeoutMs);

        this.push({ command, reply, enqueuedAt: Date.now() }, reply).then(
            (queued) => {
                if (!queued) reply.reject(new InternalError('Command queue is closed'));
            },
            (error: unknown) => reply.reject(error),
        );

        try {
            return await reply.promise;
        } finally {
            clearTimeout(timer);
        }
    }

    private async push(pending: PendingCommand, reply: Reply<CommandResult>): Promise<boolean> {
        while (!this.closed && this.items.length >= this.capacity) {
            if (!reply.isOpen) return true;
            const hasRoom = await new Promise<boolean>((resolve) => this.producers.push(resolve));
            if (!hasRoom) return false;
        }
        if (this.closed) return false;
        if (!reply.isOpen) return true;

        const consumer = this.consumers.shift();
        if (consumer) consumer(pending);
        else this.items.push(pending);
        return true;
    }

    /**
     * Next command whose caller is still waiting, or null once the queue is
     * closed or `signal` is aborted.
     */
    async take(signal?: AbortSignal): Promise<PendingCommand | null> {
        for (;;) {
            const next = this.items.shift();
            if (next) {
                this.producers.shift()?.(true);
                if (next.reply.isOpen) return next;
                continue;
            }
            if (this.closed || signal?.aborted) return null;

            const pending = await new Promise<PendingCommand | null>((resolve) => {
                const onAbort = () => {
                    const index = this.consumers.indexOf(deliver);
                    if (index !== -1) this.consumers.splice(index, 1);
                    resolve(null);
                };
                const deliver: Waiter<PendingCommand | null> = (value) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(value);
                };
                signal?.addEventListener('abort', onAbort, { once: true });
                this.consumers.push(deliver);
            });
            if (pending === null) return null;
            if (pending.reply.isOpen) return pending;
        }
    }

    /** Stops accepting commands. Queued commands are still handed out. */
    close(): void {
        this.closed = true;
        for (const consumer of this.consumers.splice(0)) consumer(null);
        for (const producer of this.producers.splice(0)) producer(false);
    }
}
