import { timingSafeEqual } from 'crypto';
import http from 'http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { isGhostUser, parseRoomEvent, type RoomEvent, type ServiceIdentity } from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import type { CommandQueue } from '../sync/command-queue';
import type { CommandExecutor } from '../sync/executor';
import type { EventReconciler } from '../sync/reconciler';
import { runCommandLoop, settleWithin } from './command-loop';
import type { SyncDriver } from './types';

const transactionSchema = z.object({
    events: z.array(z.unknown()).default([]),
});

export interface AppServiceAppOptions {
    hsToken: string;
    identity: ServiceIdentity;
    serverName: string;
    /** Called with each transaction's events; must not block the acknowledgement. */
    dispatch: (events: RoomEvent[]) => void;
    seenTransactions?: number;
    logger?: Logger;
}

function presentedToken(req: Request): string | null {
    const header = req.headers.authorization;
    if (header?.startsWith('Bearer ')) return header.slice('Bearer '.length);
    const query = req.query.access_token;
    return typeof query === 'string' ? query : null;
}

function tokenMatches(provided: string, expected: string): boolean {
    const actual = Buffer.from(provided);
    const wanted = Buffer.from(expected);
    return actual.length === wanted.length && timingSafeEqual(actual, wanted);
}

/**
 * The application-service endpoints the homeserver pushes to.
 */
export function createAppServiceApp(options: AppServiceAppOptions): Express {
    const log = options.logger ?? componentLogger('push-driver');
    const seen = new LRUCache<string, true>({ max: options.seenTransactions ?? 1000 });
    const app = express();

    app.use(express.json({ limit: '10mb' }));

    app.use((req: Request, res: Response, next: NextFunction) => {
        const token = presentedToken(req);
        if (token === null) {
            res.status(401).json({ errcode: 'M_UNAUTHORIZED', error: 'Missing homeserver token' });
            return;
        }
        if (!tokenMatches(token, options.hsToken)) {
            res.status(403).json({ errcode: 'M_FORBIDDEN', error: 'Invalid homeserver token' });
            return;
        }
        next();
    });

    const onTransaction = (req: Request, res: Response) => {
        const { txnId } = req.params;
        if (seen.has(txnId)) {
            log.debug({ txnId }, 'transaction already handled');
            res.status(200).json({});
            return;
        }

        const body = transactionSchema.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ errcode: 'M_BAD_JSON', error: 'Transaction body must carry an events array' });
            return;
        }

        const events: RoomEvent[] = [];
        for (const raw of body.data.events) {
            const event = parseRoomEvent(raw);
            if (event) events.push(event);
        }
        seen.set(txnId, true);
        log.debug({ txnId, received: body.data.events.length, dispatched: events.length }, 'transaction received');

        options.dispatch(events);
        res.status(200).json({});
    };

    const onUserQuery = (req: Request, res: Response) => {
        const { userId } = req.params;
        if (isGhostUser(options.identity, userId) && userId.endsWith(`:${options.serverName}`)) {
            res.status(200).json({});
            return;
        }
        res.status(404).json({ errcode: 'M_NOT_FOUND', error: 'User is not managed by this bridge' });
    };

    app.put('/_matrix/app/v1/transactions/:txnId', onTransaction);
    app.put('/transactions/:txnId', onTransaction);
    app.get('/_matrix/app/v1/users/:userId', onUserQuery);
    app.get('/users/:userId', onUserQuery);

    return app;
}

export interface PushDriverOptions {
    hsToken: string;
    identity: ServiceIdentity;
    serverName: string;
    reconciler: EventReconciler;
    executor: CommandExecutor;
    host: string;
    port: number;
    graceMs: number;
    logger?: Logger;
}

/**
 * Receives events from the homeserver's application-service pushes and acts
 * as per-guest ghosts. Transactions are reconciled concurrently; the
 * reconciler keeps each room's events in arrival order.
 */
export class PushDriver implements SyncDriver {
    readonly mode = 'push' as const;
    private readonly log: Logger;
    private readonly inFlight = new Set<Promise<unknown>>();
    private server: http.Server | null = null;

    constructor(private readonly options: PushDriverOptions) {
        this.log = options.logger ?? componentLogger('push-driver');
    }

    /** Starts reconciling without waiting; tracked so shutdown can drain it. */
    dispatch(events: RoomEvent[]): void {
        if (events.length === 0) return;
        const task: Promise<unknown> = this.options.reconciler
            .reconcileBatch(events)
            .finally(() => this.inFlight.delete(task));
        this.inFlight.add(task);
    }

    /** Port the listener is bound to while running. */
    get boundPort(): number | null {
        const address = this.server?.address();
        return typeof address === 'object' && address !== null ? address.port : null;
    }

    async run(commands: CommandQueue, signal: AbortSignal): Promise<void> {
        const { hsToken, identity, serverName, host, port, graceMs, executor } = this.options;
        const app = createAppServiceApp({
            hsToken,
            identity,
            serverName,
            dispatch: (events) => this.dispatch(events),
            logger: this.log,
        });

        const server = http.createServer(app);
        this.server = server;
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(port, host, () => {
                server.off('error', reject);
                resolve();
            });
        });
        this.log.info({ host, port: this.boundPort ?? port }, 'push listener started');

        const stopped = new Promise<void>((resolve) => {
            const stop = () => {
                server.close((error) => {
                    if (error) this.log.warn({ err: error }, 'push listener did not close cleanly');
                    resolve();
                });
                server.closeAllConnections();
            };
            if (signal.aborted) stop();
            else signal.addEventListener('abort', stop, { once: true });
        });

        await runCommandLoop(commands, executor, signal, { logger: this.log, graceMs });
        await stopped;
        this.server = null;

        if (this.inFlight.size > 0 && !(await settleWithin(this.inFlight, graceMs))) {
            this.log.warn({ pending: this.inFlight.size }, 'reconciliations still running after the grace period');
        }
        this.log.info('push driver stopped');
    }
}
