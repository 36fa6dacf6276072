import type http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { isTenantId, threadKeyString, validateSlug } from '@roomthread/protocol';
import type { Logger } from '../logger';
import { trackSubscriber } from '../metrics';
import type { NotificationBus, Subscription } from '../sync/notification-bus';
import { deliveryToClientMessage, type ClientMessage } from './frames';

export const WS_PATH = '/ws';
/** Clients with more than this queued on their socket are skipped until they catch up. */
export const WS_MAX_BUFFERED_BYTES = 1024 * 1024;

function threadFromUrl(rawUrl: string | undefined, host: string | undefined): string | null {
    const url = new URL(rawUrl ?? '', `http://${host ?? 'localhost'}`);
    const tenant = url.searchParams.get('tenant');
    const slug = url.searchParams.get('slug');
    if (!tenant || !slug || !isTenantId(tenant)) return null;
    try {
        return threadKeyString({ tenantId: tenant, slug: validateSlug(slug) });
    } catch {
        return null;
    }
}

/**
 * Pushes thread notifications to WebSocket clients at `/ws?tenant=…&slug=…`.
 * One bus subscription feeds every client; clients are grouped per thread.
 */
export class WebSocketHub {
    private readonly wss: WebSocketServer;
    private readonly threadClients: Record<string, Set<WebSocket>> = {};
    private readonly missed = new WeakMap<WebSocket, number>();
    private readonly subscription: Subscription;
    private readonly pumping: Promise<void>;

    constructor(server: http.Server, bus: NotificationBus, private readonly log: Logger) {
        this.wss = new WebSocketServer({ server, path: WS_PATH });
        this.subscription = bus.subscribe();
        this.wss.on('connection', (ws, req) => this.onConnection(ws, req));
        this.pumping = this.pump();
    }

    private onConnection(ws: WebSocket, req: http.IncomingMessage) {
        const thread = threadFromUrl(req.url, req.headers.host);
        if (!thread) {
            ws.close(1008, 'Missing or invalid tenant or slug');
            return;
        }

        if (!this.threadClients[thread]) this.threadClients[thread] = new Set();
        this.threadClients[thread].add(ws);
        trackSubscriber('ws');
        this.log.debug({ thread }, 'websocket client connected');

        ws.on('close', () => {
            const clients = this.threadClients[thread];
            if (clients) {
                clients.delete(ws);
                if (clients.size === 0) delete this.threadClients[thread];
            }
            trackSubscriber('ws', false);
        });
    }

    private broadcast(thread: string | null, message: ClientMessage) {
        const payload = JSON.stringify(message);
        const targets = thread === null ? Object.values(this.threadClients) : [this.threadClients[thread]];
        for (const clients of targets) {
            if (!clients) continue;
            for (const client of clients) {
                this.deliver(client, payload);
            }
        }
    }

    private deliver(client: WebSocket, payload: string) {
        if (client.readyState !== WebSocket.OPEN) return;
        if (client.bufferedAmount > WS_MAX_BUFFERED_BYTES) {
            const missed = (this.missed.get(client) ?? 0) + 1;
            if (missed === 1) this.log.warn('websocket client too slow, skipping messages');
            this.missed.set(client, missed);
            return;
        }

        const missed = this.missed.get(client);
        if (missed !== undefined) {
            this.missed.delete(client);
            client.send(JSON.stringify(deliveryToClientMessage({ type: 'lagged', missed })));
        }
        client.send(payload);
    }

    private async pump(): Promise<void> {
        try {
            for await (const delivery of this.subscription) {
                if (delivery.type === 'lagged') {
                    this.log.warn({ missed: delivery.missed }, 'websocket hub fell behind');
                    this.broadcast(null, deliveryToClientMessage(delivery));
                    continue;
                }
                const { notification } = delivery;
                this.broadcast(threadKeyString(notification), deliveryToClientMessage(delivery));
            }
        } catch (error) {
            this.log.error({ err: error }, 'websocket hub stopped');
        }
    }

    async close(): Promise<void> {
        this.subscription.close();
        for (const client of this.wss.clients) {
            client.close(1001, 'Server shutting down');
        }
        await new Promise<void>((resolve, reject) => this.wss.close((error) => (error ? reject(error) : resolve())));
        await this.pumping;
    }
}
