import type { Request, Response } from 'express';
import type { Writable } from 'stream';
import { isForThread, validateSlug, validateTenantId } from '@roomthread/protocol';
import type { Logger } from '../logger';
import { trackSubscriber } from '../metrics';
import type { Delivery, NotificationBus } from '../sync/notification-bus';
import { deliveryToClientMessage, toSseFrame } from './frames';

export const SSE_KEEP_ALIVE_MS = 15_000;

/** Resolves once `out` takes writes again, or is gone. */
function drained(out: Writable): Promise<void> {
    return new Promise((resolve) => {
        const done = () => {
            out.off('drain', done);
            out.off('close', done);
            resolve();
        };
        out.on('drain', done);
        out.on('close', done);
    });
}

/**
 * Writes each delivery as a frame, pausing while the client's socket is full.
 * Meanwhile the subscription buffer overflows and the reader gets a `lagged`
 * frame once it catches up.
 */
export async function streamDeliveries(deliveries: AsyncIterable<Delivery>, out: Writable): Promise<void> {
    for await (const delivery of deliveries) {
        if (out.destroyed) break;
        if (!out.write(toSseFrame(deliveryToClientMessage(delivery)))) await drained(out);
    }
    if (!out.destroyed) out.end();
}

export interface SseOptions {
    bus: NotificationBus;
    logger: Logger;
    keepAliveMs?: number;
}

/**
 * Streams a thread's notifications as server-sent events until the client goes away.
 */
export function sseHandler({ bus, logger, keepAliveMs = SSE_KEEP_ALIVE_MS }: SseOptions) {
    return (req: Request, res: Response): void => {
        const tenantId = validateTenantId(req.params.tenantId);
        const slug = validateSlug(req.params.slug);

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
        });
        res.write(': connected\n\n');

        const subscription = bus.subscribe((notification) => isForThread(notification, tenantId, slug));
        trackSubscriber('sse');
        const keepAlive = setInterval(() => {
            if (!res.writableNeedDrain) res.write(': keep-alive\n\n');
        }, keepAliveMs);

        res.on('close', () => {
            clearInterval(keepAlive);
            subscription.close();
            trackSubscriber('sse', false);
        });

        streamDeliveries(subscription, res).catch((error: unknown) => {
            logger.warn({ err: error, tenantId, slug }, 'sse stream failed');
            subscription.close();
        });
    };
}
