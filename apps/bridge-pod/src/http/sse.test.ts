import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import http from 'http';
import { Writable } from 'stream';
import express from 'express';
import { validateTenantId } from '@roomthread/protocol';
import { logger } from '../logger';
import { NotificationBus } from '../sync/notification-bus';
import { sseHandler, streamDeliveries } from './sse';

const tenantId = validateTenantId('demo.example');

describe('sseHandler', () => {
    let server: http.Server;
    let bus: NotificationBus;
    let port: number;

    beforeEach(async () => {
        bus = new NotificationBus();
        const app = express();
        app.get('/api/:tenantId/comments/:slug/sse', sseHandler({ bus, logger, keepAliveMs: 60_000 }));
        server = http.createServer(app);
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
        port = address.port;
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('streams the thread notifications as named events', async () => {
        let body = '';
        const response = await new Promise<http.IncomingMessage>((resolve) =>
            http.get(`http://127.0.0.1:${port}/api/demo.example/comments/hello/sse`, resolve),
        );
        response.setEncoding('utf8');
        response.on('data', (chunk: string) => {
            body += chunk;
        });

        expect(response.statusCode).toBe(200);
        expect(response.headers['content-type']).toBe('text/event-stream');
        await expect.poll(() => bus.subscriberCount).toBe(1);

        bus.publish({ type: 'comment_deleted', tenantId, slug: 'other', commentId: '$zero:test.local' });
        bus.publish({ type: 'comment_deleted', tenantId, slug: 'hello', commentId: '$one:test.local' });

        await expect
            .poll(() => body)
            .toBe(': connected\n\nevent: delete_comment\ndata: {"id":"$one:test.local"}\n\n');

        response.destroy();
        await expect.poll(() => bus.subscriberCount).toBe(0);
    });
});

describe('streamDeliveries', () => {
    const deleted = (n: number) => ({ type: 'comment_deleted' as const, tenantId, slug: 'hello', commentId: `$n${n}` });
    const frame = (n: number) => `event: delete_comment\ndata: {"id":"$n${n}"}\n\n`;

    it('stops reading while the client is stalled and reports the overflow as lagged', async () => {
        const bus = new NotificationBus();
        const subscription = bus.subscribe(undefined, 8);
        const written: string[] = [];
        let stalled = true;
        let release: () => void = () => undefined;
        const out = new Writable({
            highWaterMark: 1,
            write(chunk: Buffer, _encoding, callback) {
                written.push(chunk.toString());
                if (stalled) release = () => callback();
                else callback();
            },
        });

        const streaming = streamDeliveries(subscription, out);
        bus.publish(deleted(0));
        await vi.waitFor(() => expect(written).toHaveLength(1));

        for (let n = 1; n <= 100; n++) {
            bus.publish(deleted(n));
            await new Promise((resolve) => setImmediate(resolve));
        }
        expect(written).toHaveLength(1);

        stalled = false;
        release();
        await vi.waitFor(() => expect(written).toHaveLength(10));
        subscription.close();
        await streaming;

        expect(written).toEqual([
            frame(0),
            'event: lagged\ndata: {"missed":92}\n\n',
            ...[93, 94, 95, 96, 97, 98, 99, 100].map(frame),
        ]);
    });

    it('gives up once the client is gone', async () => {
        const bus = new NotificationBus();
        const subscription = bus.subscribe();
        const out = new Writable({
            highWaterMark: 1,
            write(_chunk: Buffer, _encoding, _callback) {
                // never completes
            },
        });

        const streaming = streamDeliveries(subscription, out);
        bus.publish(deleted(0));
        bus.publish(deleted(1));
        await new Promise((resolve) => setImmediate(resolve));
        out.destroy();
        await streaming;

        expect(out.destroyed).toBe(true);
        subscription.close();
    });
});
