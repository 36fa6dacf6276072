import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { validateTenantId, type RoomEvent } from '@roomthread/protocol';
import { CommandQueue } from '../sync/command-queue';
import { BridgeHarness } from '../testing/harness';
import { PushDriver, createAppServiceApp } from './push-driver';

const identity = { serviceUserId: '@roomthread:test.local', ghostPrefix: 'roomthread' };

const message = {
    type: 'm.room.message',
    event_id: '$one',
    room_id: '!hello:test.local',
    sender: '@alice:test.local',
    origin_server_ts: 1000,
    content: { msgtype: 'm.text', body: 'hello' },
};

function setup() {
    const dispatched: RoomEvent[][] = [];
    const dispatch = vi.fn((events: RoomEvent[]) => {
        dispatched.push(events);
    });
    const app = createAppServiceApp({ hsToken: 'test-hs-token', identity, serverName: 'test.local', dispatch });
    return { app, dispatch, dispatched };
}

describe('application-service endpoints', () => {
    it('requires the homeserver token', async () => {
        const { app, dispatch } = setup();

        const missing = await request(app).put('/_matrix/app/v1/transactions/1').send({ events: [message] });
        expect(missing.status).toBe(401);
        expect(missing.body).toEqual({ errcode: 'M_UNAUTHORIZED', error: 'Missing homeserver token' });

        const wrong = await request(app)
            .put('/_matrix/app/v1/transactions/1')
            .set('Authorization', 'Bearer nope')
            .send({ events: [message] });
        expect(wrong.status).toBe(403);
        expect(wrong.body.errcode).toBe('M_FORBIDDEN');

        const sameLength = await request(app)
            .put('/_matrix/app/v1/transactions/1')
            .query({ access_token: 'test-hs-tokem' })
            .send({ events: [message] });
        expect(sameLength.status).toBe(403);

        expect(dispatch).not.toHaveBeenCalled();
    });

    it('acknowledges a transaction and dispatches the events it understands', async () => {
        const { app, dispatched } = setup();
        const member = { ...message, type: 'm.room.member', event_id: '$member', content: {} };

        const res = await request(app)
            .put('/_matrix/app/v1/transactions/1')
            .set('Authorization', 'Bearer test-hs-token')
            .send({ events: [message, member] });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({});
        expect(dispatched).toEqual([
            [
                {
                    kind: 'message',
                    eventId: '$one',
                    roomId: '!hello:test.local',
                    sender: '@alice:test.local',
                    originServerTs: 1000,
                    content: { msgtype: 'm.text', body: 'hello' },
                },
            ],
        ]);
    });

    it('accepts the token as a query parameter on the legacy path', async () => {
        const { app, dispatch } = setup();

        const res = await request(app).put('/transactions/7?access_token=test-hs-token').send({ events: [message] });

        expect(res.status).toBe(200);
        expect(dispatch).toHaveBeenCalledTimes(1);
    });

    it('does not dispatch a retried transaction twice', async () => {
        const { app, dispatch } = setup();

        for (let attempt = 0; attempt < 2; attempt++) {
            const res = await request(app)
                .put('/_matrix/app/v1/transactions/42')
                .set('Authorization', 'Bearer test-hs-token')
                .send({ events: [message] });
            expect(res.status).toBe(200);
        }

        expect(dispatch).toHaveBeenCalledTimes(1);
    });

    it('rejects a body without an events array', async () => {
        const { app, dispatch } = setup();

        const res = await request(app)
            .put('/_matrix/app/v1/transactions/1')
            .set('Authorization', 'Bearer test-hs-token')
            .send({ events: 'nope' });

        expect(res.status).toBe(400);
        expect(dispatch).not.toHaveBeenCalled();
    });

    it('claims ghosts in its namespace and nobody else', async () => {
        const { app } = setup();
        const query = (userId: string) =>
            request(app).get(`/_matrix/app/v1/users/${encodeURIComponent(userId)}`).set('Authorization', 'Bearer test-hs-token');

        expect((await query('@roomthread_abc:test.local')).status).toBe(200);
        expect((await query('@alice:test.local')).status).toBe(404);
        expect((await query('@roomthread_abc:elsewhere.example')).status).toBe(404);
    });
});

describe('PushDriver', () => {
    it('serves pushes and commands until cancelled, then drains and stops', async () => {
        const bridge = new BridgeHarness();
        await bridge.cache.ensureRoomMapping('!hello:test.local', validateTenantId('demo.example'), 'hello');
        const driver = new PushDriver({
            hsToken: 'test-hs-token',
            identity: bridge.identity,
            serverName: 'test.local',
            reconciler: bridge.reconciler,
            executor: bridge.executor,
            host: '127.0.0.1',
            port: 0,
            graceMs: 1000,
        });
        const queue = new CommandQueue(10);
        const controller = new AbortController();

        const running = driver.run(queue, controller.signal);
        await vi.waitFor(() => expect(driver.boundPort).not.toBeNull());

        const res = await request(`http://127.0.0.1:${driver.boundPort}`)
            .put('/_matrix/app/v1/transactions/1')
            .set('Authorization', 'Bearer test-hs-token')
            .send({ events: [message] });
        expect(res.status).toBe(200);

        const sent = await queue.submit(
            {
                type: 'send_comment',
                tenantId: validateTenantId('demo.example'),
                slug: 'fresh',
                content: 'hi',
                nickname: 'Ferris',
                email: null,
                guestToken: 'test-guest',
                replyTo: null,
                txnId: null,
            },
            1000,
        );
        expect(sent.eventId).toMatch(/^\$/);

        controller.abort();
        await running;

        expect(driver.boundPort).toBeNull();
        expect(await bridge.cache.getComment('$one')).toMatchObject({
            slug: 'hello',
            authorId: '@alice:test.local',
            content: 'hello',
        });
        await bridge.stop();
    });
});
