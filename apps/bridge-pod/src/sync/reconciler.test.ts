import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    buildEditContent,
    buildOutboundContent,
    validateTenantId,
    type EventContent,
    type MessageEvent,
    type RedactionEvent,
} from '@roomthread/protocol';
import { SqliteCache } from '../storage/sqlite';
import { FakeNetwork } from '../testing/fake-network';
import { NotificationBus } from './notification-bus';
import { EventReconciler } from './reconciler';

const tenant = validateTenantId('demo.example');
const ROOM = '!hello:test.local';
const GHOST = '@roomthread_abc:test.local';
const T0 = Date.parse('2024-05-01T10:00:00.000Z');

const identity = { serviceUserId: '@roomthread:test.local', ghostPrefix: 'roomthread' };

function message(eventId: string, sender: string, content: EventContent, ts = T0, roomId = ROOM): MessageEvent {
    return { kind: 'message', eventId, roomId, sender, originServerTs: ts, content };
}

function redaction(eventId: string, redacts: string | null, sender = identity.serviceUserId): RedactionEvent {
    return { kind: 'redaction', eventId, roomId: ROOM, sender, originServerTs: T0 + 60_000, redacts, reason: null };
}

const guestContent = (content: string) =>
    buildOutboundContent({ nickname: 'Ferris', content, fingerprint: 'abc', txnId: 'txn-1' });

describe('EventReconciler', () => {
    let cache: SqliteCache;
    let network: FakeNetwork;
    let bus: NotificationBus;
    let reconciler: EventReconciler;

    const make = (lookupUnknownRooms = false) =>
        new EventReconciler({ cache, network, bus, identity, lookupUnknownRooms });

    beforeEach(async () => {
        cache = new SqliteCache(':memory:');
        network = new FakeNetwork();
        bus = new NotificationBus();
        reconciler = make();
        await cache.ensureRoomMapping(ROOM, tenant, 'hello');
    });

    afterEach(() => {
        cache.close();
        vi.restoreAllMocks();
    });

    it('stores a guest comment from its metadata and announces it', async () => {
        const subscription = bus.subscribe();

        expect(await reconciler.reconcile(message('$one', GHOST, guestContent('hi')))).toBe('saved');

        const expected = {
            id: '$one',
            tenantId: 'demo.example',
            slug: 'hello',
            authorId: GHOST,
            authorName: 'Ferris',
            avatarUrl: null,
            isGuest: true,
            authorFingerprint: 'abc',
            content: 'hi',
            isRedacted: false,
            replyTo: null,
            createdAt: '2024-05-01T10:00:00.000Z',
            updatedAt: null,
            txnId: 'txn-1',
        };
        expect(await cache.getComment('$one')).toEqual(expected);
        expect(await subscription.next()).toEqual({
            type: 'notification',
            notification: { type: 'comment_saved', tenantId: 'demo.example', slug: 'hello', comment: expected },
        });
    });

    it('keeps one row with its creation fields when an event is delivered twice', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi'), T0 + 5000));

        const page = await cache.listComments(tenant, 'hello', 50, 0);
        expect(page.total).toBe(1);
        expect(page.items[0].createdAt).toBe('2024-05-01T10:00:00.000Z');
    });

    it('applies an edit to the original comment id', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));

        const edit = buildEditContent('$one', { nickname: 'Ferris', content: 'hi there', fingerprint: 'abc', txnId: null });
        expect(await reconciler.reconcile(message('$edit', GHOST, edit, T0 + 30_000))).toBe('saved');

        const comment = await cache.getComment('$one');
        expect(comment?.content).toBe('hi there');
        expect(comment?.updatedAt).toBe('2024-05-01T10:00:30.000Z');
        expect(await cache.getComment('$edit')).toBeNull();
    });

    it('ignores an edit sent by someone other than the author', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));

        const edit = buildEditContent('$one', { nickname: 'Mallory', content: 'gotcha', fingerprint: null, txnId: null });
        expect(await reconciler.reconcile(message('$edit', '@mallory:test.local', edit, T0 + 30_000))).toBe('skipped');

        expect((await cache.getComment('$one'))?.content).toBe('hi');
    });

    it('keeps the author when a batch carries a comment and a foreign edit of it', async () => {
        const original = message('$one', '@alice:test.local', { msgtype: 'm.text', body: 'alice says hi' });
        const edit = buildEditContent('$one', { nickname: 'Mallory', content: 'pwned', fingerprint: null, txnId: null });

        await reconciler.reconcileBatch([original, message('$edit', '@mallory:test.local', edit, T0 + 1000)]);

        expect(await cache.getComment('$one')).toMatchObject({
            content: 'alice says hi',
            authorId: '@alice:test.local',
            updatedAt: null,
        });
    });

    it('applies events of one room in call order even when not awaited in between', async () => {
        const edit = buildEditContent('$one', { nickname: 'Ferris', content: 'hi again', fingerprint: 'abc', txnId: null });

        const results = await Promise.all([
            reconciler.reconcile(message('$one', GHOST, guestContent('hi'))),
            reconciler.reconcile(message('$edit', GHOST, edit, T0 + 1000)),
        ]);

        expect(results).toEqual(['saved', 'saved']);
        expect(await cache.getComment('$one')).toMatchObject({ content: 'hi again', updatedAt: '2024-05-01T10:00:01.000Z' });
    });

    it('does not hold other rooms behind a slow room', async () => {
        await cache.ensureRoomMapping('!news:test.local', tenant, 'news');
        let releaseProfile: () => void = () => undefined;
        const profile = vi.spyOn(network, 'getProfile').mockImplementationOnce(
            () => new Promise((resolve) => {
                releaseProfile = () => resolve(null);
            }),
        );

        const slow = reconciler.reconcile(message('$slow', '@alice:test.local', { msgtype: 'm.text', body: 'slow' }));
        await vi.waitFor(() => expect(profile).toHaveBeenCalledTimes(1));
        const fast = await reconciler.reconcile(message('$fast', GHOST, guestContent('fast'), T0, '!news:test.local'));

        expect(fast).toBe('saved');
        expect(await cache.getComment('$slow')).toBeNull();
        releaseProfile();
        expect(await slow).toBe('saved');
    });

    it('records the reply relation', async () => {
        const content = buildOutboundContent({ nickname: 'Ferris', content: 'me too', fingerprint: 'abc', txnId: null }, '$one');

        await reconciler.reconcile(message('$two', GHOST, content));

        expect((await cache.getComment('$two'))?.replyTo).toBe('$one');
    });

    it('soft-deletes on redaction and announces it once', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));
        const publish = vi.spyOn(bus, 'publish');

        expect(await reconciler.reconcile(redaction('$r1', '$one'))).toBe('deleted');
        expect(await reconciler.reconcile(redaction('$r1', '$one'))).toBe('skipped');

        expect(publish).toHaveBeenCalledTimes(1);
        expect(publish).toHaveBeenCalledWith({ type: 'comment_deleted', tenantId: 'demo.example', slug: 'hello', commentId: '$one' });
        expect(await cache.getComment('$one')).toMatchObject({ content: '', authorName: '[Deleted]', isRedacted: true });
    });

    it('treats a redaction of an unknown event as a no-op', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));
        const publish = vi.spyOn(bus, 'publish');

        expect(await reconciler.reconcile(redaction('$r1', '$missing'))).toBe('skipped');

        expect(publish).not.toHaveBeenCalled();
        expect((await cache.getComment('$one'))?.content).toBe('hi');
    });

    it('does not bring back a redacted comment on re-delivery', async () => {
        await reconciler.reconcile(message('$one', GHOST, guestContent('hi')));
        await reconciler.reconcile(redaction('$r1', '$one'));
        const publish = vi.spyOn(bus, 'publish');

        expect(await reconciler.reconcile(message('$one', GHOST, guestContent('hi')))).toBe('skipped');
        expect(publish).not.toHaveBeenCalled();
    });

    it('names regular users from their profile and caches it', async () => {
        network.profiles.set('@alice:test.local', { displayName: 'Alice', avatarUrl: 'mxc://test.local/alice' });

        await reconciler.reconcile(message('$one', '@alice:test.local', { msgtype: 'm.text', body: 'hello' }));
        await reconciler.reconcile(message('$two', '@alice:test.local', { msgtype: 'm.text', body: 'again' }));

        expect(await cache.getComment('$one')).toMatchObject({
            authorName: 'Alice',
            avatarUrl: 'mxc://test.local/alice',
            isGuest: false,
            authorFingerprint: null,
        });
        expect(network.calls.filter((call) => call === 'getProfile')).toHaveLength(1);
    });

    it('still saves the comment when the profile lookup fails', async () => {
        vi.spyOn(network, 'getProfile').mockRejectedValue(new Error('homeserver down'));

        expect(await reconciler.reconcile(message('$one', '@alice:test.local', { msgtype: 'm.text', body: 'hello' }))).toBe('saved');
        expect((await cache.getComment('$one'))?.authorName).toBe('@alice:test.local');
    });

    it('parses the fallback body of service-user messages and skips other service messages', async () => {
        await reconciler.reconcile(message('$one', identity.serviceUserId, { msgtype: 'm.text', body: '**Ferris** (Guest): hi' }));
        expect(await cache.getComment('$one')).toMatchObject({ authorName: 'Ferris', isGuest: true, content: 'hi', authorFingerprint: null });

        expect(await reconciler.reconcile(message('$two', identity.serviceUserId, { msgtype: 'm.text', body: 'Room created' }))).toBe('skipped');
        expect(await cache.getComment('$two')).toBeNull();
    });

    it('skips ghost messages without metadata', async () => {
        expect(await reconciler.reconcile(message('$one', GHOST, { msgtype: 'm.text', body: 'echo' }))).toBe('skipped');
        expect(await cache.getComment('$one')).toBeNull();
    });

    it('drops comments that are empty after trimming', async () => {
        expect(await reconciler.reconcile(message('$one', '@alice:test.local', { msgtype: 'm.text', body: '   ' }))).toBe('skipped');
        expect(await cache.getComment('$one')).toBeNull();
    });

    it('drops events from unmapped rooms', async () => {
        network.seedRoom('!news:test.local', '#demo.example_news:test.local');

        const event = message('$one', GHOST, guestContent('hi'), T0, '!news:test.local');
        expect(await reconciler.reconcile(event)).toBe('skipped');
        expect(network.calls).not.toContain('getCanonicalAlias');
    });

    it('maps unknown rooms through their canonical alias when asked to', async () => {
        network.seedRoom('!news:test.local', '#demo.example_news:test.local');

        const event = message('$one', GHOST, guestContent('hi'), T0, '!news:test.local');
        expect(await make(true).reconcile(event)).toBe('saved');

        expect(await cache.getRoomMeta('!news:test.local')).toEqual({ tenantId: 'demo.example', slug: 'news' });
        expect(await cache.getComment('$one')).toMatchObject({ slug: 'news' });
    });

    it('contains a failing event and keeps going with the rest of the batch', async () => {
        const upsert = vi.spyOn(cache, 'upsertComment');
        upsert.mockRejectedValueOnce(new Error('disk full'));

        expect(await reconciler.reconcile(message('$bad', GHOST, guestContent('hi')))).toBe('failed');

        await reconciler.reconcileBatch([message('$one', GHOST, guestContent('one')), message('$two', GHOST, guestContent('two'))]);
        expect((await cache.listComments(tenant, 'hello', 50, 0)).total).toBe(2);
    });
});
