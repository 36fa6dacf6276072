import { describe, it, expect, afterEach, vi } from 'vitest';
import { PermissionDeniedError, validateTenantId, type SyncNotification } from '@roomthread/protocol';
import { ADMIN_REDACTION_REASON } from './sync/executor';
import { BridgeHarness } from './testing/harness';

const tenantId = validateTenantId('demo.example');
const slug = 'hello';

describe('comment lifecycle', () => {
    let bridge: BridgeHarness;

    afterEach(async () => {
        await bridge.stop();
    });

    it('posts, edits, refuses a stranger and is removed by an admin', async () => {
        bridge = new BridgeHarness();
        const published: SyncNotification[] = [];
        const publish = bridge.bus.publish.bind(bridge.bus);
        vi.spyOn(bridge.bus, 'publish').mockImplementation((notification) => {
            published.push(notification);
            publish(notification);
        });
        const owner = bridge.executor.fingerprintOf(null, 'guest-token-1');

        const { eventId } = await bridge.queue.submit(
            {
                type: 'send_comment',
                tenantId,
                slug,
                content: 'hi',
                nickname: 'Ferris',
                email: null,
                guestToken: 'guest-token-1',
                replyTo: null,
                txnId: null,
            },
            2000,
        );
        await bridge.flush();

        const listed = await bridge.cache.listComments(tenantId, slug, 50, 0);
        expect(listed.total).toBe(1);
        expect(listed.items[0]).toMatchObject({
            id: eventId,
            authorName: 'Ferris',
            content: 'hi',
            isGuest: true,
            authorFingerprint: owner,
            isRedacted: false,
            updatedAt: null,
        });

        await bridge.queue.submit(
            { type: 'user_edit_comment', tenantId, slug, commentId: eventId, newContent: 'hi there', fingerprint: owner },
            2000,
        );
        await bridge.flush();

        const edited = await bridge.cache.getComment(eventId);
        expect(edited?.content).toBe('hi there');
        expect(edited?.updatedAt).not.toBeNull();

        const stranger = bridge.executor.fingerprintOf(null, 'someone-else');
        await expect(
            bridge.queue.submit(
                { type: 'user_delete_comment', tenantId, slug, commentId: eventId, fingerprint: stranger },
                2000,
            ),
        ).rejects.toBeInstanceOf(PermissionDeniedError);
        expect(await bridge.cache.getComment(eventId)).toEqual(edited);

        await bridge.queue.submit(
            { type: 'redact_comment', tenantId, slug, commentId: eventId, reason: ADMIN_REDACTION_REASON },
            2000,
        );
        await bridge.flush();

        expect(await bridge.cache.getComment(eventId)).toMatchObject({
            content: '',
            authorName: '[Deleted]',
            isRedacted: true,
        });

        // the same redaction arriving again changes nothing
        const redaction = bridge.network.timeline[bridge.network.timeline.length - 1];
        expect(await bridge.reconciler.reconcile(redaction)).toBe('skipped');

        expect(published.map((notification) => notification.type)).toEqual([
            'comment_saved',
            'comment_saved',
            'comment_deleted',
        ]);
    });

    it('posts as the service user when guests are not impersonated', async () => {
        bridge = new BridgeHarness({ impersonate: false });

        await bridge.queue.submit(
            {
                type: 'send_comment',
                tenantId,
                slug,
                content: 'hi',
                nickname: 'Ferris',
                email: 'ferris@example.com',
                guestToken: 'guest-token-1',
                replyTo: null,
                txnId: null,
            },
            2000,
        );
        await bridge.flush();

        expect(bridge.network.sent[0].sender).toBe(bridge.network.serviceUserId);
        const [comment] = (await bridge.cache.listComments(tenantId, slug, 50, 0)).items;
        expect(comment).toMatchObject({
            authorId: bridge.network.serviceUserId,
            authorName: 'Ferris',
            isGuest: true,
            authorFingerprint: bridge.executor.fingerprintOf('ferris@example.com', 'guest-token-1'),
        });
    });
});
