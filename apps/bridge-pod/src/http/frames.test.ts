import { describe, it, expect } from 'vitest';
import { validateTenantId, type Comment } from '@roomthread/protocol';
import { deliveryToClientMessage, toClientMessage, toSseFrame } from './frames';

const tenantId = validateTenantId('demo.example');

const comment: Comment = {
    id: '$one:test.local',
    tenantId,
    slug: 'hello',
    authorId: '@roomthread_abc:test.local',
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

describe('client frames', () => {
    it('announces a fresh comment as new and an edited one as an update', () => {
        expect(toClientMessage({ type: 'comment_saved', tenantId, slug: 'hello', comment })).toEqual({
            type: 'new_comment',
            comment,
        });

        const edited = { ...comment, content: 'hi there', updatedAt: '2024-05-01T10:00:30.000Z' };
        expect(toClientMessage({ type: 'comment_saved', tenantId, slug: 'hello', comment: edited })).toEqual({
            type: 'update_comment',
            comment: edited,
        });
    });

    it('announces a deletion by id', () => {
        expect(
            toClientMessage({ type: 'comment_deleted', tenantId, slug: 'hello', commentId: '$one:test.local' }),
        ).toEqual({ type: 'delete_comment', id: '$one:test.local' });
    });

    it('passes lag reports through', () => {
        expect(deliveryToClientMessage({ type: 'lagged', missed: 3 })).toEqual({ type: 'lagged', missed: 3 });
    });

    it('puts the comment itself in the sse data line', () => {
        expect(toSseFrame({ type: 'new_comment', comment })).toBe(
            `event: new_comment\ndata: ${JSON.stringify(comment)}\n\n`,
        );
        expect(toSseFrame({ type: 'delete_comment', id: '$one:test.local' })).toBe(
            'event: delete_comment\ndata: {"id":"$one:test.local"}\n\n',
        );
    });
});
