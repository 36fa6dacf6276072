import { describe, it, expect } from 'vitest';
import { parseRelation } from './events';
import { COMMENT_METADATA_KEY, buildEditContent, buildOutboundContent, extractCommentData } from './messages';

const SERVICE = '@roomthread:test.local';
const GHOST = '@roomthread_abc:test.local';

const ferris = { nickname: 'Ferris', content: 'hi', fingerprint: 'abc', txnId: 'txn-1' };

describe('buildOutboundContent', () => {
    it('carries a readable body and the metadata', () => {
        expect(buildOutboundContent(ferris)).toEqual({
            msgtype: 'm.text',
            body: '**Ferris** (Guest): hi',
            [COMMENT_METADATA_KEY]: {
                author_name: 'Ferris',
                is_guest: true,
                origin_content: 'hi',
                author_fingerprint: 'abc',
                txn_id: 'txn-1',
            },
        });
    });

    it('adds a reply relation', () => {
        const content = buildOutboundContent(ferris, '$parent:test.local');

        expect(content['m.relates_to']).toEqual({ 'm.in_reply_to': { event_id: '$parent:test.local' } });
        expect(parseRelation(content)).toEqual({ type: 'reply', eventId: '$parent:test.local' });
    });
});

describe('buildEditContent', () => {
    it('replaces the target and keeps the metadata in the new content', () => {
        const edit = buildEditContent('$one:test.local', { ...ferris, content: 'hi there', txnId: null });

        expect(edit.body).toBe('* hi there');
        expect(parseRelation(edit)).toEqual({
            type: 'replace',
            eventId: '$one:test.local',
            newContent: buildOutboundContent({ ...ferris, content: 'hi there', txnId: null }),
        });
    });
});

describe('extractCommentData', () => {
    it('prefers the metadata', () => {
        expect(extractCommentData(buildOutboundContent(ferris), GHOST, SERVICE)).toEqual({
            authorName: 'Ferris',
            isGuest: true,
            content: 'hi',
            authorFingerprint: 'abc',
            txnId: 'txn-1',
        });
    });

    it('parses the fallback body of service user messages', () => {
        expect(extractCommentData({ msgtype: 'm.text', body: '**Old Guest** (Guest): hello there' }, SERVICE, SERVICE)).toEqual({
            authorName: 'Old Guest',
            isGuest: true,
            content: 'hello there',
            authorFingerprint: null,
            txnId: null,
        });
    });

    it('skips service user messages that are not comments', () => {
        expect(extractCommentData({ msgtype: 'm.notice', body: 'room created' }, SERVICE, SERVICE)).toBeNull();
    });

    it('treats anyone else as a regular user', () => {
        expect(extractCommentData({ msgtype: 'm.text', body: 'native reply' }, '@alice:test.local', SERVICE)).toEqual({
            authorName: '@alice:test.local',
            isGuest: false,
            content: 'native reply',
            authorFingerprint: null,
            txnId: null,
        });
    });

    it('ignores malformed metadata', () => {
        const content = { msgtype: 'm.text', body: 'plain', [COMMENT_METADATA_KEY]: { author_name: 42 } };

        expect(extractCommentData(content, '@alice:test.local', SERVICE)?.content).toBe('plain');
    });
});
