import { z } from 'zod';
import type { EventContent } from './events';

/** Field of a message's content holding the structured comment payload. */
export const COMMENT_METADATA_KEY = 'org.roomthread.comment';

const GUEST_MARKER = ' (Guest): ';
const EDIT_BODY_PREFIX = '* ';

export const commentMetadataSchema = z.object({
    author_name: z.string(),
    is_guest: z.boolean(),
    origin_content: z.string(),
    author_fingerprint: z.string().nullish(),
    txn_id: z.string().nullish(),
});

export type CommentMetadata = z.infer<typeof commentMetadataSchema>;

/**
 * Author and content recovered from a message, whichever way it was written
 */
export interface ExtractedComment {
    authorName: string;
    isGuest: boolean;
    content: string;
    authorFingerprint: string | null;
    txnId: string | null;
}

export interface OutboundComment {
    nickname: string;
    content: string;
    fingerprint: string | null;
    txnId: string | null;
}

/** Plain-text body shown by clients that do not understand the metadata. */
export function fallbackBody(nickname: string, content: string): string {
    return `**${nickname}**${GUEST_MARKER}${content}`;
}

export function buildCommentMetadata({ nickname, content, fingerprint, txnId }: OutboundComment): CommentMetadata {
    return {
        author_name: nickname,
        is_guest: true,
        origin_content: content,
        author_fingerprint: fingerprint,
        txn_id: txnId,
    };
}

/**
 * Content of a new guest comment: the metadata plus a readable fallback body,
 * with a reply relation when `replyTo` is given.
 */
export function buildOutboundContent(comment: OutboundComment, replyTo: string | null = null): EventContent {
    const content: EventContent = {
        msgtype: 'm.text',
        body: fallbackBody(comment.nickname, comment.content),
        [COMMENT_METADATA_KEY]: buildCommentMetadata(comment),
    };
    if (replyTo !== null) {
        content['m.relates_to'] = { 'm.in_reply_to': { event_id: replyTo } };
    }
    return content;
}

/**
 * Content of an edit replacing `targetEventId`. The replacement carries the
 * metadata so the edited comment stays attributed to its guest author.
 */
export function buildEditContent(targetEventId: string, comment: OutboundComment): EventContent {
    return {
        msgtype: 'm.text',
        body: `${EDIT_BODY_PREFIX}${comment.content}`,
        'm.new_content': buildOutboundContent(comment),
        'm.relates_to': { rel_type: 'm.replace', event_id: targetEventId },
    };
}

/**
 * Recovers author and content from message content.
 *
 * Structured metadata wins. Without it, messages from the service user are
 * parsed from the fallback body (and skipped with `null` when they do not follow
 * it); anyone else is a regular user named by their sender id.
 */
export function extractCommentData(content: EventContent, sender: string, serviceUserId: string): ExtractedComment | null {
    const metadata = commentMetadataSchema.safeParse(content[COMMENT_METADATA_KEY]);
    if (metadata.success) {
        return {
            authorName: metadata.data.author_name,
            isGuest: metadata.data.is_guest,
            content: metadata.data.origin_content,
            authorFingerprint: metadata.data.is_guest ? metadata.data.author_fingerprint ?? null : null,
            txnId: metadata.data.txn_id ?? null,
        };
    }

    const body = typeof content.body === 'string' ? content.body : '';

    if (sender === serviceUserId) {
        const marker = body.indexOf(GUEST_MARKER);
        if (marker === -1) return null;
        const nickname = body.slice(0, marker).replace(/^\*\*/, '').replace(/\*\*$/, '');
        return {
            authorName: nickname,
            isGuest: true,
            content: body.slice(marker + GUEST_MARKER.length),
            authorFingerprint: null,
            txnId: null,
        };
    }

    return {
        authorName: sender,
        isGuest: false,
        content: body,
        authorFingerprint: null,
        txnId: null,
    };
}
