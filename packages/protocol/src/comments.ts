import type { TenantId } from './tenant';

/** Author name shown for a redacted comment. */
export const DELETED_AUTHOR_NAME = '[Deleted]';

/**
 * Comment as served to the web, keyed by the id of the network event that created it
 */
export interface Comment {
    id: string; // network event id, stable across edits
    tenantId: TenantId;
    slug: string;
    authorId: string; // sender user id (service user or ghost for guests)
    authorName: string;
    avatarUrl: string | null;
    isGuest: boolean;
    authorFingerprint: string | null; // set iff isGuest
    content: string;
    isRedacted: boolean;
    replyTo: string | null; // event id of the parent comment
    createdAt: string; // ISO timestamp
    updatedAt: string | null; // ISO timestamp, set iff an edit was applied
    txnId: string | null; // client transaction id, echoed back for optimistic UIs
}

/**
 * A page of comments for one thread
 */
export interface CommentPage {
    items: Comment[];
    total: number;
}

/**
 * Comment as written to the cache: the served fields plus the raw event content.
 */
export interface CommentRecord extends Comment {
    rawEvent: string | null;
}
