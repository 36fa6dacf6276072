import type { Comment } from './comments';
import type { TenantId } from './tenant';

/**
 * Emitted after a comment was inserted or updated in the cache
 */
export interface CommentSavedNotification {
    type: 'comment_saved';
    tenantId: TenantId;
    slug: string;
    comment: Comment;
}

/**
 * Emitted after a comment was soft-deleted in the cache
 */
export interface CommentDeletedNotification {
    type: 'comment_deleted';
    tenantId: TenantId;
    slug: string;
    commentId: string;
}

export type SyncNotification = CommentSavedNotification | CommentDeletedNotification;

export function isForThread(notification: SyncNotification, tenantId: string, slug: string): boolean {
    return notification.tenantId === tenantId && notification.slug === slug;
}
