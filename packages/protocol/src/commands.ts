import type { TenantId } from './tenant';

/**
 * Post a new guest comment (or a reply) into a thread, creating the thread room on demand
 */
export interface SendCommentCommand {
    type: 'send_comment';
    tenantId: TenantId;
    slug: string;
    content: string;
    nickname: string;
    email: string | null;
    guestToken: string;
    replyTo: string | null;
    txnId: string | null;
}

/**
 * Moderator removal, no ownership check
 */
export interface RedactCommentCommand {
    type: 'redact_comment';
    tenantId: TenantId;
    slug: string;
    commentId: string;
    reason: string | null;
}

/**
 * Guest removal of their own comment
 */
export interface UserDeleteCommentCommand {
    type: 'user_delete_comment';
    tenantId: TenantId;
    slug: string;
    commentId: string;
    fingerprint: string;
}

/**
 * Guest edit of their own comment
 */
export interface UserEditCommentCommand {
    type: 'user_edit_comment';
    tenantId: TenantId;
    slug: string;
    commentId: string;
    newContent: string;
    fingerprint: string;
}

export type AppCommand =
    | SendCommentCommand
    | RedactCommentCommand
    | UserDeleteCommentCommand
    | UserEditCommentCommand;

export type AppCommandType = AppCommand['type'];

/**
 * What a completed command reports back. Sends return the new event id; the
 * other commands return the event id they acted on.
 */
export interface CommandResult {
    eventId: string;
}
