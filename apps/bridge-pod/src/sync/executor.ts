import {
    InvalidInputError,
    NotFoundError,
    PermissionDeniedError,
    buildEditContent,
    buildOutboundContent,
    fingerprint,
    isValidEventId,
    type AppCommand,
    type Comment,
    type EventContent,
    type CommandResult,
    type RedactCommentCommand,
    type SendCommentCommand,
    type TenantId,
    type UserDeleteCommentCommand,
    type UserEditCommentCommand,
} from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import type { RoomSession } from '../network/types';
import type { RoomRouter } from '../routing/room-router';
import type { LocalCache } from '../storage/cache';
import type { SessionProvider } from './sessions';

export const ADMIN_REDACTION_REASON = 'Deleted by administrator';
export const USER_REDACTION_REASON = 'Deleted by author';

export interface CommandExecutorOptions {
    router: RoomRouter;
    cache: LocalCache;
    sessions: SessionProvider;
    identitySalt: string;
    logger?: Logger;
}

function requireEventId(value: string, field: string): string {
    if (!isValidEventId(value)) {
        throw new InvalidInputError(`${field} is not a valid event id`);
    }
    return value;
}

function requireText(value: string, field: string): string {
    if (value.trim().length === 0) {
        throw new InvalidInputError(`${field} must not be empty`);
    }
    return value;
}

/**
 * Carries out commands against the room network. The local cache is only
 * updated by reconciling the events these commands produce.
 */
export class CommandExecutor {
    private readonly router: RoomRouter;
    private readonly cache: LocalCache;
    private readonly sessions: SessionProvider;
    private readonly identitySalt: string;
    private readonly log: Logger;

    constructor(options: CommandExecutorOptions) {
        this.router = options.router;
        this.cache = options.cache;
        this.sessions = options.sessions;
        this.identitySalt = options.identitySalt;
        this.log = options.logger ?? componentLogger('executor');
    }

    /** Fingerprint of a guest as the executor computes it for new comments. */
    fingerprintOf(email: string | null, guestToken: string): string {
        return fingerprint(email, guestToken, this.identitySalt);
    }

    execute(command: AppCommand): Promise<CommandResult> {
        switch (command.type) {
            case 'send_comment':
                return this.sendComment(command);
            case 'redact_comment':
                return this.redactComment(command);
            case 'user_delete_comment':
                return this.userDeleteComment(command);
            case 'user_edit_comment':
                return this.userEditComment(command);
        }
    }

    private async sendComment(command: SendCommentCommand): Promise<CommandResult> {
        const replyTo = command.replyTo === null ? null : requireEventId(command.replyTo, 'reply_to');
        requireText(command.content, 'content');
        requireText(command.nickname, 'nickname');
        requireText(command.guestToken, 'guest_token');

        const resolution = await this.router.resolveOrCreateThread(command.tenantId, command.slug);
        if (resolution.replacedRoomId !== null) {
            await this.cache.reassignThread(resolution.roomId, command.tenantId, command.slug);
        } else {
            await this.cache.ensureRoomMapping(resolution.roomId, command.tenantId, command.slug);
        }

        const guestFingerprint = this.fingerprintOf(command.email, command.guestToken);
        const session = await this.sessions.guest(guestFingerprint, command.nickname);
        const content = buildOutboundContent(
            { nickname: command.nickname, content: command.content, fingerprint: guestFingerprint, txnId: command.txnId },
            replyTo,
        );

        const eventId = await this.sendAs(session, resolution.roomId, content);
        this.log.info(
            { tenantId: command.tenantId, slug: command.slug, eventId, sender: session.userId },
            'comment sent',
        );
        return { eventId };
    }

    private async redactComment(command: RedactCommentCommand): Promise<CommandResult> {
        requireEventId(command.commentId, 'comment id');
        await this.redact(command.tenantId, command.slug, command.commentId, command.reason);
        return { eventId: command.commentId };
    }

    private async userDeleteComment(command: UserDeleteCommentCommand): Promise<CommandResult> {
        requireEventId(command.commentId, 'comment id');
        await this.loadOwnComment(command);
        await this.redact(command.tenantId, command.slug, command.commentId, USER_REDACTION_REASON);
        return { eventId: command.commentId };
    }

    private async userEditComment(command: UserEditCommentCommand): Promise<CommandResult> {
        requireEventId(command.commentId, 'comment id');
        requireText(command.newContent, 'content');
        const comment = await this.loadOwnComment(command);

        const roomId = await this.router.resolveThread(command.tenantId, command.slug);
        const session = this.sessions.author(comment.authorId);
        const content = buildEditContent(command.commentId, {
            nickname: comment.authorName,
            content: command.newContent,
            fingerprint: comment.authorFingerprint,
            txnId: null,
        });

        const eventId = await this.sendAs(session, roomId, content);
        this.log.info({ commentId: command.commentId, eventId, sender: session.userId }, 'comment edited');
        return { eventId };
    }

    /**
     * The comment a guest wants to change, if it is theirs.
     * @throws NotFoundError when it does not exist in that thread or is already deleted
     * @throws PermissionDeniedError when the fingerprint does not match its author
     */
    private async loadOwnComment(command: UserDeleteCommentCommand | UserEditCommentCommand): Promise<Comment> {
        const comment = await this.cache.getComment(command.commentId);
        if (
            !comment ||
            comment.isRedacted ||
            comment.tenantId !== command.tenantId ||
            comment.slug !== command.slug
        ) {
            throw new NotFoundError(`Comment ${command.commentId} not found`);
        }
        if (comment.authorFingerprint === null || comment.authorFingerprint !== command.fingerprint) {
            throw new PermissionDeniedError();
        }
        return comment;
    }

    private async redact(tenantId: TenantId, slug: string, commentId: string, reason: string | null): Promise<void> {
        const roomId = await this.router.resolveThread(tenantId, slug);
        const session = this.sessions.service();
        await this.sessions.ensureJoined(session, roomId);
        await session.redact(roomId, commentId, reason);
        this.log.info({ tenantId, slug, commentId, reason }, 'comment redacted');
    }

    private async sendAs(session: RoomSession, roomId: string, content: EventContent): Promise<string> {
        await this.sessions.ensureJoined(session, roomId);
        try {
            return await session.sendMessage(roomId, content);
        } catch (error) {
            if (error instanceof PermissionDeniedError) {
                this.sessions.forgetMembership(session, roomId);
            }
            throw error;
        }
    }
}
