import {
    COMMENT_METADATA_KEY,
    extractCommentData,
    isGhostUser,
    isOwnIdentity,
    parseRelation,
    parseThreadAlias,
    type CommentRecord,
    type EventContent,
    type MessageEvent,
    type RedactionEvent,
    type RoomEvent,
    type ServiceIdentity,
} from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import { trackEvent, type ReconcileResult } from '../metrics';
import type { RoomNetwork } from '../network/types';
import type { LocalCache, RoomMeta } from '../storage/cache';
import type { NotificationBus } from './notification-bus';

export interface EventReconcilerOptions {
    cache: LocalCache;
    network: RoomNetwork;
    bus: NotificationBus;
    identity: ServiceIdentity;
    /**
     * Map rooms missing from the cache through their canonical alias. Used in
     * pull mode, where the sync stream includes rooms joined before this
     * cache existed.
     */
    lookupUnknownRooms: boolean;
    logger?: Logger;
}

const EDIT_BODY_PREFIX = '* ';

function toIso(timestamp: number): string {
    return new Date(timestamp).toISOString();
}

/**
 * Applies inbound room events to the local cache and announces the changes.
 * Every write is idempotent, so re-delivered events are harmless.
 */
export class EventReconciler {
    private readonly cache: LocalCache;
    private readonly network: RoomNetwork;
    private readonly bus: NotificationBus;
    private readonly identity: ServiceIdentity;
    private readonly lookupUnknownRooms: boolean;
    private readonly log: Logger;
    /** Last pending reconcile per room; the next event of that room waits for it. */
    private readonly roomTails = new Map<string, Promise<void>>();

    constructor(options: EventReconcilerOptions) {
        this.cache = options.cache;
        this.network = options.network;
        this.bus = options.bus;
        this.identity = options.identity;
        this.lookupUnknownRooms = options.lookupUnknownRooms;
        this.log = options.logger ?? componentLogger('reconciler');
    }

    /**
     * Reconciles rooms concurrently and each room's events in order; one event
     * failing never affects the others.
     */
    async reconcileBatch(events: RoomEvent[]): Promise<void> {
        await Promise.all(events.map((event) => this.reconcile(event)));
    }

    /**
     * Applies the event once every earlier event of its room has been applied,
     * so an edit never overtakes the comment it targets. Never rejects:
     * failures are logged and counted.
     */
    reconcile(event: RoomEvent): Promise<ReconcileResult> {
        const { roomId } = event;
        const previous = this.roomTails.get(roomId) ?? Promise.resolve();
        const applied = previous.then(() => this.apply(event));
        const tail: Promise<void> = applied.then(() => {
            if (this.roomTails.get(roomId) === tail) this.roomTails.delete(roomId);
        });
        this.roomTails.set(roomId, tail);
        return applied;
    }

    private async apply(event: RoomEvent): Promise<ReconcileResult> {
        let result: ReconcileResult;
        try {
            result = event.kind === 'message' ? await this.applyMessage(event) : await this.applyRedaction(event);
        } catch (error) {
            this.log.error({ err: error, eventId: event.eventId, roomId: event.roomId }, 'failed to reconcile event');
            result = 'failed';
        }
        trackEvent(event.kind, result);
        return result;
    }

    private async roomMeta(roomId: string): Promise<RoomMeta | null> {
        const known = await this.cache.getRoomMeta(roomId);
        if (known || !this.lookupUnknownRooms) return known;

        const alias = await this.network.getCanonicalAlias(roomId);
        const thread = alias ? parseThreadAlias(alias) : null;
        if (!thread) return null;

        await this.cache.ensureRoomMapping(roomId, thread.tenantId, thread.slug);
        this.log.info({ roomId, alias }, 'mapped room from its canonical alias');
        return thread;
    }

    private async applyMessage(event: MessageEvent): Promise<ReconcileResult> {
        const relation = parseRelation(event.content);
        const isEdit = relation?.type === 'replace';

        // the bridge's own comments and edits carry metadata; anything else from a ghost is an echo
        if (isGhostUser(this.identity, event.sender) && !isEdit && !(COMMENT_METADATA_KEY in event.content)) {
            return 'skipped';
        }

        const meta = await this.roomMeta(event.roomId);
        if (!meta) {
            this.log.warn({ roomId: event.roomId, eventId: event.eventId }, 'event from an unmapped room dropped');
            return 'skipped';
        }

        let commentId = event.eventId;
        let updatedAt: string | null = null;
        let source: EventContent = event.content;
        if (relation?.type === 'replace') {
            commentId = relation.eventId;
            updatedAt = toIso(event.originServerTs);
            source = relation.newContent ?? this.strippedEditBody(event.content);

            const target = await this.cache.getComment(commentId);
            if (target && target.authorId !== event.sender && !isOwnIdentity(this.identity, event.sender)) {
                this.log.warn({ commentId, sender: event.sender }, 'edit by someone other than the author ignored');
                return 'skipped';
            }
        }

        const extracted = extractCommentData(source, event.sender, this.identity.serviceUserId);
        if (!extracted) return 'skipped';
        if (extracted.content.trim().length === 0) return 'skipped';

        let authorName = extracted.authorName;
        let avatarUrl: string | null = null;
        if (!extracted.isGuest) {
            const profile = await this.profileOf(event.sender);
            authorName = profile.displayName ?? authorName;
            avatarUrl = profile.avatarUrl;
        }

        const replyTo = relation?.type === 'reply' ? relation.eventId : null;
        const record: CommentRecord = {
            id: commentId,
            tenantId: meta.tenantId,
            slug: meta.slug,
            authorId: event.sender,
            authorName,
            avatarUrl,
            isGuest: extracted.isGuest,
            authorFingerprint: extracted.authorFingerprint,
            content: extracted.content,
            isRedacted: false,
            replyTo,
            createdAt: toIso(event.originServerTs),
            updatedAt,
            txnId: extracted.txnId,
            rawEvent: JSON.stringify(event.content),
        };

        await this.cache.upsertComment(event.roomId, record);

        // re-read: the stored row may be redacted or hold a newer edit
        const stored = await this.cache.getComment(commentId);
        if (!stored || stored.isRedacted) return 'skipped';

        this.bus.publish({ type: 'comment_saved', tenantId: meta.tenantId, slug: meta.slug, comment: stored });
        return 'saved';
    }

    private async applyRedaction(event: RedactionEvent): Promise<ReconcileResult> {
        if (event.redacts === null) return 'skipped';

        const meta = await this.cache.deleteComment(event.redacts);
        if (!meta) return 'skipped';

        this.bus.publish({ type: 'comment_deleted', tenantId: meta.tenantId, slug: meta.slug, commentId: event.redacts });
        return 'deleted';
    }

    /** Cached profile, refreshed from the network on a miss. Lookup failures leave both fields null. */
    private async profileOf(userId: string): Promise<{ displayName: string | null; avatarUrl: string | null }> {
        const cached = await this.cache.getProfile(userId);
        if (cached) return cached;

        try {
            const profile = await this.network.getProfile(userId);
            const displayName = profile?.displayName ?? null;
            const avatarUrl = profile?.avatarUrl ?? null;
            await this.cache.putProfile(userId, displayName, avatarUrl);
            return { displayName, avatarUrl };
        } catch (error) {
            this.log.warn({ err: error, userId }, 'profile lookup failed');
            return { displayName: null, avatarUrl: null };
        }
    }

    private strippedEditBody(content: EventContent): EventContent {
        const body = typeof content.body === 'string' ? content.body : '';
        return { ...content, body: body.startsWith(EDIT_BODY_PREFIX) ? body.slice(EDIT_BODY_PREFIX.length) : body };
    }
}
