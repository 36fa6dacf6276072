import type { Comment, CommentPage, CommentRecord, TenantId, ThreadKey } from '@roomthread/protocol';

export type RoomMeta = ThreadKey;

export interface Profile {
    userId: string;
    displayName: string | null;
    avatarUrl: string | null;
    lastUpdatedAt: string; // ISO timestamp
}

/** How long a cached profile is served before the network is asked again. */
export const PROFILE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Local read model of comments, room mapping, profiles and the sync cursor.
 * Never the source of truth for anything but the cursor: everything else can be rebuilt from rooms.
 */
export interface LocalCache {
    /**
     * Records which thread a room backs. Idempotent for the same mapping.
     * @throws InternalError when the room or the thread is already mapped differently
     */
    ensureRoomMapping(roomId: string, tenantId: TenantId, slug: string): Promise<void>;

    /** Moves a thread (and its comments) onto a replacement room. */
    reassignThread(roomId: string, tenantId: TenantId, slug: string): Promise<void>;

    getRoomMeta(roomId: string): Promise<RoomMeta | null>;

    /**
     * Inserts a comment or applies a newer version of it. Redacted rows and
     * rows holding a newer edit are left untouched.
     */
    upsertComment(roomId: string, record: CommentRecord): Promise<void>;

    getComment(id: string): Promise<Comment | null>;

    /**
     * Soft-deletes a comment. Returns the thread it belonged to, or null when
     * the id is unknown.
     */
    deleteComment(id: string): Promise<RoomMeta | null>;

    listComments(tenantId: TenantId, slug: string, limit: number, offset: number): Promise<CommentPage>;

    /** Returns the profile only while it is fresher than PROFILE_TTL_MS. */
    getProfile(userId: string): Promise<Profile | null>;

    putProfile(userId: string, displayName: string | null, avatarUrl: string | null): Promise<void>;

    getResumeToken(): Promise<string | null>;

    saveResumeToken(token: string): Promise<void>;

    close(): void;
}
