import type { EventContent, RoomEvent } from '@roomthread/protocol';

export interface CreateRoomOptions {
    aliasLocalpart: string;
    name: string;
    /** Create a space (room of rooms) instead of a regular room. */
    space?: boolean;
    invite?: string[];
    /** Extra power levels on top of the creator's. */
    powerLevelUsers?: Record<string, number>;
}

export interface RemoteProfile {
    displayName: string | null;
    avatarUrl: string | null;
}

export interface SyncBatch {
    nextBatch: string;
    events: RoomEvent[];
}

/**
 * Operations performed as one identity: the service user or, through
 * application-service impersonation, one of its ghosts.
 */
export interface RoomSession {
    readonly userId: string;
    joinRoom(roomId: string): Promise<void>;
    sendMessage(roomId: string, content: EventContent): Promise<string>;
    redact(roomId: string, eventId: string, reason: string | null): Promise<string>;
    setDisplayName(displayName: string): Promise<void>;
}

/**
 * What the bridge needs from the homeserver. Failures surface as SyncError
 * subclasses: RemoteConflictError when an alias is taken, NotFoundError for
 * missing resources, RemoteTransientError for everything else.
 */
export interface RoomNetwork {
    readonly serviceUserId: string;

    /** Session acting as `userId`, or as the service user when omitted. */
    session(userId?: string): RoomSession;

    resolveAlias(alias: string): Promise<string | null>;
    deleteAlias(alias: string): Promise<void>;
    createRoom(options: CreateRoomOptions): Promise<string>;
    setSpaceChild(spaceId: string, childRoomId: string): Promise<void>;
    getProfile(userId: string): Promise<RemoteProfile | null>;
    getCanonicalAlias(roomId: string): Promise<string | null>;
    /** Registers a ghost in the application-service namespace. Already registered is success. */
    registerUser(localpart: string): Promise<void>;
    sync(since: string | null, timeoutMs: number, signal?: AbortSignal): Promise<SyncBatch>;
}
