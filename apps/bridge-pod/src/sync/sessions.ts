import { LRUCache } from 'lru-cache';
import { ghostLocalpart, isGhostUser, userId, type ServiceIdentity } from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import type { RoomNetwork, RoomSession } from '../network/types';

export interface SessionProviderOptions {
    network: RoomNetwork;
    identity: ServiceIdentity;
    serverName: string;
    /**
     * Act as per-guest ghosts (application-service mode). Without it every
     * command runs as the service user.
     */
    impersonate: boolean;
    cacheSize?: number;
    logger?: Logger;
}

/**
 * Hands out the identity a command acts as and keeps track of which
 * identities are known to be registered, named and joined.
 */
export class SessionProvider {
    private readonly network: RoomNetwork;
    private readonly identity: ServiceIdentity;
    private readonly serverName: string;
    private readonly impersonate: boolean;
    private readonly log: Logger;
    private readonly registered: LRUCache<string, true>;
    private readonly displayNames: LRUCache<string, string>;
    private readonly memberships: LRUCache<string, true>;

    constructor(options: SessionProviderOptions) {
        this.network = options.network;
        this.identity = options.identity;
        this.serverName = options.serverName;
        this.impersonate = options.impersonate;
        this.log = options.logger ?? componentLogger('sessions');

        const max = options.cacheSize ?? 10_000;
        this.registered = new LRUCache<string, true>({ max });
        this.displayNames = new LRUCache<string, string>({ max });
        this.memberships = new LRUCache<string, true>({ max });
    }

    service(): RoomSession {
        return this.network.session();
    }

    /**
     * Session of the ghost named after `fingerprint`, registered on first use.
     * The display name is refreshed whenever it changes; failing to set it is logged only.
     */
    async guest(fingerprint: string, displayName: string): Promise<RoomSession> {
        if (!this.impersonate) return this.service();

        const localpart = ghostLocalpart(this.identity.ghostPrefix, fingerprint);
        const ghostId = userId(localpart, this.serverName);
        if (!this.registered.has(ghostId)) {
            await this.network.registerUser(localpart);
            this.registered.set(ghostId, true);
        }

        const session = this.network.session(ghostId);
        if (this.displayNames.get(ghostId) !== displayName) {
            try {
                await session.setDisplayName(displayName);
                this.displayNames.set(ghostId, displayName);
            } catch (error) {
                this.log.warn({ err: error, userId: ghostId }, 'failed to set ghost display name');
            }
        }
        return session;
    }

    /**
     * Session of the user who wrote a comment, so that edits come from the original poster.
     * Comments by anyone the bridge does not control fall back to the service user.
     */
    author(authorId: string): RoomSession {
        if (this.impersonate && isGhostUser(this.identity, authorId)) {
            return this.network.session(authorId);
        }
        return this.service();
    }

    /** Joins `roomId` unless this identity is already known to be a member. */
    async ensureJoined(session: RoomSession, roomId: string): Promise<void> {
        const key = `${session.userId}|${roomId}`;
        if (this.memberships.has(key)) return;
        await session.joinRoom(roomId);
        this.memberships.set(key, true);
    }

    /** Forgets a membership after the network rejected an action in that room. */
    forgetMembership(session: RoomSession, roomId: string): void {
        this.memberships.delete(`${session.userId}|${roomId}`);
    }
}
