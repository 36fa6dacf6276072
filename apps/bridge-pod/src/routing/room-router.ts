import { LRUCache } from 'lru-cache';
import {
    InvalidInputError,
    NotFoundError,
    PermissionDeniedError,
    RemoteConflictError,
    RemoteTransientError,
    roomAlias,
    spaceAliasLocalpart,
    threadAliasLocalpart,
    validateSlug,
    type TenantId,
} from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import type { CreateRoomOptions, RoomNetwork } from '../network/types';

export interface RoomRouterOptions {
    network: RoomNetwork;
    serverName: string;
    spacePrefix: string;
    /** Invited to every new room and given power level 100. */
    ownerId: string | null;
    cacheSize?: number;
    logger?: Logger;
}

export interface ThreadResolution {
    roomId: string;
    created: boolean;
    /** Room the alias pointed at before it was found stale and recreated. */
    replacedRoomId: string | null;
}

/**
 * Maps (tenant, slug) to rooms, creating the tenant space and thread rooms on demand.
 *
 * The LRU cache is only a shortcut: every miss goes back to the alias directory.
 * Concurrent resolutions of one key inside this process share a single promise;
 * races with other processes end in a taken alias, which is re-resolved.
 */
export class RoomRouter {
    private readonly network: RoomNetwork;
    private readonly serverName: string;
    private readonly spacePrefix: string;
    private readonly ownerId: string | null;
    private readonly log: Logger;
    private readonly cache: LRUCache<string, string>;
    private readonly inFlight = new Map<string, Promise<ThreadResolution>>();

    constructor(options: RoomRouterOptions) {
        this.network = options.network;
        this.serverName = options.serverName;
        this.spacePrefix = options.spacePrefix;
        this.ownerId = options.ownerId;
        this.log = options.logger ?? componentLogger('router');
        this.cache = new LRUCache<string, string>({ max: options.cacheSize ?? 10_000 });
    }

    spaceAlias(tenantId: TenantId): string {
        return roomAlias(spaceAliasLocalpart(this.spacePrefix, tenantId), this.serverName);
    }

    threadAlias(tenantId: TenantId, slug: string): string {
        return roomAlias(threadAliasLocalpart(tenantId, slug), this.serverName);
    }

    /**
     * Room id of the tenant's space, created on first use.
     */
    async resolveTenantContainer(tenantId: TenantId): Promise<string> {
        const alias = this.spaceAlias(tenantId);
        const resolution = await this.resolveOrCreate(alias, () =>
            this.network.createRoom({
                aliasLocalpart: spaceAliasLocalpart(this.spacePrefix, tenantId),
                name: tenantId,
                space: true,
                ...this.ownerOptions(),
            }),
        );
        return resolution.roomId;
    }

    /**
     * Room id of a thread. A missing room is created after the tenant space and
     * linked into it.
     */
    async resolveOrCreateThread(tenantId: TenantId, slug: string): Promise<ThreadResolution> {
        this.checkThreadKey(tenantId, slug);
        const alias = this.threadAlias(tenantId, slug);

        return this.resolveOrCreate(alias, async () => {
            const spaceId = await this.resolveTenantContainer(tenantId);
            const roomId = await this.network.createRoom({
                aliasLocalpart: threadAliasLocalpart(tenantId, slug),
                name: `Comments for ${slug}`,
                ...this.ownerOptions(),
            });
            try {
                await this.network.setSpaceChild(spaceId, roomId);
            } catch (error) {
                this.log.warn({ err: error, spaceId, roomId }, 'failed to link thread room into tenant space');
            }
            return roomId;
        });
    }

    /**
     * Room id of an existing thread.
     * @throws NotFoundError when the thread alias does not resolve
     */
    async resolveThread(tenantId: TenantId, slug: string): Promise<string> {
        this.checkThreadKey(tenantId, slug);
        const alias = this.threadAlias(tenantId, slug);

        const cached = this.cache.get(alias);
        if (cached) return cached;

        const roomId = await this.network.resolveAlias(alias);
        if (!roomId) throw new NotFoundError(`No room for thread ${tenantId}/${slug}`);
        this.cache.set(alias, roomId);
        return roomId;
    }

    invalidate(tenantId: TenantId, slug: string): void {
        this.cache.delete(this.threadAlias(tenantId, slug));
    }

    private checkThreadKey(tenantId: TenantId, slug: string) {
        validateSlug(slug);
        // `{prefix}_{tenant}` space aliases would collide with this tenant's threads
        if (tenantId === this.spacePrefix) {
            throw new InvalidInputError(`Tenant id '${tenantId}' is reserved`);
        }
    }

    private ownerOptions(): Pick<CreateRoomOptions, 'invite' | 'powerLevelUsers'> {
        if (!this.ownerId) return {};
        return { invite: [this.ownerId], powerLevelUsers: { [this.ownerId]: 100 } };
    }

    private resolveOrCreate(alias: string, create: () => Promise<string>): Promise<ThreadResolution> {
        const cached = this.cache.get(alias);
        if (cached) return Promise.resolve({ roomId: cached, created: false, replacedRoomId: null });

        const pending = this.inFlight.get(alias);
        if (pending) return pending;

        const promise = (async () => {
            try {
                const resolution = await this.resolveFresh(alias, create);
                this.cache.set(alias, resolution.roomId);
                return resolution;
            } finally {
                this.inFlight.delete(alias);
            }
        })();

        this.inFlight.set(alias, promise);
        return promise;
    }

    /**
     * `create` makes the room under `alias`; a RemoteConflictError from it means
     * someone else got there first.
     */
    private async resolveFresh(alias: string, create: () => Promise<string>): Promise<ThreadResolution> {
        let replacedRoomId: string | null = null;

        const existing = await this.network.resolveAlias(alias);
        if (existing) {
            if (await this.isJoinable(existing)) {
                return { roomId: existing, created: false, replacedRoomId: null };
            }
            this.log.warn({ alias, roomId: existing }, 'alias points at a room the service user cannot join, recreating');
            await this.network.deleteAlias(alias);
            replacedRoomId = existing;
        }

        let roomId: string;
        try {
            roomId = await create();
        } catch (error) {
            if (!(error instanceof RemoteConflictError)) throw error;

            const winner = await this.network.resolveAlias(alias);
            if (!winner) {
                throw new RemoteTransientError(`Alias ${alias} was taken but does not resolve`, { cause: error });
            }
            this.log.debug({ alias, roomId: winner }, 'lost room creation race, using the existing room');
            return { roomId: winner, created: false, replacedRoomId };
        }

        this.log.info({ alias, roomId }, 'created room');
        return { roomId, created: true, replacedRoomId };
    }

    private async isJoinable(roomId: string): Promise<boolean> {
        try {
            await this.network.session().joinRoom(roomId);
            return true;
        } catch (error) {
            if (error instanceof NotFoundError || error instanceof PermissionDeniedError) return false;
            throw error;
        }
    }
}
