import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
    NotFoundError,
    PermissionDeniedError,
    RemoteConflictError,
    RemoteTransientError,
    isSyncError,
    parseRoomEvent,
    MESSAGE_EVENT_TYPE,
    REDACTION_EVENT_TYPE,
    type RoomEvent,
    type SyncError,
} from '@roomthread/protocol';
import type { CreateRoomOptions, RemoteProfile, RoomNetwork, RoomSession, SyncBatch } from './types';

const CLIENT_API = '/_matrix/client/v3';

const SPACE_CHILD_EVENT_TYPE = 'm.space.child';
const CANONICAL_ALIAS_EVENT_TYPE = 'm.room.canonical_alias';

const matrixErrorSchema = z.object({
    errcode: z.string(),
    error: z.string().optional(),
});

const roomIdResponse = z.object({ room_id: z.string() });
const eventIdResponse = z.object({ event_id: z.string() });
const profileResponse = z.object({
    displayname: z.string().nullish(),
    avatar_url: z.string().nullish(),
});
const canonicalAliasResponse = z.object({ alias: z.string().nullish() });
const syncResponse = z.object({
    next_batch: z.string(),
    rooms: z
        .object({
            join: z
                .record(
                    z.object({
                        timeline: z.object({ events: z.array(z.unknown()).default([]) }).optional(),
                    }),
                )
                .optional(),
        })
        .optional(),
});

// Only timeline events the reconciler understands
const SYNC_FILTER = JSON.stringify({
    presence: { types: [] },
    account_data: { types: [] },
    room: {
        timeline: { types: [MESSAGE_EVENT_TYPE, REDACTION_EVENT_TYPE] },
        state: { types: [] },
        ephemeral: { types: [] },
        account_data: { types: [] },
    },
});

export interface MatrixClientOptions {
    homeserverUrl: string;
    accessToken: string;
    serviceUserId: string;
    serverName: string;
    /** Impersonate ghosts with the `user_id` query parameter (application-service token). */
    appService: boolean;
    requestTimeoutMs?: number;
    adapter?: AxiosAdapter;
}

const segment = encodeURIComponent;

function describeFailure(what: string, error: unknown): string {
    if (axios.isAxiosError(error)) {
        const body = matrixErrorSchema.safeParse(error.response?.data);
        const reason = body.success ? body.data.errcode : (error.response?.status ?? error.code ?? 'network error');
        const detail = body.success && body.data.error ? `: ${body.data.error}` : '';
        return `${what} failed (${reason})${detail}`;
    }
    return `${what} failed: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Maps a homeserver failure onto the bridge's error taxonomy.
 */
export function toRemoteError(what: string, error: unknown): SyncError {
    if (isSyncError(error)) return error;

    const message = describeFailure(what, error);
    if (axios.isAxiosError(error)) {
        const body = matrixErrorSchema.safeParse(error.response?.data);
        const errcode = body.success ? body.data.errcode : undefined;
        if (errcode === 'M_ROOM_IN_USE') return new RemoteConflictError(message, { cause: error });
        if (error.response?.status === 404 || errcode === 'M_NOT_FOUND') return new NotFoundError(message);
        if (errcode === 'M_FORBIDDEN') return new PermissionDeniedError(message);
    }
    return new RemoteTransientError(message, { cause: error });
}

function matrixErrcode(error: unknown): string | null {
    if (!axios.isAxiosError(error)) return null;
    const body = matrixErrorSchema.safeParse(error.response?.data);
    return body.success ? body.data.errcode : null;
}

/**
 * RoomNetwork over the Matrix client-server API.
 */
export class MatrixClient implements RoomNetwork {
    readonly serviceUserId: string;
    private readonly http: AxiosInstance;
    private readonly serverName: string;
    private readonly appService: boolean;

    constructor(options: MatrixClientOptions) {
        this.serviceUserId = options.serviceUserId;
        this.serverName = options.serverName;
        this.appService = options.appService;
        this.http = axios.create({
            baseURL: `${options.homeserverUrl}${CLIENT_API}`,
            timeout: options.requestTimeoutMs ?? 30_000,
            headers: { Authorization: `Bearer ${options.accessToken}` },
            adapter: options.adapter,
        });
    }

    private async call<T extends z.ZodTypeAny>(
        what: string,
        config: AxiosRequestConfig,
        schema: T,
    ): Promise<z.infer<T>> {
        let data: unknown;
        try {
            data = (await this.http.request<unknown>(config)).data;
        } catch (error) {
            throw toRemoteError(what, error);
        }
        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new RemoteTransientError(`${what} returned an unexpected response`, { cause: parsed.error });
        }
        return parsed.data;
    }

    private actingAs(userId: string): AxiosRequestConfig['params'] {
        return this.appService && userId !== this.serviceUserId ? { user_id: userId } : undefined;
    }

    session(userId: string = this.serviceUserId): RoomSession {
        const params = this.actingAs(userId);
        const ignore = z.unknown();

        return {
            userId,
            joinRoom: async (roomId) => {
                await this.call('join room', { method: 'POST', url: `/join/${segment(roomId)}`, params, data: {} }, ignore);
            },
            sendMessage: async (roomId, content) => {
                const { event_id } = await this.call(
                    'send message',
                    {
                        method: 'PUT',
                        url: `/rooms/${segment(roomId)}/send/${MESSAGE_EVENT_TYPE}/${segment(uuidv4())}`,
                        params,
                        data: content,
                    },
                    eventIdResponse,
                );
                return event_id;
            },
            redact: async (roomId, eventId, reason) => {
                const { event_id } = await this.call(
                    'redact event',
                    {
                        method: 'PUT',
                        url: `/rooms/${segment(roomId)}/redact/${segment(eventId)}/${segment(uuidv4())}`,
                        params,
                        data: reason === null ? {} : { reason },
                    },
                    eventIdResponse,
                );
                return event_id;
            },
            setDisplayName: async (displayName) => {
                await this.call(
                    'set display name',
                    { method: 'PUT', url: `/profile/${segment(userId)}/displayname`, params, data: { displayname: displayName } },
                    ignore,
                );
            },
        };
    }

    async resolveAlias(alias: string): Promise<string | null> {
        try {
            const { room_id } = await this.call(
                'resolve alias',
                { method: 'GET', url: `/directory/room/${segment(alias)}` },
                roomIdResponse,
            );
            return room_id;
        } catch (error) {
            if (error instanceof NotFoundError) return null;
            throw error;
        }
    }

    async deleteAlias(alias: string): Promise<void> {
        await this.call('delete alias', { method: 'DELETE', url: `/directory/room/${segment(alias)}` }, z.unknown());
    }

    async createRoom(options: CreateRoomOptions): Promise<string> {
        const data: Record<string, unknown> = {
            room_alias_name: options.aliasLocalpart,
            name: options.name,
            preset: 'public_chat',
        };
        if (options.space) data.creation_content = { type: 'm.space' };
        if (options.invite && options.invite.length > 0) data.invite = options.invite;
        if (options.powerLevelUsers) {
            data.power_level_content_override = {
                users: { [this.serviceUserId]: 100, ...options.powerLevelUsers },
            };
        }

        const { room_id } = await this.call('create room', { method: 'POST', url: '/createRoom', data }, roomIdResponse);
        return room_id;
    }

    async setSpaceChild(spaceId: string, childRoomId: string): Promise<void> {
        await this.call(
            'link space child',
            {
                method: 'PUT',
                url: `/rooms/${segment(spaceId)}/state/${SPACE_CHILD_EVENT_TYPE}/${segment(childRoomId)}`,
                data: { via: [this.serverName] },
            },
            z.unknown(),
        );
    }

    async getProfile(userId: string): Promise<RemoteProfile | null> {
        try {
            const profile = await this.call('get profile', { method: 'GET', url: `/profile/${segment(userId)}` }, profileResponse);
            return { displayName: profile.displayname ?? null, avatarUrl: profile.avatar_url ?? null };
        } catch (error) {
            if (error instanceof NotFoundError) return null;
            throw error;
        }
    }

    async getCanonicalAlias(roomId: string): Promise<string | null> {
        try {
            const { alias } = await this.call(
                'get canonical alias',
                { method: 'GET', url: `/rooms/${segment(roomId)}/state/${CANONICAL_ALIAS_EVENT_TYPE}` },
                canonicalAliasResponse,
            );
            return alias ?? null;
        } catch (error) {
            if (error instanceof NotFoundError) return null;
            throw error;
        }
    }

    async registerUser(localpart: string): Promise<void> {
        try {
            await this.http.post('/register', {
                type: 'm.login.application_service',
                username: localpart,
                inhibit_login: true,
            });
        } catch (error) {
            if (matrixErrcode(error) === 'M_USER_IN_USE') return;
            throw toRemoteError('register user', error);
        }
    }

    async sync(since: string | null, timeoutMs: number, signal?: AbortSignal): Promise<SyncBatch> {
        const response = await this.call(
            'sync',
            {
                method: 'GET',
                url: '/sync',
                params: { since: since ?? undefined, timeout: timeoutMs, filter: SYNC_FILTER },
                timeout: timeoutMs + 10_000,
                signal,
            },
            syncResponse,
        );

        const events: RoomEvent[] = [];
        for (const [roomId, room] of Object.entries(response.rooms?.join ?? {})) {
            for (const raw of room.timeline?.events ?? []) {
                const event = parseRoomEvent(raw, roomId);
                if (event) events.push(event);
            }
        }
        return { nextBatch: response.next_batch, events };
    }
}
