import { z } from 'zod';

/** Content of a room event, kept as an open JSON object. */
export type EventContent = Record<string, unknown>;

export const MESSAGE_EVENT_TYPE = 'm.room.message';
export const REDACTION_EVENT_TYPE = 'm.room.redaction';

const MAX_EVENT_ID_LENGTH = 255;
const EVENT_ID_PATTERN = /^\$[A-Za-z0-9+/=_.:-]+$/;

const contentSchema = z.record(z.unknown());

const baseEventSchema = z.object({
    event_id: z.string(),
    sender: z.string(),
    origin_server_ts: z.number(),
    room_id: z.string().optional(),
});

const wireEventSchema = z.discriminatedUnion('type', [
    baseEventSchema.extend({
        type: z.literal(MESSAGE_EVENT_TYPE),
        content: contentSchema,
    }),
    baseEventSchema.extend({
        type: z.literal(REDACTION_EVENT_TYPE),
        // room versions up to 10 carry the target at the top level, 11 moved it into content
        redacts: z.string().optional(),
        content: z
            .object({
                redacts: z.string().optional(),
                reason: z.string().optional(),
            })
            .passthrough()
            .default({}),
    }),
]);

const relatesToSchema = z
    .object({
        rel_type: z.string().optional(),
        event_id: z.string().optional(),
        'm.in_reply_to': z.object({ event_id: z.string() }).optional(),
    })
    .passthrough();

interface BaseRoomEvent {
    eventId: string;
    roomId: string;
    sender: string;
    originServerTs: number;
}

export interface MessageEvent extends BaseRoomEvent {
    kind: 'message';
    content: EventContent;
}

export interface RedactionEvent extends BaseRoomEvent {
    kind: 'redaction';
    redacts: string | null;
    reason: string | null;
}

export type RoomEvent = MessageEvent | RedactionEvent;

export type Relation =
    | { type: 'replace'; eventId: string; newContent: EventContent | null }
    | { type: 'reply'; eventId: string };

export function isValidEventId(value: string): boolean {
    return value.length <= MAX_EVENT_ID_LENGTH && EVENT_ID_PATTERN.test(value);
}

export function isEventContent(value: unknown): value is EventContent {
    return contentSchema.safeParse(value).success;
}

/**
 * Parses a raw timeline event into one of the kinds the bridge reconciles.
 * Events from /sync carry no room id, so the caller passes the room they were listed under.
 * Returns null for other event types and for anything malformed.
 */
export function parseRoomEvent(raw: unknown, roomId?: string): RoomEvent | null {
    const parsed = wireEventSchema.safeParse(raw);
    if (!parsed.success) return null;

    const event = parsed.data;
    const resolvedRoomId = event.room_id ?? roomId;
    if (resolvedRoomId === undefined) return null;

    const base: BaseRoomEvent = {
        eventId: event.event_id,
        roomId: resolvedRoomId,
        sender: event.sender,
        originServerTs: event.origin_server_ts,
    };

    if (event.type === MESSAGE_EVENT_TYPE) {
        return { ...base, kind: 'message', content: event.content };
    }
    return {
        ...base,
        kind: 'redaction',
        redacts: event.redacts ?? event.content.redacts ?? null,
        reason: event.content.reason ?? null,
    };
}

/**
 * Reads `m.relates_to` from message content. Edits win over replies when both are present.
 */
export function parseRelation(content: EventContent): Relation | null {
    const parsed = relatesToSchema.safeParse(content['m.relates_to']);
    if (!parsed.success) return null;

    const relatesTo = parsed.data;
    if (relatesTo.rel_type === 'm.replace' && relatesTo.event_id !== undefined) {
        const newContent = content['m.new_content'];
        return {
            type: 'replace',
            eventId: relatesTo.event_id,
            newContent: isEventContent(newContent) ? newContent : null,
        };
    }
    const inReplyTo = relatesTo['m.in_reply_to'];
    if (inReplyTo !== undefined) {
        return { type: 'reply', eventId: inReplyTo.event_id };
    }
    return null;
}
