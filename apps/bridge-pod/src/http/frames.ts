import type { Comment, SyncNotification } from '@roomthread/protocol';
import type { Delivery } from '../sync/notification-bus';

/** What browsers receive over SSE and WebSocket. */
export type ClientMessage =
    | { type: 'new_comment'; comment: Comment }
    | { type: 'update_comment'; comment: Comment }
    | { type: 'delete_comment'; id: string }
    | { type: 'lagged'; missed: number };

export function toClientMessage(notification: SyncNotification): ClientMessage {
    if (notification.type === 'comment_deleted') {
        return { type: 'delete_comment', id: notification.commentId };
    }
    const { comment } = notification;
    return comment.updatedAt === null ? { type: 'new_comment', comment } : { type: 'update_comment', comment };
}

export function deliveryToClientMessage(delivery: Delivery): ClientMessage {
    return delivery.type === 'lagged'
        ? { type: 'lagged', missed: delivery.missed }
        : toClientMessage(delivery.notification);
}

/** Server-sent event frame: the message type is the event name, the rest is the data. */
export function toSseFrame(message: ClientMessage): string {
    const { type, ...data } = message;
    const payload = 'comment' in data ? data.comment : data;
    return `event: ${type}\ndata: ${JSON.stringify(payload)}\n\n`;
}
