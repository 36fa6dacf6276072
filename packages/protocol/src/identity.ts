import { createHash } from 'crypto';
import { ALIAS_SEPARATOR } from './tenant';

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Deterministic salted hash of a guest's weak identity.
 * Names the guest's ghost user and authorizes later self-service edits and deletes.
 */
export function fingerprint(email: string | null | undefined, guestToken: string, salt: string): string {
    const normalizedEmail = (email ?? '').trim().toLowerCase();
    return createHash('sha256')
        .update(salt)
        .update('\u0000')
        .update(normalizedEmail)
        .update('\u0000')
        .update(guestToken)
        .digest('hex');
}

export function isFingerprint(value: string): boolean {
    return FINGERPRINT_PATTERN.test(value);
}

export function ghostLocalpart(prefix: string, guestFingerprint: string): string {
    return `${prefix}${ALIAS_SEPARATOR}${guestFingerprint}`;
}

export function userId(localpart: string, serverName: string): string {
    return `@${localpart}:${serverName}`;
}

export function ghostUserId(prefix: string, guestFingerprint: string, serverName: string): string {
    return userId(ghostLocalpart(prefix, guestFingerprint), serverName);
}

/**
 * Identities the bridge itself controls: the service user and every ghost
 * (`@{prefix}_...`). Used to recognise the bridge's own events.
 */
export interface ServiceIdentity {
    serviceUserId: string;
    ghostPrefix: string;
}

export function isServiceUser(identity: ServiceIdentity, sender: string): boolean {
    return sender === identity.serviceUserId;
}

export function isGhostUser(identity: ServiceIdentity, sender: string): boolean {
    return sender.startsWith(`@${identity.ghostPrefix}${ALIAS_SEPARATOR}`);
}

export function isOwnIdentity(identity: ServiceIdentity, sender: string): boolean {
    return isServiceUser(identity, sender) || isGhostUser(identity, sender);
}
