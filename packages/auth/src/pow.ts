import { createHash, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { LRUCache } from 'lru-cache';
import { AdmissionRejectedError } from '@roomthread/protocol';

export const DEFAULT_POW_DIFFICULTY = 4;
export const DEFAULT_MAX_CHALLENGE_AGE_SECONDS = 300;
export const DEFAULT_MAX_FUTURE_SKEW_SECONDS = 30;

const RESPONSE_SEPARATOR = '|';
const HEX_PATTERN = /^[0-9a-f]+$/;

export interface PowGuardOptions {
    secret: string;
    difficulty?: number;
    maxAgeSeconds?: number;
    maxFutureSkewSeconds?: number;
    /** Remember verified challenges until they expire and refuse them a second time. */
    singleUse?: boolean;
    maxTrackedChallenges?: number;
    /** Milliseconds since the epoch. */
    clock?: () => number;
}

export interface ChallengeResponse {
    challenge: string;
    proof: string;
}

/**
 * Splits the `challenge|proof` form a client submits. Returns null when either half is missing.
 */
export function parseChallengeResponse(response: string): ChallengeResponse | null {
    const separator = response.lastIndexOf(RESPONSE_SEPARATOR);
    if (separator <= 0 || separator === response.length - 1) return null;
    return {
        challenge: response.slice(0, separator),
        proof: response.slice(separator + 1),
    };
}

export function proofHash(challenge: string, proof: string): string {
    return createHash('sha256').update(`${challenge}${proof}`).digest('hex');
}

/**
 * Brute-forces a proof for `challenge`. What a client does in the browser; used by tests and tooling.
 */
export function solveChallenge(challenge: string, difficulty: number): string {
    const target = '0'.repeat(difficulty);
    for (let nonce = 0; ; nonce++) {
        const proof = nonce.toString();
        if (proofHash(challenge, proof).startsWith(target)) return proof;
    }
}

/**
 * Stateless proof-of-work admission gate.
 *
 * A challenge is `hex(unix seconds).hex(8 random bytes).base64url(HMAC-SHA256)`;
 * a proof is any string whose `sha256(challenge + proof)` starts with
 * `difficulty` hex zeros.
 */
export class PowGuard {
    readonly difficulty: number;
    private readonly secret: string;
    private readonly maxAgeSeconds: number;
    private readonly maxFutureSkewSeconds: number;
    private readonly clock: () => number;
    private readonly consumed: LRUCache<string, true> | null;

    constructor(options: PowGuardOptions) {
        this.secret = options.secret;
        this.difficulty = options.difficulty ?? DEFAULT_POW_DIFFICULTY;
        this.maxAgeSeconds = options.maxAgeSeconds ?? DEFAULT_MAX_CHALLENGE_AGE_SECONDS;
        this.maxFutureSkewSeconds = options.maxFutureSkewSeconds ?? DEFAULT_MAX_FUTURE_SKEW_SECONDS;
        this.clock = options.clock ?? Date.now;
        this.consumed = options.singleUse
            ? new LRUCache<string, true>({
                  max: options.maxTrackedChallenges ?? 100_000,
                  ttl: this.maxAgeSeconds * 1000,
              })
            : null;
    }

    issueChallenge(): string {
        const payload = `${this.nowSeconds().toString(16)}.${randomBytes(8).toString('hex')}`;
        return `${payload}.${this.sign(payload)}`;
    }

    verify(challenge: string, proof: string): boolean {
        const parts = challenge.split('.');
        if (parts.length !== 3) return false;
        const [timestampHex, randomHex, signature] = parts;
        if (!HEX_PATTERN.test(timestampHex) || !HEX_PATTERN.test(randomHex)) return false;

        const issuedAt = parseInt(timestampHex, 16);
        const now = this.nowSeconds();
        if (issuedAt > now + this.maxFutureSkewSeconds || now - issuedAt > this.maxAgeSeconds) {
            return false;
        }

        if (!this.signatureMatches(`${timestampHex}.${randomHex}`, signature)) return false;
        if (!proofHash(challenge, proof).startsWith('0'.repeat(this.difficulty))) return false;

        if (this.consumed) {
            if (this.consumed.has(challenge)) return false;
            this.consumed.set(challenge, true);
        }
        return true;
    }

    /**
     * Checks a `challenge|proof` response.
     * @throws AdmissionRejectedError when it is missing, malformed or invalid
     */
    admit(response: string | undefined): void {
        const parsed = response === undefined ? null : parseChallengeResponse(response);
        if (!parsed || !this.verify(parsed.challenge, parsed.proof)) {
            throw new AdmissionRejectedError();
        }
    }

    private nowSeconds(): number {
        return Math.floor(this.clock() / 1000);
    }

    private sign(payload: string): string {
        return createHmac('sha256', this.secret).update(payload).digest('base64url');
    }

    private signatureMatches(payload: string, provided: string): boolean {
        const expected = Buffer.from(this.sign(payload));
        const actual = Buffer.from(provided);
        return expected.length === actual.length && timingSafeEqual(expected, actual);
    }
}
