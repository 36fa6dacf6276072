import jwt, { type SignOptions, type VerifyOptions } from 'jsonwebtoken';
import fs from 'fs';
import path from 'path';
import type { RequestHandler } from 'express';

export * from './pow';

/** Role a token must carry to reach moderation endpoints. */
export const ADMIN_ROLE = 'admin';

// Types for JWT payloads
export interface JWTPayload {
    sub: string;
    role?: string;
    exp?: number;
    iat?: number;
}

export interface AuthConfig {
    algorithm: 'HS256' | 'RS256';
    secret?: string;
    privateKeyPath?: string;
    publicKeyPath?: string;
    expiresIn?: SignOptions['expiresIn'];
}

/**
 * Get the secret key or read the private/public key files based on the algorithm
 * @param forSigning - Whether the key is for signing (true) or verification (false)
 */
function getKey(config: AuthConfig, forSigning: boolean): string | Buffer {
    const { algorithm, secret, privateKeyPath, publicKeyPath } = config;

    if (algorithm === 'HS256') {
        if (!secret) throw new Error('JWT secret not set for HS256 algorithm');
        return secret;
    }

    const keyPath = forSigning ? privateKeyPath : publicKeyPath;
    if (!keyPath) {
        throw new Error(`JWT ${forSigning ? 'private' : 'public'} key path not set for RS256 algorithm`);
    }
    return fs.readFileSync(path.resolve(keyPath));
}

function isJWTPayload(decoded: unknown): decoded is JWTPayload {
    if (typeof decoded !== 'object' || decoded === null || !('sub' in decoded)) return false;
    if (typeof decoded.sub !== 'string') return false;
    return !('role' in decoded) || decoded.role === undefined || typeof decoded.role === 'string';
}

/**
 * Sign a payload and return a JWT string
 */
export function sign(payload: JWTPayload, config: AuthConfig): string {
    const key = getKey(config, true);

    const options: SignOptions = {
        algorithm: config.algorithm,
    };

    if (config.expiresIn !== undefined) {
        options.expiresIn = config.expiresIn;
    }

    return jwt.sign(payload, key, options);
}

/**
 * Verify a JWT and return the decoded payload
 * @throws when the signature, expiry or claims are invalid
 */
export function verify(token: string, config: AuthConfig): JWTPayload {
    const key = getKey(config, false);

    const options: VerifyOptions = {
        algorithms: [config.algorithm],
    };

    const decoded = jwt.verify(token, key, options);
    if (!isJWTPayload(decoded)) {
        throw new Error('Token payload is missing a subject');
    }
    return decoded;
}

/**
 * Generate a moderator token
 */
export function generateAdminToken(subject: string, config: AuthConfig): string {
    return sign({ sub: subject, role: ADMIN_ROLE }, config);
}

/**
 * Express middleware guarding admin routes. Missing or invalid tokens get 401,
 * valid tokens without the admin role get 403. The decoded payload is left in
 * `res.locals.admin`.
 */
export function adminAuthMiddleware(config: AuthConfig): RequestHandler {
    return (req, res, next) => {
        const authHeader = req.headers.authorization;

        if (!authHeader) {
            res.status(401).json({ error: 'No authorization header provided', code: 'unauthorized' });
            return;
        }

        const [scheme, token] = authHeader.split(' ');
        if (scheme !== 'Bearer' || !token) {
            res.status(401).json({ error: 'No token provided', code: 'unauthorized' });
            return;
        }

        let decoded: JWTPayload;
        try {
            decoded = verify(token, config);
        } catch {
            res.status(401).json({ error: 'Invalid or expired token', code: 'unauthorized' });
            return;
        }

        if (decoded.role !== ADMIN_ROLE) {
            res.status(403).json({ error: 'Admin role required', code: 'forbidden' });
            return;
        }

        res.locals.admin = decoded;
        next();
    };
}
