import { z } from 'zod';
import { DEFAULT_POW_DIFFICULTY } from '@roomthread/auth';
import type { AuthConfig } from '@roomthread/auth';
import type { ServiceIdentity } from '@roomthread/protocol';

export const ENV_PREFIX = 'ROOMTHREAD_';

const booleanFlag = z
    .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
    .transform((value) => ['1', 'true', 'yes', 'on'].includes(value));

const port = z.coerce.number().int().min(0).max(65535);

// Keys are the environment variable names without the prefix
const envSchema = z
    .object({
        MODE: z.enum(['pull', 'push']).default('pull'),
        HOMESERVER_URL: z.string().url(),
        SERVER_NAME: z.string().min(1, 'SERVER_NAME is required'),
        ACCESS_TOKEN: z.string().min(1, 'ACCESS_TOKEN is required'),
        HS_TOKEN: z.string().min(1).optional(),
        BOT_LOCALPART: z.string().regex(/^[a-z0-9._=/-]+$/, 'BOT_LOCALPART must be a valid localpart').default('roomthread'),
        SPACE_PREFIX: z.string().regex(/^[a-z0-9.=-]+$/, 'SPACE_PREFIX must not contain underscores').default('space'),
        OWNER_ID: z.string().regex(/^@[^:]+:.+$/, 'OWNER_ID must be a full user id').optional(),
        IDENTITY_SALT: z.string().min(8, 'IDENTITY_SALT must be at least 8 characters'),
        POW_SECRET: z.string().min(8, 'POW_SECRET must be at least 8 characters'),
        POW_DIFFICULTY: z.coerce.number().int().min(0).max(8).default(DEFAULT_POW_DIFFICULTY),
        POW_SINGLE_USE: booleanFlag.default('true'),
        JWT_ALGORITHM: z.enum(['HS256', 'RS256']).default('HS256'),
        JWT_SECRET: z.string().min(1).optional(),
        JWT_PUBLIC_KEY_PATH: z.string().min(1).optional(),
        DATABASE_PATH: z.string().min(1).default('./data/roomthread.db'),
        HOST: z.string().default('0.0.0.0'),
        PORT: port.default(3000),
        PUSH_PORT: port.default(9000),
        COMMAND_QUEUE_SIZE: z.coerce.number().int().positive().default(100),
        COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
        SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    })
    .superRefine((env, ctx) => {
        if (env.MODE === 'push' && env.HS_TOKEN === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['HS_TOKEN'], message: 'HS_TOKEN is required in push mode' });
        }
        if (env.JWT_ALGORITHM === 'HS256' && env.JWT_SECRET === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['JWT_SECRET'], message: 'JWT_SECRET is required for HS256' });
        }
        if (env.JWT_ALGORITHM === 'RS256' && env.JWT_PUBLIC_KEY_PATH === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['JWT_PUBLIC_KEY_PATH'], message: 'JWT_PUBLIC_KEY_PATH is required for RS256' });
        }
    });

export type Env = z.infer<typeof envSchema>;

export interface MatrixConfig {
    homeserverUrl: string;
    serverName: string;
    accessToken: string;
    botLocalpart: string;
    serviceUserId: string;
    spacePrefix: string;
    ownerId: string | null;
}

export interface BridgeConfig {
    mode: 'pull' | 'push';
    matrix: MatrixConfig;
    hsToken: string | null;
    identitySalt: string;
    pow: { secret: string; difficulty: number; singleUse: boolean };
    auth: AuthConfig;
    databasePath: string;
    http: { host: string; port: number; pushPort: number };
    commands: { queueSize: number; timeoutMs: number };
    shutdownGraceMs: number;
    logLevel: string | undefined;
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

function stripPrefix(source: NodeJS.ProcessEnv): Record<string, string> {
    const stripped: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== '') {
            stripped[key.slice(ENV_PREFIX.length)] = value;
        }
    }
    return stripped;
}

/**
 * Reads `ROOMTHREAD_*` variables once at start-up.
 * @throws ConfigError listing every invalid or missing key
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): BridgeConfig {
    const result = envSchema.safeParse(stripPrefix(source));
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => `${ENV_PREFIX}${issue.path.join('.')}: ${issue.message}`),
        );
    }
    const env = result.data;

    return {
        mode: env.MODE,
        matrix: {
            homeserverUrl: env.HOMESERVER_URL.replace(/\/+$/, ''),
            serverName: env.SERVER_NAME,
            accessToken: env.ACCESS_TOKEN,
            botLocalpart: env.BOT_LOCALPART,
            serviceUserId: `@${env.BOT_LOCALPART}:${env.SERVER_NAME}`,
            spacePrefix: env.SPACE_PREFIX,
            ownerId: env.OWNER_ID ?? null,
        },
        hsToken: env.HS_TOKEN ?? null,
        identitySalt: env.IDENTITY_SALT,
        pow: { secret: env.POW_SECRET, difficulty: env.POW_DIFFICULTY, singleUse: env.POW_SINGLE_USE },
        auth: {
            algorithm: env.JWT_ALGORITHM,
            secret: env.JWT_SECRET,
            publicKeyPath: env.JWT_PUBLIC_KEY_PATH,
        },
        databasePath: env.DATABASE_PATH,
        http: { host: env.HOST, port: env.PORT, pushPort: env.PUSH_PORT },
        commands: { queueSize: env.COMMAND_QUEUE_SIZE, timeoutMs: env.COMMAND_TIMEOUT_MS },
        shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
        logLevel: env.LOG_LEVEL,
    };
}

/** The service user and the ghost namespace derived from it. */
export function serviceIdentity(config: BridgeConfig): ServiceIdentity {
    return { serviceUserId: config.matrix.serviceUserId, ghostPrefix: config.matrix.botLocalpart };
}
