import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import promBundle from 'express-prom-bundle';
import { z } from 'zod';
import { adminAuthMiddleware, type AuthConfig, type PowGuard } from '@roomthread/auth';
import {
    InvalidInputError,
    fingerprint,
    isSyncError,
    validateSlug,
    validateTenantId,
    type AppCommand,
    type CommandResult,
    type SyncErrorCode,
} from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import { register } from '../metrics';
import type { LocalCache } from '../storage/cache';
import type { CommandQueue } from '../sync/command-queue';
import { ADMIN_REDACTION_REASON } from '../sync/executor';
import type { NotificationBus } from '../sync/notification-bus';
import { sseHandler } from './sse';

export const MAX_PAGE_SIZE = 200;
export const DEFAULT_PAGE_SIZE = 50;

const STATUS_BY_CODE: Record<SyncErrorCode, number> = {
    invalid_input: 400,
    permission_denied: 403,
    admission_rejected: 403,
    not_found: 404,
    remote_transient: 502,
    remote_conflict: 502,
    internal: 500,
    command_timeout: 504,
};

// Created once: express-prom-bundle registers its metrics globally
const metricsMiddleware = promBundle({
    includeMethod: true,
    includePath: true,
    includeStatusCode: true,
    includeUp: true,
    autoregister: false,
    promClient: { collectDefaultMetrics: {} },
});

const listQuery = z.object({
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
    offset: z.coerce.number().int().min(0).default(0),
});

const guestIdentity = {
    guest_token: z.string().min(1).max(256),
    email: z.string().max(320).nullish(),
};

const postCommentBody = z.object({
    post_slug: z.string(),
    content: z.string().min(1).max(10_000),
    nickname: z.string().min(1).max(64),
    reply_to: z.string().nullish(),
    txn_id: z.string().max(128).nullish(),
    challenge_response: z.string().optional(),
    ...guestIdentity,
});

const editCommentBody = z.object({
    content: z.string().min(1).max(10_000),
    ...guestIdentity,
});

const deleteCommentBody = z.object(guestIdentity);

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
        throw new InvalidInputError(issues.join('; '));
    }
    return result.data;
}

function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

export interface HttpAppOptions {
    queue: CommandQueue;
    cache: LocalCache;
    bus: NotificationBus;
    pow: PowGuard;
    auth: AuthConfig;
    identitySalt: string;
    commandTimeoutMs: number;
    logger?: Logger;
}

/**
 * Public comment API, admin moderation and live updates over SSE.
 * Every failure ends in the error handler as `{ error, code }`.
 */
export function createHttpApp(options: HttpAppOptions): Express {
    const { queue, cache, bus, pow, auth, identitySalt, commandTimeoutMs } = options;
    const log = options.logger ?? componentLogger('http');
    const app = express();

    const submit = (command: AppCommand): Promise<CommandResult> => queue.submit(command, commandTimeoutMs);

    app.use(metricsMiddleware);
    app.use(express.json({ limit: '64kb' }));

    app.get('/health', (_req: Request, res: Response) => {
        res.status(200).send('OK');
    });

    app.get('/metrics', (_req: Request, res: Response) => {
        res.set('Content-Type', register.contentType);
        register
            .metrics()
            .then((metrics: string) => res.end(metrics))
            .catch((error: unknown) => {
                log.error({ err: error }, 'error generating metrics');
                res.status(500).end('Error generating metrics');
            });
    });

    app.get('/api/challenge', (_req: Request, res: Response) => {
        res.status(200).json({ secret: pow.issueChallenge(), difficulty: pow.difficulty });
    });

    app.get(
        '/api/:tenantId/comments/:slug',
        asyncHandler(async (req, res) => {
            const tenantId = validateTenantId(req.params.tenantId);
            const slug = validateSlug(req.params.slug);
            const { limit, offset } = parseWith(listQuery, req.query);

            res.status(200).json(await cache.listComments(tenantId, slug, limit, offset));
        }),
    );

    app.post(
        '/api/:tenantId/comments',
        asyncHandler(async (req, res) => {
            const tenantId = validateTenantId(req.params.tenantId);
            const body = parseWith(postCommentBody, req.body);
            const slug = validateSlug(body.post_slug);
            pow.admit(body.challenge_response);

            const email = body.email ?? null;
            const { eventId } = await submit({
                type: 'send_comment',
                tenantId,
                slug,
                content: body.content,
                nickname: body.nickname,
                email,
                guestToken: body.guest_token,
                replyTo: body.reply_to ?? null,
                txnId: body.txn_id ?? null,
            });

            res.status(202).json({
                status: 'accepted',
                event_id: eventId,
                fingerprint: fingerprint(email, body.guest_token, identitySalt),
            });
        }),
    );

    app.patch(
        '/api/:tenantId/comments/:slug/:commentId',
        asyncHandler(async (req, res) => {
            const tenantId = validateTenantId(req.params.tenantId);
            const slug = validateSlug(req.params.slug);
            const body = parseWith(editCommentBody, req.body);

            const { eventId } = await submit({
                type: 'user_edit_comment',
                tenantId,
                slug,
                commentId: req.params.commentId,
                newContent: body.content,
                fingerprint: fingerprint(body.email ?? null, body.guest_token, identitySalt),
            });
            res.status(200).json({ status: 'accepted', event_id: eventId });
        }),
    );

    app.delete(
        '/api/:tenantId/comments/:slug/:commentId',
        asyncHandler(async (req, res) => {
            const tenantId = validateTenantId(req.params.tenantId);
            const slug = validateSlug(req.params.slug);
            const body = parseWith(deleteCommentBody, req.body);

            await submit({
                type: 'user_delete_comment',
                tenantId,
                slug,
                commentId: req.params.commentId,
                fingerprint: fingerprint(body.email ?? null, body.guest_token, identitySalt),
            });
            res.status(200).json({ status: 'deleted' });
        }),
    );

    app.delete(
        '/api/admin/:tenantId/comments/:slug/:commentId',
        adminAuthMiddleware(auth),
        asyncHandler(async (req, res) => {
            const tenantId = validateTenantId(req.params.tenantId);
            const slug = validateSlug(req.params.slug);

            await submit({
                type: 'redact_comment',
                tenantId,
                slug,
                commentId: req.params.commentId,
                reason: ADMIN_REDACTION_REASON,
            });
            log.info({ tenantId, slug, commentId: req.params.commentId, admin: res.locals.admin }, 'comment removed by admin');
            res.status(200).json({ status: 'deleted' });
        }),
    );

    app.get('/api/:tenantId/comments/:slug/sse', sseHandler({ bus, logger: log }));

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isSyncError(error)) {
            const status = STATUS_BY_CODE[error.code];
            if (status >= 500) log.error({ err: error }, 'request failed');
            res.status(status).json({ error: error.message, code: error.code });
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body', code: 'invalid_input' });
            return;
        }
        log.error({ err: error }, 'unhandled request error');
        res.status(500).json({ error: 'Internal server error', code: 'internal' });
    });

    return app;
}
