import * as fs from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { DELETED_AUTHOR_NAME, InternalError, validateTenantId } from '@roomthread/protocol';
import type { Comment, CommentPage, CommentRecord, TenantId } from '@roomthread/protocol';
import { componentLogger, type Logger } from '../logger';
import { PROFILE_TTL_MS, type LocalCache, type Profile, type RoomMeta } from './cache';

const RESUME_TOKEN_KEY = 'sync_token';

interface RoomRow {
    room_id: string;
    tenant_id: string;
    slug: string;
}

interface CommentRow {
    id: string;
    tenant_id: string;
    slug: string;
    author_id: string;
    author_name: string;
    author_fingerprint: string | null;
    avatar_url: string | null;
    is_guest: number;
    content: string;
    is_redacted: number;
    reply_to: string | null;
    created_at: string;
    updated_at: string | null;
    txn_id: string | null;
}

interface ProfileRow {
    user_id: string;
    display_name: string | null;
    avatar_url: string | null;
    last_updated_at: string;
}

const COMMENT_COLUMNS = `
    c.id, r.tenant_id, r.slug, c.author_id, c.author_name, c.author_fingerprint,
    c.avatar_url, c.is_guest, c.content, c.is_redacted, c.reply_to,
    c.created_at, c.updated_at, c.txn_id
`;

function toComment(row: CommentRow): Comment {
    return {
        id: row.id,
        tenantId: validateTenantId(row.tenant_id),
        slug: row.slug,
        authorId: row.author_id,
        authorName: row.author_name,
        avatarUrl: row.avatar_url,
        isGuest: row.is_guest === 1,
        authorFingerprint: row.author_fingerprint,
        content: row.content,
        isRedacted: row.is_redacted === 1,
        replyTo: row.reply_to,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        txnId: row.txn_id,
    };
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export interface SqliteCacheOptions {
    logger?: Logger;
    /** Milliseconds since the epoch. */
    clock?: () => number;
}

/**
 * better-sqlite3 backed LocalCache. Pass `:memory:` for a throwaway database.
 */
export class SqliteCache implements LocalCache {
    private readonly db: Database.Database;
    private readonly log: Logger;
    private readonly clock: () => number;

    constructor(dbPath: string, options: SqliteCacheOptions = {}) {
        this.log = options.logger ?? componentLogger('cache');
        this.clock = options.clock ?? Date.now;

        if (dbPath !== ':memory:') {
            fs.mkdirSync(dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.pragma('foreign_keys = ON');
        this.initSchema();
        this.log.info({ dbPath }, 'local cache opened');
    }

    private initSchema() {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS meta (
                key TEXT PRIMARY KEY,
                value TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS rooms (
                room_id TEXT PRIMARY KEY,
                tenant_id TEXT NOT NULL,
                slug TEXT NOT NULL,
                UNIQUE (tenant_id, slug)
            );

            CREATE TABLE IF NOT EXISTS profiles (
                user_id TEXT PRIMARY KEY,
                display_name TEXT,
                avatar_url TEXT,
                last_updated_at TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS comments (
                id TEXT PRIMARY KEY,
                room_id TEXT NOT NULL,
                author_id TEXT NOT NULL,
                author_name TEXT NOT NULL,
                author_fingerprint TEXT,
                avatar_url TEXT,
                is_guest INTEGER NOT NULL DEFAULT 0,
                content TEXT NOT NULL,
                is_redacted INTEGER NOT NULL DEFAULT 0,
                reply_to TEXT,
                created_at TEXT NOT NULL,
                updated_at TEXT,
                txn_id TEXT,
                raw_event TEXT,
                FOREIGN KEY (room_id) REFERENCES rooms(room_id) ON UPDATE CASCADE
            );

            CREATE INDEX IF NOT EXISTS idx_comments_room_created ON comments(room_id, created_at);
            CREATE INDEX IF NOT EXISTS idx_comments_txn_id ON comments(txn_id) WHERE txn_id IS NOT NULL;
        `);
    }

    async ensureRoomMapping(roomId: string, tenantId: TenantId, slug: string): Promise<void> {
        const existing = this.db
            .prepare<[string], RoomRow>('SELECT room_id, tenant_id, slug FROM rooms WHERE room_id = ?')
            .get(roomId);

        if (existing) {
            if (existing.tenant_id === tenantId && existing.slug === slug) return;
            throw new InternalError(
                `Room ${roomId} already backs ${existing.tenant_id}/${existing.slug}, refusing to map it to ${tenantId}/${slug}`,
            );
        }

        try {
            this.db
                .prepare('INSERT INTO rooms (room_id, tenant_id, slug) VALUES (?, ?, ?)')
                .run(roomId, tenantId, slug);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new InternalError(`Thread ${tenantId}/${slug} is already backed by another room`, { cause: error });
            }
            throw error;
        }
    }

    async reassignThread(roomId: string, tenantId: TenantId, slug: string): Promise<void> {
        const reassign = this.db.transaction(() => {
            const moved = this.db
                .prepare('UPDATE rooms SET room_id = ? WHERE tenant_id = ? AND slug = ?')
                .run(roomId, tenantId, slug);
            if (moved.changes === 0) {
                this.db.prepare('INSERT INTO rooms (room_id, tenant_id, slug) VALUES (?, ?, ?)').run(roomId, tenantId, slug);
            }
        });
        reassign();
        this.log.warn({ roomId, tenantId, slug }, 'thread moved to a replacement room');
    }

    async getRoomMeta(roomId: string): Promise<RoomMeta | null> {
        const row = this.db
            .prepare<[string], RoomRow>('SELECT room_id, tenant_id, slug FROM rooms WHERE room_id = ?')
            .get(roomId);
        return row ? { tenantId: validateTenantId(row.tenant_id), slug: row.slug } : null;
    }

    async upsertComment(roomId: string, record: CommentRecord): Promise<void> {
        const upsert = this.db.transaction(() => {
            this.db
                .prepare('INSERT INTO rooms (room_id, tenant_id, slug) VALUES (?, ?, ?) ON CONFLICT(room_id) DO NOTHING')
                .run(roomId, record.tenantId, record.slug);

            this.db
                .prepare(
                    `INSERT INTO comments (
                        id, room_id, author_id, author_name, author_fingerprint, avatar_url,
                        is_guest, content, is_redacted, reply_to, created_at, updated_at, txn_id, raw_event
                    )
                    VALUES (
                        @id, @roomId, @authorId, @authorName, @authorFingerprint, @avatarUrl,
                        @isGuest, @content, @isRedacted, @replyTo, @createdAt, @updatedAt, @txnId, @rawEvent
                    )
                    ON CONFLICT(id) DO UPDATE SET
                        content = excluded.content,
                        updated_at = excluded.updated_at,
                        author_name = excluded.author_name,
                        avatar_url = excluded.avatar_url
                    WHERE comments.is_redacted = 0
                      AND (
                        (excluded.updated_at IS NOT NULL
                            AND (comments.updated_at IS NULL OR excluded.updated_at >= comments.updated_at))
                        OR (excluded.updated_at IS NULL AND comments.updated_at IS NULL)
                      )`,
                )
                .run({
                    id: record.id,
                    roomId,
                    authorId: record.authorId,
                    authorName: record.authorName,
                    authorFingerprint: record.authorFingerprint,
                    avatarUrl: record.avatarUrl,
                    isGuest: record.isGuest ? 1 : 0,
                    content: record.content,
                    isRedacted: record.isRedacted ? 1 : 0,
                    replyTo: record.replyTo,
                    createdAt: record.createdAt,
                    updatedAt: record.updatedAt,
                    txnId: record.txnId,
                    rawEvent: record.rawEvent,
                });
        });
        upsert();
    }

    async getComment(id: string): Promise<Comment | null> {
        const row = this.db
            .prepare<[string], CommentRow>(
                `SELECT ${COMMENT_COLUMNS} FROM comments c JOIN rooms r ON c.room_id = r.room_id WHERE c.id = ?`,
            )
            .get(id);
        return row ? toComment(row) : null;
    }

    async deleteComment(id: string): Promise<RoomMeta | null> {
        const softDelete = this.db.transaction((): RoomRow | undefined => {
            const meta = this.db
                .prepare<[string], RoomRow>(
                    `SELECT r.room_id, r.tenant_id, r.slug
                     FROM comments c JOIN rooms r ON c.room_id = r.room_id
                     WHERE c.id = ? AND c.is_redacted = 0`,
                )
                .get(id);
            if (!meta) return undefined;

            this.db
                .prepare(
                    `UPDATE comments
                     SET content = '', author_name = ?, is_redacted = 1, avatar_url = NULL
                     WHERE id = ?`,
                )
                .run(DELETED_AUTHOR_NAME, id);
            return meta;
        });

        const meta = softDelete();
        return meta ? { tenantId: validateTenantId(meta.tenant_id), slug: meta.slug } : null;
    }

    async listComments(tenantId: TenantId, slug: string, limit: number, offset: number): Promise<CommentPage> {
        const rows = this.db
            .prepare<[string, string, number, number], CommentRow>(
                `SELECT ${COMMENT_COLUMNS}
                 FROM comments c JOIN rooms r ON c.room_id = r.room_id
                 WHERE r.tenant_id = ? AND r.slug = ?
                 ORDER BY c.created_at ASC, c.id ASC
                 LIMIT ? OFFSET ?`,
            )
            .all(tenantId, slug, limit, offset);

        const count = this.db
            .prepare<[string, string], { total: number }>(
                `SELECT COUNT(*) AS total
                 FROM comments c JOIN rooms r ON c.room_id = r.room_id
                 WHERE r.tenant_id = ? AND r.slug = ?`,
            )
            .get(tenantId, slug);

        return { items: rows.map(toComment), total: count?.total ?? 0 };
    }

    async getProfile(userId: string): Promise<Profile | null> {
        const threshold = new Date(this.clock() - PROFILE_TTL_MS).toISOString();
        const row = this.db
            .prepare<[string, string], ProfileRow>(
                `SELECT user_id, display_name, avatar_url, last_updated_at
                 FROM profiles WHERE user_id = ? AND last_updated_at > ?`,
            )
            .get(userId, threshold);

        if (!row) return null;
        return {
            userId: row.user_id,
            displayName: row.display_name,
            avatarUrl: row.avatar_url,
            lastUpdatedAt: row.last_updated_at,
        };
    }

    async putProfile(userId: string, displayName: string | null, avatarUrl: string | null): Promise<void> {
        this.db
            .prepare(
                `INSERT INTO profiles (user_id, display_name, avatar_url, last_updated_at)
                 VALUES (?, ?, ?, ?)
                 ON CONFLICT(user_id) DO UPDATE SET
                    display_name = excluded.display_name,
                    avatar_url = excluded.avatar_url,
                    last_updated_at = excluded.last_updated_at`,
            )
            .run(userId, displayName, avatarUrl, new Date(this.clock()).toISOString());
    }

    async getResumeToken(): Promise<string | null> {
        const row = this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(RESUME_TOKEN_KEY);
        return row?.value ?? null;
    }

    async saveResumeToken(token: string): Promise<void> {
        this.db
            .prepare('INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
            .run(RESUME_TOKEN_KEY, token);
    }

    close(): void {
        this.db.close();
    }
}
