import { InvalidInputError } from './errors';

/**
 * Identifier of a site that embeds comment threads.
 * Only obtainable through validateTenantId.
 */
export type TenantId = string & { readonly __brand: 'TenantId' };

/** Separator between tenant and slug in room aliases; never valid inside a tenant id. */
export const ALIAS_SEPARATOR = '_';

export const MAX_TENANT_ID_LENGTH = 64;
export const MAX_SLUG_LENGTH = 128;

const TENANT_CHARSET = /^[a-z0-9.-]+$/;
const SLUG_FORBIDDEN = /[\s:#/\u0000-\u001f\u007f]/;

function tenantIdProblem(input: string): string | null {
    if (input.length === 0) return 'Tenant id must not be empty';
    if (input.includes(ALIAS_SEPARATOR)) {
        return "Tenant id cannot contain underscores ('_'). Use hyphens ('-') or dots ('.') instead.";
    }
    if (!TENANT_CHARSET.test(input)) return 'Tenant id contains invalid characters';
    if (input.length > MAX_TENANT_ID_LENGTH) {
        return `Tenant id is too long (max ${MAX_TENANT_ID_LENGTH} chars)`;
    }
    return null;
}

export function isTenantId(input: string): input is TenantId {
    return tenantIdProblem(input) === null;
}

export function validateTenantId(input: string): TenantId {
    if (isTenantId(input)) return input;
    throw new InvalidInputError(tenantIdProblem(input) ?? 'Invalid tenant id');
}

export function validateSlug(input: string): string {
    if (input.length === 0) {
        throw new InvalidInputError('Slug must not be empty');
    }
    if (input.length > MAX_SLUG_LENGTH) {
        throw new InvalidInputError(`Slug is too long (max ${MAX_SLUG_LENGTH} chars)`);
    }
    if (SLUG_FORBIDDEN.test(input)) {
        throw new InvalidInputError('Slug contains invalid characters');
    }
    return input;
}

export interface ThreadKey {
    tenantId: TenantId;
    slug: string;
}

export function threadKeyString({ tenantId, slug }: ThreadKey): string {
    return `${tenantId}${ALIAS_SEPARATOR}${slug}`;
}

/** Localpart of the alias naming a thread room: `{tenant}_{slug}`. */
export function threadAliasLocalpart(tenantId: TenantId, slug: string): string {
    return threadKeyString({ tenantId, slug });
}

/** Localpart of the alias naming a tenant's space: `{prefix}_{tenant}`. */
export function spaceAliasLocalpart(spacePrefix: string, tenantId: TenantId): string {
    return `${spacePrefix}${ALIAS_SEPARATOR}${tenantId}`;
}

export function roomAlias(localpart: string, serverName: string): string {
    return `#${localpart}:${serverName}`;
}

/**
 * Recovers the thread key from a thread alias (`#demo.example_hello:server` or
 * its bare localpart). Returns null for anything that is not a thread alias.
 */
export function parseThreadAlias(alias: string): ThreadKey | null {
    const localpart = alias.replace(/^#/, '').split(':')[0] ?? '';
    const separator = localpart.indexOf(ALIAS_SEPARATOR);
    if (separator <= 0 || separator === localpart.length - 1) return null;

    const tenant = localpart.slice(0, separator);
    const slug = localpart.slice(separator + 1);
    if (!isTenantId(tenant)) return null;
    return { tenantId: tenant, slug };
}
