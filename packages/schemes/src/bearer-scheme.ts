/**
 * Generic bearer scheme
 *
 * Pluggable authentication for any credential type carried in a header.
 *
 * @module bearer-scheme
 */

import { Code, ConnectError } from "@connectrpc/connect";
import type { InboundRequest, Scheme } from "@interlock/core";
import { LruCache } from "./cache.ts";
import { extractBearerToken } from "./headers.ts";
import { Principal } from "./principal.ts";
import type { AuthContext, BearerSchemeOptions } from "./types.ts";

/**
 * Create a generic bearer scheme.
 *
 * Extracts credentials from the request, verifies them using a
 * user-provided callback and resolves to a Principal.
 *
 * @param options - Scheme options
 * @returns Scheme to register on a Composer
 *
 * @example Opaque token lookup
 * ```typescript
 * import { createBearerScheme } from '@interlock/schemes';
 *
 * composer.register('token', createBearerScheme({
 *   verifyCredentials: async (token) => {
 *     const session = await sessions.find(token);
 *     if (!session) throw new Error('Unknown token');
 *     return { subject: session.userId, roles: session.roles, scopes: [], claims: {}, type: 'session' };
 *   },
 *   cache: { ttl: 60_000 },
 * }));
 * ```
 */
export function createBearerScheme(options: BearerSchemeOptions): Scheme<Principal> {
    const { extractCredentials = extractBearerToken, verifyCredentials } = options;
    const cache = options.cache ? new LruCache<Principal>(options.cache) : undefined;

    return {
        async authenticate(request: InboundRequest): Promise<Principal> {
            const credentials = await extractCredentials(request);
            if (!credentials) {
                throw new ConnectError("Missing credentials", Code.Unauthenticated);
            }

            const cached = cache?.get(credentials);
            if (cached) {
                if (!cached.isExpired()) {
                    return cached;
                }
                cache?.delete(credentials);
            }

            let authContext: AuthContext;
            try {
                authContext = await verifyCredentials(credentials);
            } catch (err) {
                if (err instanceof ConnectError) {
                    throw err;
                }
                throw new ConnectError("Authentication failed", Code.Unauthenticated, undefined, undefined, err);
            }

            const principal = Principal.from(authContext);
            cache?.set(credentials, principal);
            return principal;
        },
    };
}
