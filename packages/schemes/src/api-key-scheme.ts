/**
 * API key scheme
 *
 * @module api-key-scheme
 */

import type { Scheme } from "@interlock/core";
import { createBearerScheme } from "./bearer-scheme.ts";
import { getHeader } from "./headers.ts";
import type { Principal } from "./principal.ts";
import type { ApiKeySchemeOptions } from "./types.ts";

/**
 * Create an API key scheme.
 *
 * Reads the key from a header (x-api-key by default) and resolves it
 * through verifyKey. The resulting Principal has type "api-key".
 *
 * @example
 * ```typescript
 * const apiKey = createApiKeyScheme({
 *   verifyKey: async (key) => {
 *     const client = await clients.findByKey(key);
 *     if (!client) throw new Error('Invalid API key');
 *     return { subject: client.id, roles: client.roles, scopes: [], claims: {} };
 *   },
 * });
 * ```
 */
export function createApiKeyScheme(options: ApiKeySchemeOptions): Scheme<Principal> {
    const header = options.header ?? "x-api-key";
    const { verifyKey } = options;

    return createBearerScheme({
        extractCredentials: (request) => getHeader(request, header) ?? null,
        verifyCredentials: async (key) => ({ ...(await verifyKey(key)), type: "api-key" }),
        cache: options.cache,
    });
}
