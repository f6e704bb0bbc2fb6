/**
 * @interlock/schemes
 *
 * Ready-made authentication schemes for @interlock/core:
 * - createBearerScheme(): generic, pluggable credential verification
 * - createJwtScheme(): JWT verification with jose
 * - createApiKeyScheme(): API key header lookup
 *
 * Every scheme resolves to a Principal, which implements the Roler
 * capability used by the authorize stage.
 *
 * @module @interlock/schemes
 */

export { createApiKeyScheme } from "./api-key-scheme.ts";
export { createBearerScheme } from "./bearer-scheme.ts";
export type { LruCacheOptions } from "./cache.ts";
export { LruCache } from "./cache.ts";
export { extractBearerToken, getHeader } from "./headers.ts";
export { createJwtScheme, getNestedValue, mapClaims } from "./jwt-scheme.ts";
export { Principal } from "./principal.ts";

export type { ApiKeyIdentity, ApiKeySchemeOptions, AuthContext, BearerSchemeOptions, CacheOptions, CredentialExtractor, JwtSchemeOptions } from "./types.ts";
