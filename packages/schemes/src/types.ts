/**
 * Shared types for @interlock/schemes
 *
 * @module types
 */

import type { InboundRequest } from "@interlock/core";
import type { KeyLike } from "jose";

/**
 * Authenticated identity
 *
 * Result of credential verification. Wrapped in a Principal before it is
 * attached to the request.
 */
export interface AuthContext {
    /** Authenticated subject identifier (user ID, service account, etc.) */
    readonly subject: string;
    /** Human-readable display name */
    readonly name?: string | undefined;
    /** Assigned roles (e.g., ["admin", "user"]) */
    readonly roles: ReadonlyArray<string>;
    /** Granted scopes (e.g., ["read", "write"]) */
    readonly scopes: ReadonlyArray<string>;
    /** Raw claims from the credential (JWT claims, API key metadata, etc.) */
    readonly claims: Readonly<Record<string, unknown>>;
    /** Credential type identifier (e.g., "jwt", "api-key") */
    readonly type: string;
    /** Credential expiration time */
    readonly expiresAt?: Date | undefined;
}

/**
 * LRU cache configuration for credentials verification
 */
export interface CacheOptions {
    /** Cache entry time-to-live in milliseconds */
    readonly ttl: number;
    /** Maximum number of cached entries */
    readonly maxSize?: number | undefined;
}

/**
 * Credential extractor. Returns null when the request carries no credential.
 */
export type CredentialExtractor = (request: InboundRequest) => string | null | Promise<string | null>;

/**
 * Generic bearer scheme options
 */
export interface BearerSchemeOptions {
    /**
     * Extract credentials from request.
     * Default: extracts Bearer token from Authorization header.
     */
    extractCredentials?: CredentialExtractor | undefined;

    /**
     * Verify credentials and return auth context.
     * REQUIRED. Must throw on invalid credentials.
     */
    verifyCredentials: (credentials: string) => AuthContext | Promise<AuthContext>;

    /**
     * LRU cache for credentials verification results.
     * Caches the Principal by credential string to reduce verification overhead.
     */
    cache?: CacheOptions | undefined;
}

/**
 * JWT scheme options
 */
export interface JwtSchemeOptions {
    /** JWKS endpoint URL for remote key set */
    jwksUri?: string | undefined;
    /** HMAC symmetric secret (for HS256/HS384/HS512) */
    secret?: string | undefined;
    /** Asymmetric public key (RS*, PS*, ES*, EdDSA), e.g. from jose.importSPKI() */
    publicKey?: KeyLike | undefined;
    /** Expected issuer(s) */
    issuer?: string | string[] | undefined;
    /** Expected audience(s) */
    audience?: string | string[] | undefined;
    /** Allowed algorithms */
    algorithms?: string[] | undefined;
    /**
     * Mapping from JWT claims to AuthContext fields.
     * Supports dot-notation paths (e.g., "realm_access.roles").
     */
    claimsMapping?:
        | {
              subject?: string | undefined;
              name?: string | undefined;
              roles?: string | undefined;
              scopes?: string | undefined;
          }
        | undefined;
    /**
     * Maximum token age.
     * Number (seconds) or string (e.g., "2h", "7d").
     */
    maxTokenAge?: number | string | undefined;
    /**
     * Custom token extraction.
     * Default: extracts Bearer token from Authorization header.
     */
    extractToken?: CredentialExtractor | undefined;
}

/**
 * Identity returned for a valid API key
 */
export type ApiKeyIdentity = Omit<AuthContext, "type">;

/**
 * API key scheme options
 */
export interface ApiKeySchemeOptions {
    /**
     * Header carrying the key
     * @default "x-api-key"
     */
    header?: string | undefined;
    /** Look up the key. Must throw on unknown keys. */
    verifyKey: (key: string) => ApiKeyIdentity | Promise<ApiKeyIdentity>;
    /** LRU cache for key lookups */
    cache?: CacheOptions | undefined;
}
