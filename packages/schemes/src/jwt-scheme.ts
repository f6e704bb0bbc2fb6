/**
 * JWT scheme
 *
 * Bearer JWT verification using the jose library.
 * Supports JWKS remote key sets, HMAC secrets, and asymmetric public keys.
 *
 * @module jwt-scheme
 */

import { Code, ConnectError } from "@connectrpc/connect";
import { ConfigurationError, ConfigurationErrorKind } from "@interlock/core";
import type { Scheme } from "@interlock/core";
import * as jose from "jose";
import { createBearerScheme } from "./bearer-scheme.ts";
import type { Principal } from "./principal.ts";
import type { AuthContext, JwtSchemeOptions } from "./types.ts";

/**
 * Resolve a value at a dot-notation path in an object.
 *
 * @example getNestedValue({ a: { b: [1, 2] } }, "a.b") // [1, 2]
 */
export function getNestedValue(obj: Readonly<Record<string, unknown>>, path: string): unknown {
    let current: unknown = obj;
    for (const key of path.split(".")) {
        if (current === null || typeof current !== "object" || !Object.hasOwn(current, key)) {
            return undefined;
        }
        current = Reflect.get(current, key);
    }
    return current;
}

/**
 * Get minimum HMAC key size in bytes per RFC 7518.
 * HS256 requires 32 bytes, HS384 requires 48, HS512 requires 64.
 */
function getMinHmacKeyBytes(algorithms?: string[]): number {
    if (!algorithms) return 32;
    if (algorithms.includes("HS512")) return 64;
    if (algorithms.includes("HS384")) return 48;
    return 32;
}

/**
 * Build a JWT verification function from options.
 *
 * Priority: jwksUri > publicKey > secret
 */
function buildVerifier(options: JwtSchemeOptions, verifyOptions: jose.JWTVerifyOptions): (token: string) => Promise<jose.JWTVerifyResult> {
    if (options.jwksUri) {
        const jwks = jose.createRemoteJWKSet(new URL(options.jwksUri));
        return (token) => jose.jwtVerify(token, jwks, verifyOptions);
    }
    if (options.publicKey) {
        const key = options.publicKey;
        return (token) => jose.jwtVerify(token, key, verifyOptions);
    }
    if (options.secret) {
        const key = new TextEncoder().encode(options.secret);
        const minBytes = getMinHmacKeyBytes(options.algorithms);
        if (key.byteLength < minBytes) {
            throw new ConfigurationError(
                ConfigurationErrorKind.INVALID_OPTIONS,
                `HMAC secret must be at least ${minBytes} bytes (${minBytes * 8} bits) per RFC 7518, got ${key.byteLength} bytes`,
                { minBytes, actualBytes: key.byteLength },
            );
        }
        return (token) => jose.jwtVerify(token, key, verifyOptions);
    }
    throw new ConfigurationError(ConfigurationErrorKind.INVALID_OPTIONS, "JWT scheme requires one of: jwksUri, secret, or publicKey");
}

function readStrings(value: unknown): string[] | undefined {
    if (typeof value === "string") {
        return value.split(" ").filter(Boolean);
    }
    if (Array.isArray(value)) {
        return value.filter((v): v is string => typeof v === "string");
    }
    return undefined;
}

/**
 * Map verified JWT claims to AuthContext.
 *
 * Roles accept an array claim; scopes accept a space-separated string or an array.
 */
export function mapClaims(payload: jose.JWTPayload, mapping: NonNullable<JwtSchemeOptions["claimsMapping"]>): AuthContext {
    const claims: Record<string, unknown> = payload;

    const mappedSubject = mapping.subject ? getNestedValue(claims, mapping.subject) : undefined;
    const subject = typeof mappedSubject === "string" ? mappedSubject : payload.sub;
    if (!subject) {
        throw new ConnectError("JWT missing subject claim", Code.Unauthenticated);
    }

    const mappedName = getNestedValue(claims, mapping.name ?? "name");
    const rolesValue = mapping.roles ? getNestedValue(claims, mapping.roles) : undefined;
    const scopes = readStrings(getNestedValue(claims, mapping.scopes ?? "scope")) ?? [];

    return {
        subject,
        name: typeof mappedName === "string" ? mappedName : undefined,
        roles: Array.isArray(rolesValue) ? rolesValue.filter((r): r is string => typeof r === "string") : [],
        scopes,
        claims,
        type: "jwt",
        expiresAt: payload.exp ? new Date(payload.exp * 1000) : undefined,
    };
}

/**
 * Create a JWT scheme.
 *
 * Convenience wrapper around createBearerScheme() that handles
 * verification via jose and claim mapping to a Principal.
 *
 * @param options - JWT options
 * @throws ConfigurationError when no key source is given or the HMAC secret is too short
 *
 * @example JWKS-based JWT auth (Auth0, Keycloak, etc.)
 * ```typescript
 * import { createJwtScheme } from '@interlock/schemes';
 *
 * composer.register('bearer', createJwtScheme({
 *   jwksUri: 'https://auth.example.com/.well-known/jwks.json',
 *   issuer: 'https://auth.example.com/',
 *   audience: 'my-api',
 *   claimsMapping: { roles: 'realm_access.roles' },
 * }));
 * ```
 */
export function createJwtScheme(options: JwtSchemeOptions): Scheme<Principal> {
    const { claimsMapping = {} } = options;

    const verifyOptions: jose.JWTVerifyOptions = {};
    if (options.issuer) {
        verifyOptions.issuer = options.issuer;
    }
    if (options.audience) {
        verifyOptions.audience = options.audience;
    }
    if (options.algorithms) {
        verifyOptions.algorithms = options.algorithms;
    }
    if (options.maxTokenAge) {
        verifyOptions.maxTokenAge = options.maxTokenAge;
    }

    const verify = buildVerifier(options, verifyOptions);

    return createBearerScheme({
        extractCredentials: options.extractToken,
        verifyCredentials: async (token: string): Promise<AuthContext> => {
            const { payload } = await verify(token);
            return mapClaims(payload, claimsMapping);
        },
    });
}
