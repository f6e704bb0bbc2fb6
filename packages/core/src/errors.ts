/**
 * Error types
 *
 * Build-time errors (ConfigurationError) abort startup. Run-time errors are
 * ConnectErrors handed to the ErrorWriter, never thrown across stages.
 *
 * @module errors
 */

import { Code, ConnectError } from "@connectrpc/connect";

/**
 * Sanitizable error interface.
 *
 * Errors implementing this protocol carry rich server-side details
 * but expose only a safe message to clients.
 */
export interface SanitizableError {
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;
}

/**
 * Type guard for SanitizableError.
 *
 * Checks if the value is an object with clientMessage (string) and
 * serverDetails (non-null object) properties, plus a numeric code.
 */
export function isSanitizableError(err: unknown): err is Error & SanitizableError & { code: number } {
    if (err == null || typeof err !== "object") return false;
    if (!("clientMessage" in err) || !("serverDetails" in err) || !("code" in err)) return false;
    return typeof err.clientMessage === "string" && typeof err.serverDetails === "object" && err.serverDetails !== null && typeof err.code === "number";
}

/**
 * Configuration error kinds reported by Composer#build().
 */
export const ConfigurationErrorKind = {
    INVALID_AUTH_MODE: "InvalidAuthMode",
    ROLES_REQUIRE_AUTH_REQUIRED: "RolesRequireAuthRequired",
    UNREGISTERED_SCHEME: "UnregisteredScheme",
    INVALID_OPTIONS: "InvalidOptions",
} as const;

export type ConfigurationErrorKind = (typeof ConfigurationErrorKind)[keyof typeof ConfigurationErrorKind];

/**
 * Invalid or insecure route configuration.
 *
 * Thrown while building handlers. Treat as fatal: a process that
 * catches it and keeps serving runs with an unenforced policy.
 */
export class ConfigurationError extends Error {
    readonly kind: ConfigurationErrorKind;
    readonly detail: unknown;

    constructor(kind: ConfigurationErrorKind, message: string, detail?: unknown) {
        super(message);
        this.name = "ConfigurationError";
        this.kind = kind;
        this.detail = detail;
    }
}

/**
 * None of the required roles is held by the credential.
 *
 * Carries the required roles server-side while exposing only
 * "Access denied" to the client via SanitizableError protocol.
 */
export class MissingRolesError extends ConnectError implements SanitizableError {
    readonly clientMessage = "Access denied";
    readonly requiredRoles: readonly string[];

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { requiredRoles: this.requiredRoles };
    }

    constructor(requiredRoles: readonly string[]) {
        super(`missing required roles: ${requiredRoles.join(" ")}`, Code.PermissionDenied);
        this.name = "MissingRolesError";
        this.requiredRoles = [...requiredRoles];
    }
}

/**
 * Request content type is not in the route's allow-list.
 */
export class ContentTypeError extends ConnectError {
    readonly contentType: string;

    constructor(contentType: string) {
        super(`invalid request content-type: ${contentType}`, Code.InvalidArgument);
        this.name = "ContentTypeError";
        this.contentType = contentType;
    }
}

/**
 * Normalise a failed authentication attempt.
 *
 * Unauthenticated ConnectErrors pass through; anything else, including a
 * ConnectError of another code, becomes Unauthenticated with the original
 * failure as cause. The client only sees the generic message.
 */
export function toAuthenticationError(err: unknown): ConnectError {
    if (err instanceof ConnectError && err.code === Code.Unauthenticated) {
        return err;
    }
    return new ConnectError("Authentication failed", Code.Unauthenticated, undefined, undefined, err);
}
