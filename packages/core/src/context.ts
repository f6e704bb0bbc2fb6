/**
 * Per-request context
 *
 * A Call is created for every request and handed down the chain explicitly.
 * Credentials are attached by deriving a new Call, never by mutation, so a
 * Call seen by one stage cannot change under another.
 *
 * @module context
 */

import { Code, ConnectError } from "@connectrpc/connect";
import type { Call, InboundRequest, ResponseSink, Roler } from "./types.ts";

/**
 * Create the root Call for a request.
 */
export function createCall(request: InboundRequest, response: ResponseSink): Call {
    return Object.freeze({ request, response });
}

/**
 * Derive a Call carrying the given credential.
 */
export function withCredential(call: Call, credential: unknown): Call {
    return Object.freeze({ request: call.request, response: call.response, credential });
}

/**
 * Get the credential attached by the authenticate stage.
 *
 * Returns undefined when the route does not authenticate, or when
 * every scheme failed under authMode "try".
 *
 * @example Usage in a handler
 * ```typescript
 * const handler: Handler = (call) => {
 *   const credential = getCredential(call);
 *   call.response.end(credential ? "hello again" : "hello stranger");
 * };
 * ```
 */
export function getCredential(call: Call): unknown {
    return call.credential;
}

/**
 * Get the credential or throw.
 *
 * @param call - Current call
 * @param guard - Optional type guard narrowing the credential
 * @throws ConnectError with Code.Unauthenticated if no credential is attached
 * @throws ConnectError with Code.Internal if the guard rejects the credential
 */
export function requireCredential(call: Call): NonNullable<unknown>;
export function requireCredential<T>(call: Call, guard: (value: unknown) => value is T): T;
export function requireCredential<T>(call: Call, guard?: (value: unknown) => value is T): unknown {
    const credential = call.credential;
    if (credential === undefined || credential === null) {
        throw new ConnectError("Authentication required", Code.Unauthenticated);
    }
    if (guard && !guard(credential)) {
        throw new ConnectError("Unexpected credential type", Code.Internal);
    }
    return credential;
}

/**
 * Type guard for the role-membership capability.
 */
export function isRoler(value: unknown): value is Roler {
    return typeof value === "object" && value !== null && "hasRole" in value && typeof value.hasRole === "function";
}
