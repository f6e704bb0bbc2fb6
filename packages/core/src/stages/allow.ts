/**
 * Allow stage
 *
 * Content-type gate for requests that carry a body.
 *
 * @module stages/allow
 */

import { ContentTypeError } from "../errors.ts";
import type { InboundRequest, ResolvedRoute, Stage, StageContext } from "../types.ts";

/**
 * Methods that bypass the content-type check.
 */
export const BODYLESS_METHODS: ReadonlySet<string> = new Set(["GET", "HEAD", "DELETE"]);

/**
 * Read the request content type. Empty string when absent.
 */
export function getContentType(request: InboundRequest): string {
    const value: string | string[] | undefined = request.headers["content-type"];
    if (Array.isArray(value)) {
        return value[0] ?? "";
    }
    return value ?? "";
}

/**
 * Check a content type against an allow-list by substring containment,
 * so "application/json" accepts "application/json; charset=utf-8".
 */
export function isContentTypeAllowed(contentType: string, allow: ReadonlyArray<string>): boolean {
    return allow.some((allowed) => contentType.includes(allowed));
}

/**
 * Create the allow stage for a route.
 *
 * An empty allow-list rejects every body-bearing request.
 */
export function createAllowStage(route: Pick<ResolvedRoute, "allow">, context: Pick<StageContext, "errorWriter">): Stage {
    const { errorWriter } = context;
    const { allow } = route;

    return {
        name: "allow",
        wrap: (next) => async (call) => {
            const method = (call.request.method ?? "").toUpperCase();
            if (!BODYLESS_METHODS.has(method)) {
                const contentType = getContentType(call.request);
                if (!isContentTypeAllowed(contentType, allow)) {
                    await errorWriter.badRequest(call.response, call.request, new ContentTypeError(contentType));
                    return;
                }
            }
            return await next(call);
        },
    };
}
