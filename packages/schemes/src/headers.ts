/**
 * Header helpers
 *
 * @module headers
 */

import type { InboundRequest } from "@interlock/core";

/**
 * Read a request header by name (case-insensitive).
 * Repeated headers yield their first value.
 */
export function getHeader(request: InboundRequest, name: string): string | undefined {
    const value = request.headers[name.toLowerCase()];
    if (Array.isArray(value)) {
        return value[0];
    }
    return value;
}

/**
 * Default credential extractor.
 * Extracts Bearer token from Authorization header.
 */
export function extractBearerToken(request: InboundRequest): string | null {
    const authHeader = getHeader(request, "authorization");
    if (!authHeader) {
        return null;
    }

    const match = /^Bearer\s+(.+)$/i.exec(authHeader);
    return match?.[1] ?? null;
}
