/**
 * Authenticate stage
 *
 * Tries the route's schemes in order and attaches the first credential
 * obtained to a derived Call.
 *
 * @module stages/authenticate
 */

import { Code, ConnectError } from "@connectrpc/connect";
import { withCredential } from "../context.ts";
import { toAuthenticationError } from "../errors.ts";
import type { ResolvedRoute, Stage, StageContext } from "../types.ts";
import { AuthMode } from "../types.ts";

/**
 * Create the authenticate stage for a route.
 *
 * - authMode "none": no scheme is consulted.
 * - authMode "try": failures are logged and the request proceeds
 *   without a credential.
 * - authMode "required": the request proceeds only with a credential;
 *   the error of the last failed scheme is reported as unauthorized.
 *
 * The first successful scheme wins; later schemes are not called.
 */
export function createAuthenticateStage(route: Pick<ResolvedRoute, "name" | "schemes" | "authMode">, context: StageContext): Stage {
    const { registry, errorWriter, logger } = context;
    const { schemes, authMode } = route;

    return {
        name: "authenticate",
        wrap: (next) => async (call) => {
            if (authMode === AuthMode.NONE) {
                return await next(call);
            }

            if (schemes.length === 0 && authMode === AuthMode.REQUIRED) {
                await errorWriter.unauthorized(call.response, call.request, new ConnectError("No authentication scheme configured", Code.Unauthenticated));
                return;
            }

            for (const [index, schemeName] of schemes.entries()) {
                const scheme = registry.get(schemeName);
                if (!scheme) {
                    logger.error("authentication scheme not registered", { route: route.name, scheme: schemeName });
                    await errorWriter.serverError(call.response, call.request, new ConnectError(`authentication scheme not registered: ${schemeName}`, Code.Internal));
                    return;
                }

                let credential: unknown;
                let failure: ConnectError | undefined;
                try {
                    credential = await scheme.authenticate(call.request);
                } catch (err) {
                    failure = toAuthenticationError(err);
                }

                // Downstream runs outside the try: its failures are not authentication failures
                if (!failure && credential !== undefined && credential !== null) {
                    return await next(withCredential(call, credential));
                }
                failure ??= new ConnectError(`scheme ${schemeName} returned no credential`, Code.Unauthenticated);

                logger.debug("authentication attempt failed", { route: route.name, scheme: schemeName, authMode, reason: failure.rawMessage });

                if (authMode === AuthMode.REQUIRED && index === schemes.length - 1) {
                    await errorWriter.unauthorized(call.response, call.request, failure);
                    return;
                }
            }

            return await next(call);
        },
    };
}
