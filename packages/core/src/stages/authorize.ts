/**
 * Authorize stage
 *
 * Role check against the credential attached by the authenticate stage.
 *
 * @module stages/authorize
 */

import { Code, ConnectError } from "@connectrpc/connect";
import { isRoler } from "../context.ts";
import { MissingRolesError } from "../errors.ts";
import type { ResolvedRoute, Stage, StageContext } from "../types.ts";

/**
 * Create the authorize stage for a route.
 *
 * Roles use "any-of" semantics: the credential must hold at least one
 * of the required roles. A route without roles passes through.
 *
 * A missing credential, or one without hasRole(), is reported as a server
 * error: it means authentication was not enforced for a route that needs it.
 */
export function createAuthorizeStage(route: Pick<ResolvedRoute, "name" | "roles">, context: Pick<StageContext, "errorWriter" | "logger">): Stage {
    const { errorWriter, logger } = context;
    const { roles } = route;

    return {
        name: "authorize",
        wrap: (next) => async (call) => {
            if (roles.length === 0) {
                return await next(call);
            }

            const credential = call.credential;
            if (!isRoler(credential)) {
                logger.error("request credential does not implement Roler", { route: route.name });
                await errorWriter.serverError(call.response, call.request, new ConnectError("request credential does not implement Roler", Code.Internal));
                return;
            }

            for (const role of roles) {
                if (await credential.hasRole(role)) {
                    return await next(call);
                }
            }

            await errorWriter.forbidden(call.response, call.request, new MissingRolesError(roles));
        },
    };
}
