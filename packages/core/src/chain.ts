/**
 * Chain builder
 *
 * Assembles the fixed stage order
 * authenticate → authorize → allow → before hooks → handler,
 * and composes after hooks into a separate post-handler.
 *
 * @module chain
 */

import { hookStage, noopHandler } from "./hooks.ts";
import { createAllowStage } from "./stages/allow.ts";
import { createAuthenticateStage } from "./stages/authenticate.ts";
import { createAuthorizeStage } from "./stages/authorize.ts";
import type { HandleWrap, Handler, ResolvedRoute, Stage, StageContext } from "./types.ts";

/**
 * Build the ordered stage list for a validated route.
 */
export function buildStages(route: ResolvedRoute, context: StageContext): Stage[] {
    return [
        createAuthenticateStage(route, context),
        createAuthorizeStage(route, context),
        createAllowStage(route, context),
        ...route.before.map((hook, index) => hookStage(hook, `before[${index}]`)),
    ];
}

/**
 * Fold stages around a handler. The first stage ends up outermost.
 */
export function composeStages(stages: ReadonlyArray<Stage>, handler: Handler): Handler {
    return stages.reduceRight<Handler>((next, stage) => stage.wrap(next), handler);
}

/**
 * Fold after hooks into one handler. The last hook is innermost and
 * continues into a no-op, so an empty list yields the no-op itself.
 */
export function composeHooks(hooks: ReadonlyArray<HandleWrap>): Handler {
    return hooks.reduceRight<Handler>((next, hook) => hook(next), noopHandler);
}
