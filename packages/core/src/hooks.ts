/**
 * Hook helpers
 *
 * @module hooks
 */

import type { HandleWrap, Handler, Stage } from "./types.ts";

/**
 * Collect hooks into an array for RouteOptions.before / RouteOptions.after.
 *
 * @example
 * ```typescript
 * composer.build({
 *   authMode: "none",
 *   before: wrapSlice(requestId, audit),
 *   handler,
 * });
 * ```
 */
export function wrapSlice(...hooks: HandleWrap[]): HandleWrap[] {
    return [...hooks];
}

/**
 * Turn a caller-supplied hook into a chain stage.
 */
export function hookStage(hook: HandleWrap, name: string): Stage {
    return { name, wrap: hook };
}

/**
 * Handler that does nothing. Terminates the post-hook chain.
 */
export const noopHandler: Handler = () => {};
