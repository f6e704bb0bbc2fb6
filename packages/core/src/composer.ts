/**
 * Composer
 *
 * Owns the scheme registry and turns RouteOptions into composed handlers.
 *
 * @module composer
 */

import { Code, ConnectError } from "@connectrpc/connect";
import { z } from "zod";
import { buildStages, composeHooks, composeStages } from "./chain.ts";
import { parseEnvConfig } from "./config/envSchema.ts";
import { createCall } from "./context.ts";
import { createJsonErrorWriter } from "./error-writer.ts";
import { ConfigurationError, ConfigurationErrorKind } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { getLogger } from "./logger.ts";
import { SchemeRegistry } from "./registry.ts";
import type { Call, ComposedHandler, ErrorWriter, HandleWrap, Handler, ResolvedRoute, RouteOptions, Scheme, StageContext } from "./types.ts";
import { AuthMode } from "./types.ts";

const AuthModeSchema = z.enum([AuthMode.REQUIRED, AuthMode.TRY, AuthMode.NONE]);

const isFunction = (value: unknown): boolean => typeof value === "function";

/**
 * Shape of RouteOptions, for options assembled from untyped sources.
 */
const RouteShapeSchema = z.object({
    name: z.string().default("anonymous"),
    allow: z.array(z.string()).default([]),
    roles: z.array(z.string()).default([]),
    schemes: z.array(z.string()).default([]),
    before: z.array(z.custom<HandleWrap>(isFunction, "hook must be a function")).default([]),
    after: z.array(z.custom<HandleWrap>(isFunction, "hook must be a function")).default([]),
    handler: z.custom<Handler>(isFunction, "handler must be a function"),
});

/**
 * Result of Composer#tryBuild().
 *
 * A failed result is still fatal: log it and abort startup.
 */
export type BuildResult = { readonly ok: true; readonly handler: ComposedHandler } | { readonly ok: false; readonly error: ConfigurationError };

/**
 * Composer construction options
 */
export interface ComposerOptions {
    /**
     * Renders failures onto the response.
     * @default createJsonErrorWriter()
     */
    errorWriter?: ErrorWriter | undefined;
    /**
     * @default getLogger("interlock") at LOG_LEVEL
     */
    logger?: Logger | undefined;
    /** Schemes to register, in key order */
    schemes?: Readonly<Record<string, Scheme>> | undefined;
    /**
     * Default scheme name.
     * @default AUTH_DEFAULT_SCHEME environment variable
     */
    defaultScheme?: string | undefined;
    /**
     * Environment to read configuration from.
     * @default process.env
     */
    env?: Record<string, string | undefined> | undefined;
}

/**
 * Fault raised by a handler or hook, mapped onto the matching ErrorWriter operation.
 */
async function reportFault(errorWriter: ErrorWriter, call: Call, err: unknown): Promise<void> {
    const error = ConnectError.from(err, Code.Internal);
    const { response, request } = call;
    switch (error.code) {
        case Code.Unauthenticated:
            return await errorWriter.unauthorized(response, request, error);
        case Code.PermissionDenied:
            return await errorWriter.forbidden(response, request, error);
        case Code.InvalidArgument:
            return await errorWriter.badRequest(response, request, error);
        default:
            return await errorWriter.serverError(response, request, error);
    }
}

export class Composer {
    readonly #registry: SchemeRegistry;
    readonly #errorWriter: ErrorWriter;
    readonly #logger: Logger;
    #built = false;

    constructor(options: { errorWriter: ErrorWriter; logger: Logger; registry?: SchemeRegistry | undefined }) {
        this.#registry = options.registry ?? new SchemeRegistry();
        this.#errorWriter = options.errorWriter;
        this.#logger = options.logger;
    }

    get registry(): SchemeRegistry {
        return this.#registry;
    }

    /**
     * Register a scheme by name. It can then be listed in RouteOptions.schemes.
     *
     * Register everything at startup. Registering after a handler was built
     * works (handlers resolve schemes per request) but is logged.
     */
    register(name: string, scheme: Scheme): void {
        if (this.#built) {
            this.#logger.warn("scheme registered after handlers were built", { scheme: name });
        }
        this.#registry.register(name, scheme);
    }

    /**
     * Set the scheme tried by routes that list no schemes.
     *
     * @throws ConfigurationError (UnregisteredScheme) if the name is not registered
     */
    setDefault(name: string): void {
        this.#registry.setDefault(name);
    }

    /**
     * Build a composed handler.
     *
     * @throws ConfigurationError for an invalid or insecure configuration.
     * Do not catch it: the process must not serve with this route misconfigured.
     *
     * @example
     * ```typescript
     * const composer = createComposer({ schemes: { bearer: createJwtScheme({ secret }) } });
     *
     * const handler = composer.build({
     *   name: 'create-invoice',
     *   schemes: ['bearer'],
     *   authMode: 'required',
     *   roles: ['billing', 'admin'],
     *   allow: ['application/json'],
     *   handler: async (call) => {
     *     call.response.statusCode = 201;
     *     call.response.end();
     *   },
     * });
     *
     * http.createServer(handler).listen(8080);
     * ```
     */
    build(options: RouteOptions): ComposedHandler {
        const result = this.tryBuild(options);
        if (!result.ok) {
            throw result.error;
        }
        return result.handler;
    }

    /**
     * Same as build(), returning the configuration error instead of throwing it.
     */
    tryBuild(options: RouteOptions): BuildResult {
        let route: ResolvedRoute;
        try {
            route = this.#resolve(options);
        } catch (err) {
            if (err instanceof ConfigurationError) {
                this.#logger.error("invalid route configuration", { route: options.name ?? "anonymous", kind: err.kind, reason: err.message });
                return { ok: false, error: err };
            }
            throw err;
        }

        this.#built = true;
        return { ok: true, handler: this.#assemble(route) };
    }

    #resolve(options: RouteOptions): ResolvedRoute {
        const authMode = AuthModeSchema.safeParse(options.authMode);
        if (!authMode.success) {
            throw new ConfigurationError(ConfigurationErrorKind.INVALID_AUTH_MODE, `invalid auth mode: ${String(options.authMode)}`, options.authMode);
        }

        const shape = RouteShapeSchema.safeParse(options);
        if (!shape.success) {
            const issue = shape.error.issues[0];
            const reason = issue ? `${issue.path.join(".")}: ${issue.message}` : shape.error.message;
            throw new ConfigurationError(ConfigurationErrorKind.INVALID_OPTIONS, `invalid route options: ${reason}`, shape.error.issues);
        }
        const { name, allow, roles, before, after, handler } = shape.data;
        let { schemes } = shape.data;

        if (authMode.data !== AuthMode.REQUIRED && roles.length !== 0) {
            throw new ConfigurationError(
                ConfigurationErrorKind.ROLES_REQUIRE_AUTH_REQUIRED,
                `invalid auth mode ${authMode.data} for amount of roles ${roles.length}`,
                { authMode: authMode.data, roles },
            );
        }

        for (const schemeName of schemes) {
            if (!this.#registry.has(schemeName)) {
                throw new ConfigurationError(ConfigurationErrorKind.UNREGISTERED_SCHEME, `invalid scheme in route schemes: ${schemeName}`, schemeName);
            }
        }

        const defaultScheme = this.#registry.defaultScheme;
        if (schemes.length === 0 && defaultScheme !== undefined) {
            schemes = [defaultScheme];
        }

        return Object.freeze({ name, allow, roles, schemes, authMode: authMode.data, before, after, handler });
    }

    #assemble(route: ResolvedRoute): ComposedHandler {
        const context: StageContext = { registry: this.#registry, errorWriter: this.#errorWriter, logger: this.#logger };
        const main = composeStages(buildStages(route, context), route.handler);
        const post = composeHooks(route.after);

        const run = async (phase: string, handler: Handler, call: Call): Promise<void> => {
            try {
                await handler(call);
            } catch (err) {
                this.#logger.error("route handler failed", { route: route.name, phase, reason: err instanceof Error ? err.message : String(err) });
                if (call.response.headersSent) {
                    return;
                }
                try {
                    await reportFault(this.#errorWriter, call, err);
                } catch (writeErr) {
                    this.#logger.error("error writer failed", { route: route.name, reason: writeErr instanceof Error ? writeErr.message : String(writeErr) });
                }
            }
        };

        return async (request, response) => {
            const call = createCall(request, response);
            await run("main", main, call);
            // after hooks run even when the main path short-circuited
            await run("after", post, call);
        };
    }
}

/**
 * Create a composer from options and environment configuration.
 *
 * @throws ConfigurationError if the default scheme is not among the registered schemes
 * @throws ZodError if the environment configuration is invalid
 *
 * @example
 * ```typescript
 * const composer = createComposer({
 *   schemes: {
 *     bearer: createJwtScheme({ jwksUri: 'https://auth.example.com/.well-known/jwks.json' }),
 *     apiKey: createApiKeyScheme({ verifyKey }),
 *   },
 *   defaultScheme: 'bearer',
 * });
 * ```
 */
export function createComposer(options: ComposerOptions = {}): Composer {
    const config = parseEnvConfig(options.env);
    const logger = options.logger ?? getLogger("interlock", { level: config.LOG_LEVEL });
    const errorWriter = options.errorWriter ?? createJsonErrorWriter({ exposeDetails: config.ERROR_EXPOSE_DETAILS, logger });

    const composer = new Composer({ errorWriter, logger });
    for (const [name, scheme] of Object.entries(options.schemes ?? {})) {
        composer.register(name, scheme);
    }

    const defaultScheme = options.defaultScheme ?? config.AUTH_DEFAULT_SCHEME;
    if (defaultScheme !== undefined) {
        composer.setDefault(defaultScheme);
    }
    return composer;
}
