/**
 * @interlock/core
 *
 * Request-interceptor composer: wraps a handler with authentication,
 * role-based authorization, content-type validation and caller hooks.
 *
 * Stage order is fixed:
 * authenticate → authorize → allow → before hooks → handler → after hooks.
 *
 * @module @interlock/core
 */

// Chain assembly
export { buildStages, composeHooks, composeStages } from "./chain.ts";
export type { BuildResult, ComposerOptions } from "./composer.ts";
export { Composer, createComposer } from "./composer.ts";
// Configuration
export type { InterlockEnv, LogLevel } from "./config/envSchema.ts";
export { InterlockEnvSchema, parseEnvConfig, safeParseEnvConfig } from "./config/envSchema.ts";
// Request context
export { createCall, getCredential, isRoler, requireCredential, withCredential } from "./context.ts";
export type { ErrorResponseBody, JsonErrorWriterOptions } from "./error-writer.ts";
export { createJsonErrorWriter } from "./error-writer.ts";
export type { SanitizableError } from "./errors.ts";
export { ConfigurationError, ConfigurationErrorKind, ContentTypeError, isSanitizableError, MissingRolesError, toAuthenticationError } from "./errors.ts";
export { hookStage, noopHandler, wrapSlice } from "./hooks.ts";
export type { Logger, LoggerOptions } from "./logger.ts";
export { getLogger } from "./logger.ts";
export { SchemeRegistry } from "./registry.ts";
// Built-in stages
export { BODYLESS_METHODS, createAllowStage, createAuthenticateStage, createAuthorizeStage, getContentType, isContentTypeAllowed } from "./stages/index.ts";

// Types and constants
export type {
    Call,
    ComposedHandler,
    ErrorWriter,
    HandleWrap,
    Handler,
    InboundRequest,
    ResolvedRoute,
    ResponseSink,
    Roler,
    RouteOptions,
    Scheme,
    Stage,
    StageContext,
} from "./types.ts";

export { AuthMode } from "./types.ts";
