/**
 * Shared types for @interlock/core
 *
 * @module types
 */

import type { IncomingHttpHeaders } from "node:http";
import type { ConnectError } from "@connectrpc/connect";
import type { Logger } from "./logger.ts";
import type { SchemeRegistry } from "./registry.ts";

/**
 * Inbound request as seen by stages and schemes.
 *
 * Structurally satisfied by `http.IncomingMessage` and `http2.Http2ServerRequest`.
 */
export interface InboundRequest {
    readonly method?: string | undefined;
    readonly url?: string | undefined;
    readonly headers: IncomingHttpHeaders;
}

/**
 * Response channel the error writer and handlers write to.
 *
 * Structurally satisfied by `http.ServerResponse` and `http2.Http2ServerResponse`.
 */
export interface ResponseSink {
    statusCode: number;
    readonly headersSent: boolean;
    setHeader(name: string, value: string): unknown;
    end(chunk?: string): unknown;
}

/**
 * Per-request context passed through the stage chain.
 *
 * Immutable. Stages that attach data derive a new Call (see withCredential()).
 */
export interface Call {
    readonly request: InboundRequest;
    readonly response: ResponseSink;
    /** Credential attached by the authenticate stage, undefined when unauthenticated */
    readonly credential?: unknown;
}

/**
 * Request handler working on a Call.
 */
export type Handler = (call: Call) => void | Promise<void>;

/**
 * Wraps a handler and returns a new handler. Used for `before` and `after` hooks.
 */
export type HandleWrap = (next: Handler) => Handler;

/**
 * One link of the interceptor chain.
 */
export interface Stage {
    /** Stage name for logging/debugging */
    readonly name: string;
    /** Given the continuation, produce the handler for this stage */
    wrap(next: Handler): Handler;
}

/**
 * Final handler returned by Composer#build(), shaped as a Node.js request listener.
 */
export type ComposedHandler = (request: InboundRequest, response: ResponseSink) => Promise<void>;

/**
 * Pluggable authenticator.
 *
 * Resolves to a credential on success. Signals failure by throwing or rejecting;
 * a resolved `undefined` or `null` also counts as a failed attempt.
 */
export interface Scheme<TCredential = unknown> {
    authenticate(request: InboundRequest): TCredential | Promise<TCredential>;
}

/**
 * Role-membership capability a credential may expose.
 */
export interface Roler {
    hasRole(role: string): boolean | Promise<boolean>;
}

/**
 * Renders failures onto the response.
 *
 * Each operation is terminal: nothing else may be written to the response afterwards.
 */
export interface ErrorWriter {
    unauthorized(response: ResponseSink, request: InboundRequest, error: ConnectError): void | Promise<void>;
    forbidden(response: ResponseSink, request: InboundRequest, error: ConnectError): void | Promise<void>;
    badRequest(response: ResponseSink, request: InboundRequest, error: ConnectError): void | Promise<void>;
    serverError(response: ResponseSink, request: InboundRequest, error: ConnectError): void | Promise<void>;
}

/**
 * Authentication mode
 */
export const AuthMode = {
    /** Request fails with unauthorized unless a scheme succeeds */
    REQUIRED: "required",
    /** Best effort: failures leave the request unauthenticated */
    TRY: "try",
    /** No scheme is consulted */
    NONE: "none",
} as const;

export type AuthMode = (typeof AuthMode)[keyof typeof AuthMode];

/**
 * Declarative policy for one handler.
 */
export interface RouteOptions {
    /** Route name for log records */
    readonly name?: string | undefined;
    /** Content types to allow (substring match) for body-bearing methods */
    readonly allow?: ReadonlyArray<string> | undefined;
    /** Roles to allow, "any-of" semantics. Requires authMode "required". */
    readonly roles?: ReadonlyArray<string> | undefined;
    /** Scheme names to try in order. Falls back to the registry default when empty. */
    readonly schemes?: ReadonlyArray<string> | undefined;
    readonly authMode: AuthMode;
    /** Hooks run after the built-in stages, before the handler */
    readonly before?: ReadonlyArray<HandleWrap> | undefined;
    /** Hooks run once the main path has returned */
    readonly after?: ReadonlyArray<HandleWrap> | undefined;
    readonly handler: Handler;
}

/**
 * Route options after validation and default-scheme substitution.
 */
export interface ResolvedRoute {
    readonly name: string;
    readonly allow: ReadonlyArray<string>;
    readonly roles: ReadonlyArray<string>;
    readonly schemes: ReadonlyArray<string>;
    readonly authMode: AuthMode;
    readonly before: ReadonlyArray<HandleWrap>;
    readonly after: ReadonlyArray<HandleWrap>;
    readonly handler: Handler;
}

/**
 * Collaborators the built-in stages read at serve time.
 */
export interface StageContext {
    readonly registry: SchemeRegistry;
    readonly errorWriter: ErrorWriter;
    readonly logger: Logger;
}
