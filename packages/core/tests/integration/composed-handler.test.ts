/**
 * Integration tests for composed handlers
 *
 * Builds routes through the Composer and drives them with mock
 * requests/responses end to end.
 */

import assert from "node:assert";
import { describe, it, mock } from "node:test";
import { Code, ConnectError } from "@connectrpc/connect";
import { Composer } from "../../src/composer.ts";
import { getCredential, isRoler, requireCredential } from "../../src/context.ts";
import { createJsonErrorWriter } from "../../src/error-writer.ts";
import { MissingRolesError } from "../../src/errors.ts";
import { wrapSlice } from "../../src/hooks.ts";
import {
    createFailingScheme,
    createMockCredential,
    createMockLogger,
    createMockRequest,
    createMockResponse,
    createRecordingErrorWriter,
    createTokenScheme,
} from "../../src/testing/index.ts";
import type { Call, HandleWrap, Handler } from "../../src/types.ts";

const alice = createMockCredential({ subject: "alice", roles: ["admin"] });
const bob = createMockCredential({ subject: "bob", roles: ["viewer"] });

function createBearerComposer() {
    const errorWriter = createRecordingErrorWriter();
    const logger = createMockLogger();
    const composer = new Composer({ errorWriter, logger });
    composer.register("bearer", createTokenScheme("authorization", { "Bearer alice-token": alice, "Bearer bob-token": bob }));
    return { composer, errorWriter, logger };
}

function bearer(token: string, extra: Record<string, string> = {}) {
    return { authorization: `Bearer ${token}`, ...extra };
}

const ok: Handler = (call) => {
    call.response.statusCode = 200;
    call.response.end("ok");
};

function counter(calls: string[], label: string): HandleWrap {
    return (next) => async (call) => {
        calls.push(label);
        await next(call);
    };
}

describe("composed handler", () => {
    describe("authentication", () => {
        it("should run the handler with the credential for a valid bearer token", async () => {
            const { composer, errorWriter } = createBearerComposer();
            const target = mock.fn(ok);
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", roles: [], handler: target });
            const response = createMockResponse();

            await handler(createMockRequest({ headers: bearer("alice-token") }), response);

            assert.strictEqual(target.mock.calls.length, 1);
            assert.strictEqual(target.mock.calls[0]?.arguments[0]?.credential, alice);
            assert.strictEqual(errorWriter.calls.length, 0);
            assert.strictEqual(response.statusCode, 200);
            assert.strictEqual(response.body, "ok");
        });

        it("should respond unauthorized for an invalid token without running the handler", async () => {
            const { composer, errorWriter } = createBearerComposer();
            const target = mock.fn(ok);
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", handler: target });
            const response = createMockResponse();

            await handler(createMockRequest({ headers: bearer("forged-token") }), response);

            assert.strictEqual(target.mock.calls.length, 0);
            assert.strictEqual(errorWriter.calls.length, 1);
            assert.strictEqual(errorWriter.calls[0]?.operation, "unauthorized");
            assert.strictEqual(errorWriter.calls[0]?.error.rawMessage, "Authentication failed");
            assert.strictEqual(response.statusCode, 401);
        });

        it('should proceed without credential when every scheme fails under "try"', async () => {
            const { composer, errorWriter } = createBearerComposer();
            composer.register("apiKey", createFailingScheme());
            const seen: unknown[] = [];
            const handler = composer.build({
                schemes: ["bearer", "apiKey"],
                authMode: "try",
                handler: (call) => {
                    seen.push(getCredential(call));
                    ok(call);
                },
            });

            await handler(createMockRequest(), createMockResponse());

            assert.deepStrictEqual(seen, [undefined]);
            assert.strictEqual(errorWriter.calls.length, 0);
        });

        it("should keep credentials of concurrent requests apart", async () => {
            const { composer } = createBearerComposer();
            const subjects: string[] = [];
            const handler = composer.build({
                schemes: ["bearer"],
                authMode: "required",
                handler: async (call) => {
                    await new Promise((resolve) => setImmediate(resolve));
                    const credential = requireCredential(call, isRoler);
                    subjects.push((await credential.hasRole("admin")) ? "admin" : "viewer");
                    ok(call);
                },
            });

            await Promise.all([
                handler(createMockRequest({ headers: bearer("alice-token") }), createMockResponse()),
                handler(createMockRequest({ headers: bearer("bob-token") }), createMockResponse()),
            ]);

            assert.deepStrictEqual(subjects.sort(), ["admin", "viewer"]);
        });

        it("should see schemes re-registered after the build", async () => {
            const { composer } = createBearerComposer();
            const target = mock.fn(ok);
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", handler: target });

            composer.register("bearer", createTokenScheme("authorization", { "Bearer rotated-token": alice }));
            await handler(createMockRequest({ headers: bearer("rotated-token") }), createMockResponse());

            assert.strictEqual(target.mock.calls.length, 1);
        });
    });

    describe("full policy", () => {
        const buildInvoiceRoute = () => {
            const context = createBearerComposer();
            const target = mock.fn((call: Call) => {
                call.response.statusCode = 201;
                call.response.end();
            });
            const handler = context.composer.build({
                name: "create-invoice",
                schemes: ["bearer"],
                authMode: "required",
                roles: ["billing", "admin"],
                allow: ["application/json"],
                handler: target,
            });
            return { ...context, target, handler };
        };

        it("should run the handler when every stage passes", async () => {
            const { handler, target, errorWriter } = buildInvoiceRoute();
            const response = createMockResponse();

            await handler(createMockRequest({ method: "POST", headers: bearer("alice-token", { "content-type": "application/json; charset=utf-8" }) }), response);

            assert.strictEqual(target.mock.calls.length, 1);
            assert.strictEqual(errorWriter.calls.length, 0);
            assert.strictEqual(response.statusCode, 201);
        });

        it("should respond forbidden when no required role is held", async () => {
            const { handler, target, errorWriter } = buildInvoiceRoute();

            await handler(createMockRequest({ method: "POST", headers: bearer("bob-token", { "content-type": "application/json" }) }), createMockResponse());

            assert.strictEqual(target.mock.calls.length, 0);
            const error = errorWriter.calls[0]?.error;
            assert.ok(error instanceof MissingRolesError);
            assert.strictEqual(error.rawMessage, "missing required roles: billing admin");
        });

        it("should check authentication before the content type", async () => {
            const { handler, errorWriter } = buildInvoiceRoute();

            await handler(createMockRequest({ method: "POST", headers: { "content-type": "text/plain" } }), createMockResponse());

            assert.deepStrictEqual(
                errorWriter.calls.map((call) => call.operation),
                ["unauthorized"],
            );
        });

        it("should respond bad request for a disallowed content type", async () => {
            const { handler, target, errorWriter } = buildInvoiceRoute();
            const response = createMockResponse();

            await handler(createMockRequest({ method: "POST", headers: bearer("alice-token", { "content-type": "text/plain" }) }), response);

            assert.strictEqual(target.mock.calls.length, 0);
            assert.strictEqual(errorWriter.calls[0]?.operation, "badRequest");
            assert.strictEqual(errorWriter.calls[0]?.error.rawMessage, "invalid request content-type: text/plain");
            assert.strictEqual(response.statusCode, 400);
        });

        it("should skip the content-type check for GET", async () => {
            const { handler, target } = buildInvoiceRoute();

            await handler(createMockRequest({ method: "GET", headers: bearer("alice-token", { "content-type": "text/plain" }) }), createMockResponse());

            assert.strictEqual(target.mock.calls.length, 1);
        });
    });

    describe("hooks", () => {
        it("should run before hooks after the built-in stages and after hooks last", async () => {
            const { composer } = createBearerComposer();
            const trace: string[] = [];
            const handler = composer.build({
                schemes: ["bearer"],
                authMode: "required",
                before: wrapSlice(counter(trace, "before-1"), counter(trace, "before-2")),
                after: wrapSlice(counter(trace, "after-1"), counter(trace, "after-2")),
                handler: (call) => {
                    trace.push(`handler:${getCredential(call) === alice ? "alice" : "none"}`);
                    ok(call);
                },
            });

            await handler(createMockRequest({ headers: bearer("alice-token") }), createMockResponse());

            assert.deepStrictEqual(trace, ["before-1", "before-2", "handler:alice", "after-1", "after-2"]);
        });

        it("should run after hooks exactly once when the main path short-circuits", async () => {
            const { composer } = createBearerComposer();
            const trace: string[] = [];
            const before = mock.fn<HandleWrap>((next) => next);
            const handler = composer.build({
                schemes: ["bearer"],
                authMode: "required",
                before: [before],
                after: [counter(trace, "after")],
                handler: ok,
            });

            await handler(createMockRequest(), createMockResponse());

            assert.deepStrictEqual(trace, ["after"]);
        });

        it("should give after hooks the call without credential", async () => {
            const { composer } = createBearerComposer();
            const seen: unknown[] = [];
            const audit: HandleWrap = (next) => async (call) => {
                seen.push(getCredential(call));
                await next(call);
            };
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", after: [audit], handler: ok });

            await handler(createMockRequest({ headers: bearer("alice-token") }), createMockResponse());

            assert.deepStrictEqual(seen, [undefined]);
        });
    });

    describe("fault containment", () => {
        it("should report a throwing handler as a server error and still run after hooks", async () => {
            const { composer, errorWriter, logger } = createBearerComposer();
            const trace: string[] = [];
            const handler = composer.build({
                name: "explode",
                authMode: "none",
                after: [counter(trace, "after")],
                handler: () => {
                    throw new Error("boom");
                },
            });
            const response = createMockResponse();

            await handler(createMockRequest(), response);

            assert.strictEqual(errorWriter.calls.length, 1);
            assert.strictEqual(errorWriter.calls[0]?.operation, "serverError");
            assert.strictEqual(errorWriter.calls[0]?.error.code, Code.Internal);
            assert.strictEqual(errorWriter.calls[0]?.error.rawMessage, "boom");
            assert.strictEqual(response.statusCode, 500);
            assert.deepStrictEqual(trace, ["after"]);
            assert.deepStrictEqual(logger.entries[0], { level: "error", message: "route handler failed", attributes: { route: "explode", phase: "main", reason: "boom" } });
        });

        it("should map a thrown Unauthenticated error to unauthorized", async () => {
            const { composer, errorWriter } = createBearerComposer();
            const handler = composer.build({
                schemes: ["bearer"],
                authMode: "try",
                handler: (call) => {
                    requireCredential(call);
                    ok(call);
                },
            });

            await handler(createMockRequest(), createMockResponse());

            assert.strictEqual(errorWriter.calls[0]?.operation, "unauthorized");
            assert.strictEqual(errorWriter.calls[0]?.error.rawMessage, "Authentication required");
        });

        it("should map a thrown PermissionDenied error to forbidden", async () => {
            const { composer, errorWriter } = createBearerComposer();
            const handler = composer.build({
                authMode: "none",
                handler: () => Promise.reject(new ConnectError("not the owner", Code.PermissionDenied)),
            });

            await handler(createMockRequest(), createMockResponse());

            assert.strictEqual(errorWriter.calls[0]?.operation, "forbidden");
        });

        it("should not write an error once the handler started the response", async () => {
            const { composer, errorWriter, logger } = createBearerComposer();
            const handler = composer.build({
                authMode: "none",
                handler: (call) => {
                    call.response.end("partial");
                    throw new Error("late failure");
                },
            });
            const response = createMockResponse();

            await handler(createMockRequest(), response);

            assert.strictEqual(errorWriter.calls.length, 0);
            assert.strictEqual(response.body, "partial");
            assert.strictEqual(logger.entries[0]?.message, "route handler failed");
        });

        it("should contain a failing after hook", async () => {
            const { composer, errorWriter, logger } = createBearerComposer();
            const failing: HandleWrap = () => () => {
                throw new Error("audit sink down");
            };
            const handler = composer.build({ name: "audited", authMode: "none", after: [failing], handler: ok });

            await handler(createMockRequest(), createMockResponse());

            assert.strictEqual(errorWriter.calls.length, 0);
            assert.deepStrictEqual(logger.entries[0]?.attributes, { route: "audited", phase: "after", reason: "audit sink down" });
        });

        it("should resolve even when the error writer fails", async () => {
            const logger = createMockLogger();
            const jsonWriter = createJsonErrorWriter();
            const composer = new Composer({
                errorWriter: {
                    ...jsonWriter,
                    serverError: () => {
                        throw new Error("socket closed");
                    },
                },
                logger,
            });
            const handler = composer.build({
                name: "fragile",
                authMode: "none",
                handler: () => {
                    throw new Error("boom");
                },
            });

            await handler(createMockRequest(), createMockResponse());

            assert.deepStrictEqual(
                logger.entries.map((entry) => entry.message),
                ["route handler failed", "error writer failed"],
            );
            assert.deepStrictEqual(logger.entries[1]?.attributes, { route: "fragile", reason: "socket closed" });
        });
    });

    describe("JSON error writer", () => {
        it("should render a forbidden response without leaking roles", async () => {
            const logger = createMockLogger();
            const composer = new Composer({ errorWriter: createJsonErrorWriter({ logger }), logger });
            composer.register("bearer", createTokenScheme("authorization", { "Bearer bob-token": bob }));
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", roles: ["admin"], handler: ok });
            const response = createMockResponse();

            await handler(createMockRequest({ headers: bearer("bob-token") }), response);

            assert.strictEqual(response.statusCode, 403);
            assert.strictEqual(response.body, '{"code":"permission_denied","message":"Access denied"}');
        });

        it("should not leak an internal scheme fault through the unauthorized response", async () => {
            const logger = createMockLogger();
            const composer = new Composer({ errorWriter: createJsonErrorWriter({ logger }), logger });
            composer.register("bearer", {
                authenticate: () => Promise.reject(new ConnectError("pg: connection refused to db.internal:5432", Code.Internal)),
            });
            const handler = composer.build({ schemes: ["bearer"], authMode: "required", handler: ok });
            const response = createMockResponse();

            await handler(createMockRequest({ headers: bearer("alice-token") }), response);

            assert.strictEqual(response.statusCode, 401);
            assert.strictEqual(response.body, '{"code":"unauthenticated","message":"Authentication failed"}');
        });
    });
});
