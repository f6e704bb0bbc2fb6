/**
 * Unit tests for per-request context
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { Code, ConnectError } from "@connectrpc/connect";
import { createCall, getCredential, isRoler, requireCredential, withCredential } from "../../src/context.ts";
import { createMockCredential, createMockRequest, createMockResponse } from "../../src/testing/index.ts";

function isSubject(value: unknown): value is { subject: string } {
    return typeof value === "object" && value !== null && "subject" in value && typeof value.subject === "string";
}

describe("createCall", () => {
    it("should create a frozen call without credential", () => {
        const request = createMockRequest();
        const response = createMockResponse();
        const call = createCall(request, response);

        assert.strictEqual(call.request, request);
        assert.strictEqual(call.response, response);
        assert.strictEqual(getCredential(call), undefined);
        assert.strictEqual(Object.isFrozen(call), true);
    });
});

describe("withCredential", () => {
    it("should derive a new call and leave the original untouched", () => {
        const call = createCall(createMockRequest(), createMockResponse());
        const credential = { subject: "user-1" };

        const derived = withCredential(call, credential);

        assert.notStrictEqual(derived, call);
        assert.strictEqual(getCredential(derived), credential);
        assert.strictEqual(getCredential(call), undefined);
        assert.strictEqual(derived.request, call.request);
        assert.strictEqual(Object.isFrozen(derived), true);
    });
});

describe("requireCredential", () => {
    it("should return the attached credential", () => {
        const credential = { subject: "user-1" };
        const call = withCredential(createCall(createMockRequest(), createMockResponse()), credential);
        assert.strictEqual(requireCredential(call), credential);
    });

    it("should narrow with a guard", () => {
        const call = withCredential(createCall(createMockRequest(), createMockResponse()), { subject: "user-1" });
        assert.strictEqual(requireCredential(call, isSubject).subject, "user-1");
    });

    it("should throw Unauthenticated without a credential", () => {
        const call = createCall(createMockRequest(), createMockResponse());
        assert.throws(
            () => requireCredential(call),
            (err: unknown) => err instanceof ConnectError && err.code === Code.Unauthenticated && err.rawMessage === "Authentication required",
        );
    });

    it("should throw Internal when the guard rejects", () => {
        const call = withCredential(createCall(createMockRequest(), createMockResponse()), "opaque-token");
        assert.throws(
            () => requireCredential(call, isSubject),
            (err: unknown) => err instanceof ConnectError && err.code === Code.Internal && err.rawMessage === "Unexpected credential type",
        );
    });
});

describe("isRoler", () => {
    it("should detect a hasRole method", () => {
        assert.strictEqual(isRoler(createMockCredential()), true);
    });

    it("should reject values without a callable hasRole", () => {
        assert.strictEqual(isRoler({ hasRole: true }), false);
        assert.strictEqual(isRoler({ roles: ["admin"] }), false);
        assert.strictEqual(isRoler(null), false);
        assert.strictEqual(isRoler("admin"), false);
    });
});
