/**
 * JSON error writer
 *
 * Default ErrorWriter. Renders failures as Connect-style JSON error bodies
 * on a plain Node.js HTTP response.
 *
 * @module error-writer
 */

import { Code } from "@connectrpc/connect";
import type { ConnectError } from "@connectrpc/connect";
import { isSanitizableError } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { ErrorWriter, InboundRequest, ResponseSink } from "./types.ts";

/**
 * Connect protocol code names
 *
 * Uses explicit Map instead of enum reverse mapping for safety.
 */
const CODE_NAMES = new Map<Code, string>([
    [Code.Canceled, "canceled"],
    [Code.Unknown, "unknown"],
    [Code.InvalidArgument, "invalid_argument"],
    [Code.DeadlineExceeded, "deadline_exceeded"],
    [Code.NotFound, "not_found"],
    [Code.AlreadyExists, "already_exists"],
    [Code.PermissionDenied, "permission_denied"],
    [Code.ResourceExhausted, "resource_exhausted"],
    [Code.FailedPrecondition, "failed_precondition"],
    [Code.Aborted, "aborted"],
    [Code.OutOfRange, "out_of_range"],
    [Code.Unimplemented, "unimplemented"],
    [Code.Internal, "internal"],
    [Code.Unavailable, "unavailable"],
    [Code.DataLoss, "data_loss"],
    [Code.Unauthenticated, "unauthenticated"],
]);

/**
 * JSON error response body
 */
export interface ErrorResponseBody {
    code: string;
    message: string;
    details?: Readonly<Record<string, unknown>>;
}

/**
 * JSON error writer options
 */
export interface JsonErrorWriterOptions {
    /**
     * Send server-side messages and details to the client.
     * @default false
     */
    exposeDetails?: boolean | undefined;

    /**
     * Logger for rendered failures. Failures are not logged when omitted.
     */
    logger?: Logger | undefined;
}

/**
 * Create the default ErrorWriter.
 *
 * | Operation | HTTP status |
 * |---|---|
 * | unauthorized | 401 |
 * | forbidden | 403 |
 * | badRequest | 400 |
 * | serverError | 500 |
 *
 * @example Body written for a forbidden request
 * ```json
 * {"code":"permission_denied","message":"Access denied"}
 * ```
 */
export function createJsonErrorWriter(options: JsonErrorWriterOptions = {}): ErrorWriter {
    const { exposeDetails = false, logger } = options;

    function clientBody(error: ConnectError, status: number): ErrorResponseBody {
        const code = CODE_NAMES.get(error.code) ?? "unknown";
        if (exposeDetails) {
            const body: ErrorResponseBody = { code, message: error.rawMessage };
            if (isSanitizableError(error)) {
                body.details = error.serverDetails;
            }
            return body;
        }
        if (isSanitizableError(error)) {
            return { code, message: error.clientMessage };
        }
        if (status >= 500) {
            return { code, message: "Internal server error" };
        }
        return { code, message: error.rawMessage };
    }

    function write(status: number, response: ResponseSink, request: InboundRequest, error: ConnectError): void {
        const attributes = {
            "http.method": request.method ?? "",
            "http.url": request.url ?? "",
            "http.status_code": status,
            "error.code": CODE_NAMES.get(error.code) ?? "unknown",
            "error.message": error.rawMessage,
        };

        if (response.headersSent) {
            logger?.warn("response already started, error not rendered", attributes);
            response.end();
            return;
        }

        if (status >= 500) {
            logger?.error("request failed", attributes);
        } else {
            logger?.warn("request rejected", attributes);
        }

        response.statusCode = status;
        response.setHeader("Content-Type", "application/json");
        response.end(JSON.stringify(clientBody(error, status)));
    }

    return {
        unauthorized: (response, request, error) => write(401, response, request, error),
        forbidden: (response, request, error) => write(403, response, request, error),
        badRequest: (response, request, error) => write(400, response, request, error),
        serverError: (response, request, error) => write(500, response, request, error),
    };
}
