/**
 * Environment configuration validation with Zod
 *
 * @module @interlock/core/config
 */

import { z } from "zod";

/**
 * Log level schema with validation
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default("false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Interlock environment configuration schema
 *
 * @example
 * ```typescript
 * const config = InterlockEnvSchema.parse(process.env);
 * console.log(config.LOG_LEVEL); // 'info' (default)
 * console.log(config.AUTH_DEFAULT_SCHEME); // undefined unless set
 * ```
 */
export const InterlockEnvSchema = z.object({
    /**
     * Log level
     * @default 'info'
     */
    LOG_LEVEL: LogLevelSchema,

    /**
     * Scheme used by routes that list no schemes. Must be registered
     * through createComposer({ schemes }). Empty means unset.
     */
    AUTH_DEFAULT_SCHEME: z
        .string()
        .optional()
        .transform((v) => v || undefined),

    /**
     * Include server-side error details in error responses
     * @default false
     */
    ERROR_EXPOSE_DETAILS: BooleanFromStringSchema,
});

/**
 * Interlock environment configuration type
 */
export type InterlockEnv = z.infer<typeof InterlockEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ LOG_LEVEL: 'debug' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): InterlockEnv {
    return InterlockEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return InterlockEnvSchema.safeParse(env);
}
