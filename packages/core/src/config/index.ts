/**
 * Configuration module
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type InterlockEnv } from '@interlock/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`Log level: ${config.LOG_LEVEL}`);
 * ```
 *
 * @module @interlock/core/config
 */

export {
    InterlockEnvSchema,
    LogLevelSchema,
    BooleanFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type InterlockEnv,
    type LogLevel,
} from "./envSchema.ts";
