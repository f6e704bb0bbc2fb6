/**
 * Scheme registry
 *
 * Maps scheme names to Scheme implementations, plus an optional default
 * used by routes that list no schemes.
 *
 * @module registry
 */

import { ConfigurationError, ConfigurationErrorKind } from "./errors.ts";
import type { Scheme } from "./types.ts";

export class SchemeRegistry {
    readonly #schemes = new Map<string, Scheme>();
    #defaultScheme: string | undefined;

    /**
     * Register a scheme by name. Overwrites any previous entry.
     */
    register(name: string, scheme: Scheme): void {
        this.#schemes.set(name, scheme);
    }

    /**
     * Set the scheme tried by routes that list no schemes.
     *
     * @throws ConfigurationError (UnregisteredScheme) if the name is not registered
     */
    setDefault(name: string): void {
        if (!this.#schemes.has(name)) {
            throw new ConfigurationError(ConfigurationErrorKind.UNREGISTERED_SCHEME, `scheme not registered: ${name}`, name);
        }
        this.#defaultScheme = name;
    }

    get(name: string): Scheme | undefined {
        return this.#schemes.get(name);
    }

    has(name: string): boolean {
        return this.#schemes.has(name);
    }

    get defaultScheme(): string | undefined {
        return this.#defaultScheme;
    }

    get names(): string[] {
        return [...this.#schemes.keys()];
    }
}
