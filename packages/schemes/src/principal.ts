/**
 * Principal
 *
 * Role-bearing credential produced by the schemes in this package.
 *
 * @module principal
 */

import type { Roler } from "@interlock/core";
import type { AuthContext } from "./types.ts";

export class Principal implements AuthContext, Roler {
    readonly subject: string;
    readonly name: string | undefined;
    readonly roles: ReadonlyArray<string>;
    readonly scopes: ReadonlyArray<string>;
    readonly claims: Readonly<Record<string, unknown>>;
    readonly type: string;
    readonly expiresAt: Date | undefined;

    constructor(context: AuthContext) {
        this.subject = context.subject;
        this.name = context.name;
        this.roles = Object.freeze([...context.roles]);
        this.scopes = Object.freeze([...context.scopes]);
        this.claims = Object.freeze({ ...context.claims });
        this.type = context.type;
        this.expiresAt = context.expiresAt;
    }

    static from(context: AuthContext): Principal {
        return context instanceof Principal ? context : new Principal(context);
    }

    hasRole(role: string): boolean {
        return this.roles.includes(role);
    }

    /**
     * Check a granted scope
     */
    hasScope(scope: string): boolean {
        return this.scopes.includes(scope);
    }

    /**
     * Whether the credential has expired at the given time.
     * Credentials without expiresAt never expire.
     */
    isExpired(now: number = Date.now()): boolean {
        return this.expiresAt !== undefined && this.expiresAt.getTime() <= now;
    }
}
