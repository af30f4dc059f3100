/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "../DeviceError.js";

/**
 * Configuration variables addressed by dotted names such as "log.level".
 *
 * Values load from environment variables that start with {@link VariableService.DEFAULT_PREFIX}.  The remainder of the
 * environment variable name maps to a variable name by lowercasing and replacing "_" with ".", so
 * `DEVTREE_LOG_LEVEL=debug` sets "log.level".  Values set programmatically override the environment.
 */
export class VariableService {
    static readonly DEFAULT_PREFIX = "DEVTREE";

    #vars = new Map<string, string>();

    constructor(env: Record<string, string | undefined> = process.env, prefix = VariableService.DEFAULT_PREFIX) {
        const lead = `${prefix}_`;
        for (const [key, value] of Object.entries(env)) {
            if (value === undefined || !key.startsWith(lead) || key.length === lead.length) {
                continue;
            }
            this.#vars.set(key.slice(lead.length).toLowerCase().replace(/_/g, "."), value);
        }
    }

    has(name: string) {
        return this.#vars.has(name);
    }

    get(name: string): string | undefined {
        return this.#vars.get(name);
    }

    set(name: string, value: string | number | boolean) {
        this.#vars.set(name, String(value));
    }

    delete(name: string) {
        this.#vars.delete(name);
    }

    number(name: string): number | undefined {
        const value = this.get(name);
        if (value === undefined) {
            return;
        }

        const result = Number(value);
        if (value.trim() === "" || Number.isNaN(result)) {
            throw new ImplementationError(`Variable "${name}" value "${value}" is not numeric`);
        }
        return result;
    }

    boolean(name: string): boolean | undefined {
        const value = this.get(name)?.trim().toLowerCase();
        switch (value) {
            case undefined:
                return;

            case "1":
            case "true":
            case "yes":
                return true;

            case "0":
            case "false":
            case "no":
                return false;
        }
        throw new ImplementationError(`Variable "${name}" value "${value}" is not boolean`);
    }

    get names() {
        return [...this.#vars.keys()];
    }
}
