/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Structured message fragments.  The log formatter renders these according to the active format.
 */
export type Diagnostic = Diagnostic.Strong | Diagnostic.Dict | Diagnostic.List;

export namespace Diagnostic {
    export interface Strong {
        readonly kind: "strong";
        readonly value: unknown;
    }

    export interface Dict {
        readonly kind: "dict";
        readonly entries: Readonly<Record<string, unknown>>;
    }

    export interface List {
        readonly kind: "list";
        readonly items: readonly unknown[];
    }

    /**
     * Emphasize a value.
     */
    export function strong(value: unknown): Strong {
        return { kind: "strong", value };
    }

    /**
     * Render key/value details.
     */
    export function dict(entries: Record<string, unknown>): Dict {
        return { kind: "dict", entries };
    }

    export function list(items: readonly unknown[]): List {
        return { kind: "list", items };
    }

    export function is(value: unknown): value is Diagnostic {
        if (typeof value !== "object" || value === null || !("kind" in value)) {
            return false;
        }
        return value.kind === "strong" || value.kind === "dict" || value.kind === "list";
    }
}
