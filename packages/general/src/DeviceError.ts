/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Base class for all errors raised by the device topology packages.
 */
export class DeviceError extends Error {
    constructor(message?: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Thrown when an API is used incorrectly.
 */
export class ImplementationError extends DeviceError {}

/**
 * Thrown when an invariant the code relies upon does not hold.  Indicates a bug.
 */
export class InternalError extends DeviceError {}

/**
 * Coerce an unknown thrown value into an {@link Error}.
 */
export function asError(e: unknown): Error {
    if (e instanceof Error) {
        return e;
    }
    return new DeviceError(String(e));
}
