/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Status } from "./Status.js";
import { StatusResponseError } from "./StatusResponseError.js";

/**
 * Thrown when a value does not conform to its declared type.
 */
export class ValidationError extends StatusResponseError {
    constructor(message: string, code = Status.InvalidDataType) {
        super(message, code);
    }
}

/**
 * Thrown when a numeric value lies outside the range its type permits.
 */
export class ValidationOutOfBoundsError extends ValidationError {
    constructor(message: string) {
        super(message, Status.ConstraintError);
    }
}

/**
 * Assert that {@link value} is an integer in the inclusive range {@link min}..{@link max}.
 */
export function assertInteger(name: string, value: number, min: number, max: number) {
    if (!Number.isInteger(value)) {
        throw new ValidationError(`${name} ${value} is not an integer`);
    }
    if (value < min || value > max) {
        throw new ValidationOutOfBoundsError(`${name} ${value} is outside the range ${min}..${max}`);
    }
}
