/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { DeviceError } from "#general";
import { Status } from "./Status.js";

/**
 * Error that maps to a specific interaction model {@link Status}.  The transport converts the error into a status
 * response carrying {@link code}.
 */
export class StatusResponseError extends DeviceError {
    constructor(
        message: string,
        readonly code: Status,
        readonly clusterCode?: number,
    ) {
        super(`(${Status[code] ?? "Unknown"} (${code})) ${message}`);
    }
}

/**
 * Thrown when a request addresses an attribute the cluster does not define.
 */
export class UnsupportedAttributeError extends StatusResponseError {
    constructor(message: string) {
        super(message, Status.UnsupportedAttribute);
    }
}
