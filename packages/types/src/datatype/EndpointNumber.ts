/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Branded } from "#general";
import { assertInteger } from "../common/ValidationError.js";

/**
 * An endpoint number identifies an endpoint within a node.  Endpoint 0 is the root endpoint.
 */
export type EndpointNumber = Branded<number, "EndpointNumber">;

export function EndpointNumber(endpointNumber: number): EndpointNumber {
    assertInteger("Endpoint number", endpointNumber, 0, 0xfffe);
    return endpointNumber as EndpointNumber;
}

export namespace EndpointNumber {
    export const ROOT = EndpointNumber(0);

    export function isRoot(endpointNumber: EndpointNumber) {
        return endpointNumber === ROOT;
    }
}
