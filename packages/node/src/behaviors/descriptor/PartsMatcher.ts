/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { EndpointNumber } from "#types";

/**
 * Policy that decides which endpoints appear in the parts list of another endpoint.
 *
 * Implementations must be pure: the result depends only on the two endpoint numbers.
 */
export interface PartsMatcher {
    /**
     * Determine whether {@link candidateEndpoint} is a part of {@link ownerEndpoint}.
     */
    describe(ownerEndpoint: EndpointNumber, candidateEndpoint: EndpointNumber): boolean;
}

export namespace PartsMatcher {
    /**
     * A flat composite device.  The root endpoint lists every other endpoint; other endpoints list nothing.
     */
    export const Standard: PartsMatcher = Object.freeze({
        describe(ownerEndpoint: EndpointNumber, candidateEndpoint: EndpointNumber) {
            return EndpointNumber.isRoot(ownerEndpoint) && candidateEndpoint !== ownerEndpoint;
        },
    });

    /**
     * A bridge exposing peer devices.  Every endpoint lists all non-root endpoints other than itself.
     */
    export const Aggregator: PartsMatcher = Object.freeze({
        describe(ownerEndpoint: EndpointNumber, candidateEndpoint: EndpointNumber) {
            return candidateEndpoint !== ownerEndpoint && !EndpointNumber.isRoot(candidateEndpoint);
        },
    });
}
