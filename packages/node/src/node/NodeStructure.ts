/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "#general";
import type { ClusterId, Descriptor, EndpointNumber } from "#types";

/**
 * Thrown when a node would contain two endpoints with the same number.
 */
export class DuplicateEndpointError extends ImplementationError {}

export interface ClusterStructure {
    readonly id: ClusterId;
}

export interface EndpointStructure {
    readonly id: EndpointNumber;
    readonly deviceType: Descriptor.DeviceTypeStruct;

    /**
     * Hosted server clusters in declaration order.
     */
    readonly clusters: readonly ClusterStructure[];
}

/**
 * Read-only view of the endpoints that compose a node.  Iteration order of {@link endpoints} is stable.
 */
export interface NodeStructure {
    readonly endpoints: readonly EndpointStructure[];
}

/**
 * Create an immutable {@link NodeStructure}.
 *
 * @throws {@link DuplicateEndpointError} if two endpoints share a number
 */
export function NodeStructure(endpoints: Iterable<EndpointStructure>): NodeStructure {
    const list = new Array<EndpointStructure>();
    const numbers = new Set<number>();

    for (const endpoint of endpoints) {
        if (numbers.has(endpoint.id)) {
            throw new DuplicateEndpointError(`Endpoint ${endpoint.id} is defined more than once`);
        }
        numbers.add(endpoint.id);

        list.push(
            Object.freeze({
                id: endpoint.id,
                deviceType: Object.freeze({ ...endpoint.deviceType }),
                clusters: Object.freeze(endpoint.clusters.map(({ id }) => Object.freeze({ id }))),
            }),
        );
    }

    return Object.freeze({ endpoints: Object.freeze(list) });
}

export namespace NodeStructure {
    /**
     * Find an endpoint by number.
     */
    export function endpointOf(node: NodeStructure, endpointId: EndpointNumber) {
        return node.endpoints.find(({ id }) => id === endpointId);
    }
}
