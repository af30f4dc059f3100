/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { AttributeId, type ClusterId, type EndpointNumber } from "#types";
import type { NodeStructure } from "../node/NodeStructure.js";

export interface AttributePath {
    readonly endpointId: EndpointNumber;
    readonly clusterId: ClusterId;
    readonly attributeId: AttributeId;
}

/**
 * A validated request to read one attribute of one cluster instance.
 */
export interface AttributeRequest extends AttributePath {
    /**
     * The node the endpoint belongs to.
     */
    readonly node: NodeStructure;

    /**
     * True if {@link attributeId} is a global attribute answered from cluster metadata.
     */
    readonly isGlobal: boolean;
}

export function AttributeRequest(node: NodeStructure, path: AttributePath): AttributeRequest {
    return {
        node,
        endpointId: path.endpointId,
        clusterId: path.clusterId,
        attributeId: path.attributeId,
        isGlobal: AttributeId.isGlobal(path.attributeId),
    };
}
