/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "#general";
import { AttributeId } from "../datatype/AttributeId.js";
import type { ClusterId } from "../datatype/ClusterId.js";
import type { CommandId } from "../datatype/CommandId.js";

/**
 * Attribute access flags.  Combine with bitwise or.
 */
export enum Access {
    None = 0,
    Read = 0x01,
    Write = 0x02,
    FabricScoped = 0x04,
    FabricSensitive = 0x08,
    NeedView = 0x10,
    NeedOperate = 0x20,
    NeedManage = 0x40,
    NeedAdminister = 0x80,
}

export namespace Access {
    /**
     * Readable with view privilege.
     */
    export const RV = Access.Read | Access.NeedView;
}

/**
 * Attribute quality flags.  Combine with bitwise or.
 */
export enum Quality {
    None = 0,
    Fixed = 0x01,
    Nullable = 0x02,
    NonVolatile = 0x04,
    Scene = 0x08,
    ChangesOmitted = 0x10,
}

export interface AttributeMetadata {
    readonly id: AttributeId;
    readonly name: string;
    readonly access: number;
    readonly quality: number;
}

/**
 * Immutable declaration of a cluster's identity and attribute table.
 */
export interface ClusterMetadata {
    readonly id: ClusterId;
    readonly name: string;
    readonly revision: number;
    readonly featureMap: number;

    /**
     * All attributes including the global attributes, in declaration order.
     */
    readonly attributes: readonly AttributeMetadata[];

    readonly acceptedCommands: readonly CommandId[];
    readonly generatedCommands: readonly CommandId[];
}

/**
 * Global attribute identifiers.
 */
export enum GlobalAttribute {
    GeneratedCommandList = 0xfff8,
    AcceptedCommandList = 0xfff9,
    AttributeList = 0xfffb,
    FeatureMap = 0xfffc,
    ClusterRevision = 0xfffd,
}

const GLOBAL_ATTRIBUTES: readonly AttributeMetadata[] = [
    globalAttribute(GlobalAttribute.GeneratedCommandList, "generatedCommandList"),
    globalAttribute(GlobalAttribute.AcceptedCommandList, "acceptedCommandList"),
    globalAttribute(GlobalAttribute.AttributeList, "attributeList"),
    globalAttribute(GlobalAttribute.FeatureMap, "featureMap"),
    globalAttribute(GlobalAttribute.ClusterRevision, "clusterRevision"),
];

function globalAttribute(id: GlobalAttribute, name: string): AttributeMetadata {
    return { id: AttributeId(id), name, access: Access.RV, quality: Quality.Fixed };
}

/**
 * Create cluster metadata.  The global attributes are appended to the attributes you supply.
 */
export function ClusterMetadata(definition: ClusterMetadata.Definition): ClusterMetadata {
    const attributes = [...definition.attributes, ...GLOBAL_ATTRIBUTES];

    const ids = new Set<number>();
    for (const { id, name } of attributes) {
        if (ids.has(id)) {
            throw new ImplementationError(`Cluster ${definition.name} declares attribute ${name} (${id}) twice`);
        }
        ids.add(id);
    }

    return Object.freeze({
        id: definition.id,
        name: definition.name,
        revision: definition.revision,
        featureMap: definition.featureMap ?? 0,
        attributes: Object.freeze(attributes),
        acceptedCommands: Object.freeze([...(definition.acceptedCommands ?? [])]),
        generatedCommands: Object.freeze([...(definition.generatedCommands ?? [])]),
    });
}

export namespace ClusterMetadata {
    export interface Definition {
        id: ClusterId;
        name: string;
        revision: number;
        featureMap?: number;
        attributes: readonly AttributeMetadata[];
        acceptedCommands?: readonly CommandId[];
        generatedCommands?: readonly CommandId[];
    }
}
