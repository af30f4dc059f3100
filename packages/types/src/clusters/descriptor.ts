/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Access, ClusterMetadata, Quality } from "../cluster/ClusterMetadata.js";
import { UnsupportedAttributeError } from "../common/StatusResponseError.js";
import { AttributeId } from "../datatype/AttributeId.js";
import { ClusterId } from "../datatype/ClusterId.js";
import type { DeviceTypeId } from "../datatype/DeviceTypeId.js";
import type { TlvTag } from "../tlv/TlvCodec.js";
import type { TlvWriter } from "../tlv/TlvWriter.js";

/**
 * The Descriptor cluster describes the composition of a node: the device types each endpoint implements, the clusters
 * it hosts and the endpoints that compose it.
 */
export namespace Descriptor {
    export const id = ClusterId(0x001d);
    export const name = "Descriptor";
    export const revision = 2;

    /**
     * Descriptor attribute identifiers.
     */
    export enum Attribute {
        DeviceTypeList = 0,
        ServerList = 1,
        ClientList = 2,
        PartsList = 3,
    }

    /**
     * Element of the device type list.
     */
    export interface DeviceTypeStruct {
        deviceType: DeviceTypeId;
        revision: number;
    }

    /**
     * Encode a {@link DeviceTypeStruct}.  Field tags are 0 (device type, uint32) and 1 (revision, uint16).
     */
    export function encodeDeviceType(writer: TlvWriter, value: DeviceTypeStruct, tag?: TlvTag) {
        writer.startStructure(tag);
        writer.uint32(value.deviceType, 0);
        writer.uint16(value.revision, 1);
        writer.endContainer();
    }

    /**
     * Map a numeric attribute id to a descriptor attribute.
     *
     * @throws {@link UnsupportedAttributeError} if the id is not a descriptor attribute
     */
    export function attributeOf(attributeId: number): Attribute {
        switch (attributeId) {
            case Attribute.DeviceTypeList:
                return Attribute.DeviceTypeList;

            case Attribute.ServerList:
                return Attribute.ServerList;

            case Attribute.ClientList:
                return Attribute.ClientList;

            case Attribute.PartsList:
                return Attribute.PartsList;
        }

        throw new UnsupportedAttributeError(`Attribute ${attributeId} is not supported by the ${name} cluster`);
    }

    export const Cluster = ClusterMetadata({
        id,
        name,
        revision,
        attributes: [
            {
                id: AttributeId(Attribute.DeviceTypeList),
                name: "deviceTypeList",
                access: Access.RV,
                quality: Quality.None,
            },
            { id: AttributeId(Attribute.ServerList), name: "serverList", access: Access.RV, quality: Quality.None },
            { id: AttributeId(Attribute.ClientList), name: "clientList", access: Access.RV, quality: Quality.None },
            { id: AttributeId(Attribute.PartsList), name: "partsList", access: Access.RV, quality: Quality.None },
        ],
    });
}
