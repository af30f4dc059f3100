/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { type AttributeId, type ClusterMetadata, GlobalAttribute, UnsupportedAttributeError } from "#types";
import type { AttributeDataWriter } from "./AttributeDataEncoder.js";

/**
 * Answers reads of global attributes from cluster metadata.
 *
 * Implementations write the value and complete {@link AttributeDataWriter}.
 */
export interface GlobalAttributeReader {
    read(cluster: ClusterMetadata, attributeId: AttributeId, writer: AttributeDataWriter): void;
}

/**
 * The default {@link GlobalAttributeReader}.
 */
export class StandardGlobalAttributeReader implements GlobalAttributeReader {
    read(cluster: ClusterMetadata, attributeId: AttributeId, writer: AttributeDataWriter) {
        const id: number = attributeId;

        switch (id) {
            case GlobalAttribute.FeatureMap:
                writer.uint32(cluster.featureMap, writer.tag);
                break;

            case GlobalAttribute.ClusterRevision:
                writer.uint16(cluster.revision, writer.tag);
                break;

            case GlobalAttribute.AttributeList:
                writeIdList(writer, cluster.attributes.map(attribute => attribute.id));
                break;

            case GlobalAttribute.AcceptedCommandList:
                writeIdList(writer, cluster.acceptedCommands);
                break;

            case GlobalAttribute.GeneratedCommandList:
                writeIdList(writer, cluster.generatedCommands);
                break;

            default:
                throw new UnsupportedAttributeError(
                    `Global attribute ${id} is not supported by the ${cluster.name} cluster`,
                );
        }

        writer.complete();
    }
}

function writeIdList(writer: AttributeDataWriter, ids: readonly number[]) {
    writer.startArray(writer.tag);
    for (const id of ids) {
        writer.uint32(id);
    }
    writer.endContainer();
}
