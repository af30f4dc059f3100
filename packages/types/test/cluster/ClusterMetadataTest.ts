/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "#general";
import { Access, ClusterMetadata, Quality } from "../../src/cluster/ClusterMetadata.js";
import { AttributeId } from "../../src/datatype/AttributeId.js";
import { ClusterId } from "../../src/datatype/ClusterId.js";
import { CommandId } from "../../src/datatype/CommandId.js";

describe("ClusterMetadata", () => {
    const definition: ClusterMetadata.Definition = {
        id: ClusterId(0xfc00),
        name: "Sample",
        revision: 4,
        featureMap: 0b101,
        attributes: [{ id: AttributeId(7), name: "level", access: Access.RV | Access.Write, quality: Quality.Scene }],
        acceptedCommands: [CommandId(0), CommandId(1)],
    };

    it("appends global attributes", () => {
        const cluster = ClusterMetadata(definition);

        expect(cluster.attributes.map(({ name }) => name)).deep.equals([
            "level",
            "generatedCommandList",
            "acceptedCommandList",
            "attributeList",
            "featureMap",
            "clusterRevision",
        ]);
        expect(cluster.featureMap).equals(5);
        expect(cluster.acceptedCommands).deep.equals([0, 1]);
        expect(cluster.generatedCommands).deep.equals([]);
    });

    it("is immutable", () => {
        const cluster = ClusterMetadata(definition);

        expect(Object.isFrozen(cluster)).equals(true);
        expect(Object.isFrozen(cluster.attributes)).equals(true);
    });


    it("rejects duplicate attributes", () => {
        expect(() =>
            ClusterMetadata({
                ...definition,
                attributes: [{ id: AttributeId(0xfffc), name: "shadow", access: Access.RV, quality: Quality.None }],
            }),
        ).throws(ImplementationError, "Cluster Sample declares attribute featureMap (65532) twice");
    });
});
