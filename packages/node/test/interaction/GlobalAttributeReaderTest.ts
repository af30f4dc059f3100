/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import {
    Access,
    AttributeId,
    ClusterId,
    ClusterMetadata,
    CommandId,
    EndpointNumber,
    GlobalAttribute,
    Quality,
    Tlv,
    UnsupportedAttributeError,
} from "#types";
import { AttributeReportEncoder } from "../../src/interaction/AttributeReportEncoder.js";
import { StandardGlobalAttributeReader } from "../../src/interaction/GlobalAttributeReader.js";

describe("StandardGlobalAttributeReader", () => {
    const cluster = ClusterMetadata({
        id: ClusterId(0xfc01),
        name: "Sample",
        revision: 5,
        featureMap: 0x80000001,
        attributes: [{ id: AttributeId(0), name: "value", access: Access.RV, quality: Quality.None }],
        acceptedCommands: [CommandId(0), CommandId(2)],
        generatedCommands: [CommandId(1)],
    });
    const reader = new StandardGlobalAttributeReader();

    function read(attributeId: number) {
        const encoder = new AttributeReportEncoder({
            endpointId: EndpointNumber(1),
            clusterId: cluster.id,
            attributeId: AttributeId(attributeId),
        });
        const writer = encoder.withDataVersion(1);
        if (writer === undefined) {
            throw new Error("Expected a writer");
        }
        reader.read(cluster, AttributeId(attributeId), writer);
        expect(encoder.reports.length).equals(1);
        return Tlv.decode(encoder.reports[0].payload);
    }

    it("reads the feature map", () => {
        expect(read(GlobalAttribute.FeatureMap)).equals(0x80000001);
    });

    it("reads the revision", () => {
        expect(read(GlobalAttribute.ClusterRevision)).equals(5);
    });

    it("reads the attribute list", () => {
        expect(read(GlobalAttribute.AttributeList)).deep.equals([0, 0xfff8, 0xfff9, 0xfffb, 0xfffc, 0xfffd]);
    });

    it("reads command lists", () => {
        expect(read(GlobalAttribute.AcceptedCommandList)).deep.equals([0, 2]);
        expect(read(GlobalAttribute.GeneratedCommandList)).deep.equals([1]);
    });

    it("rejects other attributes", () => {
        expect(() => read(0)).throws(
            UnsupportedAttributeError,
            "Global attribute 0 is not supported by the Sample cluster",
        );
    });
});
