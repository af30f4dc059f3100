/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Access, GlobalAttribute } from "../../src/cluster/ClusterMetadata.js";
import { Descriptor } from "../../src/clusters/descriptor.js";
import { Status } from "../../src/common/Status.js";
import { UnsupportedAttributeError } from "../../src/common/StatusResponseError.js";
import { DeviceTypeId } from "../../src/datatype/DeviceTypeId.js";
import { TlvByteWriter } from "../../src/tlv/TlvByteWriter.js";
import { Tlv } from "../../src/tlv/TlvReader.js";

describe("Descriptor", () => {
    it("declares identity", () => {
        expect(Descriptor.Cluster.id).equals(0x1d);
        expect(Descriptor.Cluster.name).equals("Descriptor");
        expect(Descriptor.Cluster.featureMap).equals(0);
    });

    it("declares readable attributes followed by globals", () => {
        expect(Descriptor.Cluster.attributes.map(({ id }) => id)).deep.equals([
            0,
            1,
            2,
            3,
            GlobalAttribute.GeneratedCommandList,
            GlobalAttribute.AcceptedCommandList,
            GlobalAttribute.AttributeList,
            GlobalAttribute.FeatureMap,
            GlobalAttribute.ClusterRevision,
        ]);

        for (const { access } of Descriptor.Cluster.attributes) {
            expect(access & Access.Read).equals(Access.Read);
            expect(access & Access.Write).equals(0);
        }
    });

    it("maps attribute ids", () => {
        expect(Descriptor.attributeOf(0)).equals(Descriptor.Attribute.DeviceTypeList);
        expect(Descriptor.attributeOf(1)).equals(Descriptor.Attribute.ServerList);
        expect(Descriptor.attributeOf(2)).equals(Descriptor.Attribute.ClientList);
        expect(Descriptor.attributeOf(3)).equals(Descriptor.Attribute.PartsList);
    });

    it("rejects unknown attribute ids", () => {
        for (const id of [4, 0xfffc, -1]) {
            let error: unknown;
            try {
                Descriptor.attributeOf(id);
            } catch (e) {
                error = e;
            }

            expect(error).instanceOf(UnsupportedAttributeError);
            if (error instanceof UnsupportedAttributeError) {
                expect(error.code).equals(Status.UnsupportedAttribute);
                expect(error.message).equals(
                    `(UnsupportedAttribute (134)) Attribute ${id} is not supported by the Descriptor cluster`,
                );
            }
        }
    });

    it("encodes device types", () => {
        const writer = new TlvByteWriter();
        Descriptor.encodeDeviceType(writer, { deviceType: DeviceTypeId(0x0100), revision: 3 });

        expect([...writer.toByteArray()]).deep.equals([0x15, 0x25, 0x00, 0x00, 0x01, 0x24, 0x01, 0x03, 0x18]);
        expect(Tlv.decode(writer.toByteArray())).deep.equals({ 0: 0x0100, 1: 3 });
    });
});
