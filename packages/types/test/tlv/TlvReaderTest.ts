/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { TlvByteWriter } from "../../src/tlv/TlvByteWriter.js";
import { UnexpectedTlvError } from "../../src/tlv/TlvCodec.js";
import { Tlv, TlvReader } from "../../src/tlv/TlvReader.js";

describe("TlvReader", () => {
    it("decodes writer output", () => {
        const writer = new TlvByteWriter();
        writer.startStructure();
        writer.uint16(0x1234, 0);
        writer.startArray(1);
        writer.uint8(1);
        writer.uint32(0x10000);
        writer.endContainer();
        writer.utf8("topology", 2);
        writer.boolean(true, 3);
        writer.null(4);
        writer.uint64(2n ** 60n, 5);
        writer.endContainer();

        expect(Tlv.decode(writer.toByteArray())).deep.equals({
            0: 0x1234,
            1: [1, 0x10000],
            2: "topology",
            3: true,
            4: null,
            5: 2n ** 60n,
        });
    });

    it("decodes signed and floating point values", () => {
        expect(Tlv.decode(Uint8Array.of(0x00, 0xff))).equals(-1);
        expect(Tlv.decode(Uint8Array.of(0x01, 0x00, 0x80))).equals(-32768);
        expect(Tlv.decode(Uint8Array.of(0x0a, 0x00, 0x00, 0x80, 0x3f))).equals(1);
    });

    it("reads sequential elements with tags", () => {
        const reader = new TlvReader(Uint8Array.of(0x24, 0x07, 0x01, 0x04, 0x02));

        expect(reader.readElement()).deep.equals({ tag: 7, value: 1 });
        expect(reader.readElement()).deep.equals({ tag: undefined, value: 2 });
        expect(reader.done).equals(true);
    });

    it("rejects malformed input", () => {
        expect(() => Tlv.decode(Uint8Array.of(0x16, 0x04, 0x01))).throws(UnexpectedTlvError, "Unterminated container");
        expect(() => Tlv.decode(Uint8Array.of(0x05, 0x01))).throws(
            UnexpectedTlvError,
            "Read of 2 byte(s) at offset 1 exceeds TLV length 2",
        );
        expect(() => Tlv.decode(Uint8Array.of(0x18))).throws(UnexpectedTlvError, "Unexpected end of container");
        expect(() => Tlv.decode(Uint8Array.of(0x04, 0x01, 0x04))).throws(
            UnexpectedTlvError,
            "Trailing data after top-level element at offset 2",
        );
        expect(() => Tlv.decode(Uint8Array.of(0x15, 0x04, 0x01, 0x18))).throws(
            UnexpectedTlvError,
            "Anonymous structure member",
        );
    });
});
