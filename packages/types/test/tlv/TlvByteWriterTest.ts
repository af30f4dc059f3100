/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ValidationError, ValidationOutOfBoundsError } from "../../src/common/ValidationError.js";
import { TlvByteWriter } from "../../src/tlv/TlvByteWriter.js";
import { TlvBufferExhaustedError, UnexpectedTlvError } from "../../src/tlv/TlvCodec.js";

function encode(write: (writer: TlvByteWriter) => void) {
    const writer = new TlvByteWriter();
    write(writer);
    return [...writer.toByteArray()];
}

describe("TlvByteWriter", () => {
    describe("unsigned integers", () => {
        it("uses the narrowest width", () => {
            expect(encode(w => w.uint16(1))).deep.equals([0x04, 0x01]);
            expect(encode(w => w.uint16(0x1234))).deep.equals([0x05, 0x34, 0x12]);
            expect(encode(w => w.uint32(0x10000))).deep.equals([0x06, 0x00, 0x00, 0x01, 0x00]);
            expect(encode(w => w.uint64(0x100)).length).equals(3);
        });

        it("encodes 64-bit values", () => {
            expect(encode(w => w.uint64(2n ** 40n))).deep.equals([0x07, 0, 0, 0, 0, 0, 0x01, 0, 0]);
        });

        it("encodes context tags", () => {
            expect(encode(w => w.uint32(5, 2))).deep.equals([0x24, 0x02, 0x05]);
        });

        it("rejects out of range values", () => {
            const writer = new TlvByteWriter();

            expect(() => writer.uint16(70000)).throws(
                ValidationOutOfBoundsError,
                "UInt16 70000 is outside the range 0..65535",
            );
            expect(() => writer.uint8(1.5)).throws(ValidationError, "UInt8 1.5 is not an integer");
            expect(() => writer.uint64(-1n)).throws(ValidationOutOfBoundsError);
            expect(writer.length).equals(0);
        });
    });

    describe("scalars", () => {
        it("encodes booleans, null and strings", () => {
            expect(encode(w => w.boolean(true))).deep.equals([0x09]);
            expect(encode(w => w.boolean(false, 1))).deep.equals([0x28, 0x01]);
            expect(encode(w => w.null())).deep.equals([0x14]);
            expect(encode(w => w.utf8("hi"))).deep.equals([0x0c, 0x02, 0x68, 0x69]);
        });
    });

    describe("containers", () => {
        it("encodes an empty array", () => {
            expect(
                encode(w => {
                    w.startArray();
                    w.endContainer();
                }),
            ).deep.equals([0x16, 0x18]);
        });

        it("encodes a structure in an array", () => {
            expect(
                encode(w => {
                    w.startArray(2);
                    w.startStructure();
                    w.uint32(0x16, 0);
                    w.uint16(1, 1);
                    w.endContainer();
                    w.endContainer();
                }),
            ).deep.equals([0x36, 0x02, 0x15, 0x24, 0x00, 0x16, 0x24, 0x01, 0x01, 0x18, 0x18]);
        });

        it("tracks depth", () => {
            const writer = new TlvByteWriter();
            writer.startList();
            writer.startStructure(1);
            expect(writer.depth).equals(2);
            writer.endContainer();
            writer.endContainer();
            expect(writer.depth).equals(0);
        });

        it("rejects unbalanced containers", () => {
            const writer = new TlvByteWriter();

            expect(() => writer.endContainer()).throws(
                UnexpectedTlvError,
                "Cannot end container because no container is open",
            );

            writer.startArray();
            expect(() => writer.toByteArray()).throws(UnexpectedTlvError, "Encoding has 1 unterminated container(s)");
        });

        it("enforces tagging rules", () => {
            const writer = new TlvByteWriter();

            writer.startArray();
            expect(() => writer.uint8(1, 0)).throws(
                UnexpectedTlvError,
                "Array elements must be anonymous but tag 0 was supplied",
            );

            writer.startStructure();
            expect(() => writer.uint8(1)).throws(UnexpectedTlvError, "Structure members require a context tag");
            expect(() => writer.uint8(1, 256)).throws(UnexpectedTlvError, "Context tag 256 is outside the range 0..255");
        });
    });

    describe("capacity", () => {
        it("throws when a write exceeds the capacity", () => {
            const writer = new TlvByteWriter({ maxLength: 3 });

            writer.startArray();
            expect(() => writer.uint16(0x1234)).throws(
                TlvBufferExhaustedError,
                "Cannot write 3 byte(s) because only 2 of 3 remain",
            );
            expect(writer.length).equals(1);

            writer.uint16(7);
            expect(writer.length).equals(3);
        });
    });
});
