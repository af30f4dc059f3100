/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { assertInteger, ValidationOutOfBoundsError } from "../common/ValidationError.js";
import {
    TlvBufferExhaustedError,
    TlvCodec,
    type TlvContainerType,
    type TlvTag,
    TlvType,
    UnexpectedTlvError,
} from "./TlvCodec.js";
import type { TlvWriter } from "./TlvWriter.js";

const UINT64_MAX = BigInt("0xffffffffffffffff");

/**
 * {@link TlvWriter} that encodes into a byte array.
 *
 * Unsigned integers encode using the narrowest width that holds the value.  Multi-byte values are little-endian.
 */
export class TlvByteWriter implements TlvWriter {
    readonly #bytes = new Array<number>();
    readonly #containers = new Array<TlvContainerType>();
    readonly #maxLength?: number;

    constructor(options: TlvByteWriter.Options = {}) {
        this.#maxLength = options.maxLength;
    }

    /**
     * Number of bytes written so far.
     */
    get length() {
        return this.#bytes.length;
    }

    /**
     * Number of open containers.
     */
    get depth() {
        return this.#containers.length;
    }

    startStructure(tag?: TlvTag) {
        this.#open(TlvType.Structure, tag);
    }

    startArray(tag?: TlvTag) {
        this.#open(TlvType.Array, tag);
    }

    startList(tag?: TlvTag) {
        this.#open(TlvType.List, tag);
    }

    endContainer() {
        if (!this.#containers.length) {
            throw new UnexpectedTlvError("Cannot end container because no container is open");
        }
        this.#append([TlvType.EndOfContainer]);
        this.#containers.pop();
    }

    uint8(value: number, tag?: TlvTag) {
        assertInteger("UInt8", value, 0, 0xff);
        this.#unsigned(value, tag);
    }

    uint16(value: number, tag?: TlvTag) {
        assertInteger("UInt16", value, 0, 0xffff);
        this.#unsigned(value, tag);
    }

    uint32(value: number, tag?: TlvTag) {
        assertInteger("UInt32", value, 0, 0xffffffff);
        this.#unsigned(value, tag);
    }

    uint64(value: number | bigint, tag?: TlvTag) {
        if (typeof value === "number") {
            assertInteger("UInt64", value, 0, Number.MAX_SAFE_INTEGER);
            value = BigInt(value);
        } else if (value < 0n || value > UINT64_MAX) {
            throw new ValidationOutOfBoundsError(`UInt64 ${value} is outside the range 0..${UINT64_MAX}`);
        }

        if (value <= 0xffffffffn) {
            this.#unsigned(Number(value), tag);
            return;
        }

        const octets = [TlvCodec.controlOctet(TlvType.UnsignedInt64, tag), ...this.#tagOctets(tag)];
        for (let i = 0n; i < 8n; i++) {
            octets.push(Number((value >> (i * 8n)) & 0xffn));
        }
        this.#append(octets);
    }

    boolean(value: boolean, tag?: TlvTag) {
        this.#element(value ? TlvType.True : TlvType.False, tag, []);
    }

    null(tag?: TlvTag) {
        this.#element(TlvType.Null, tag, []);
    }

    utf8(value: string, tag?: TlvTag) {
        const encoded = new TextEncoder().encode(value);
        const length = encoded.length;
        if (length <= 0xff) {
            this.#element(TlvType.Utf8String8, tag, [...littleEndian(length, 1), ...encoded]);
        } else if (length <= 0xffff) {
            this.#element(TlvType.Utf8String16, tag, [...littleEndian(length, 2), ...encoded]);
        } else {
            this.#element(TlvType.Utf8String32, tag, [...littleEndian(length, 4), ...encoded]);
        }
    }

    /**
     * The encoded bytes.  All containers must be closed.
     */
    toByteArray() {
        if (this.#containers.length) {
            throw new UnexpectedTlvError(`Encoding has ${this.#containers.length} unterminated container(s)`);
        }
        return Uint8Array.from(this.#bytes);
    }

    #open(type: TlvContainerType, tag: TlvTag) {
        this.#element(type, tag, []);
        this.#containers.push(type);
    }

    #unsigned(value: number, tag: TlvTag) {
        if (value <= 0xff) {
            this.#element(TlvType.UnsignedInt8, tag, littleEndian(value, 1));
        } else if (value <= 0xffff) {
            this.#element(TlvType.UnsignedInt16, tag, littleEndian(value, 2));
        } else {
            this.#element(TlvType.UnsignedInt32, tag, littleEndian(value, 4));
        }
    }

    #element(type: TlvType, tag: TlvTag, value: number[]) {
        this.#append([TlvCodec.controlOctet(type, tag), ...this.#tagOctets(tag), ...value]);
    }

    #tagOctets(tag: TlvTag) {
        const container = this.#containers[this.#containers.length - 1];

        if (tag === undefined) {
            if (container === TlvType.Structure) {
                throw new UnexpectedTlvError("Structure members require a context tag");
            }
            return [];
        }

        if (container === TlvType.Array) {
            throw new UnexpectedTlvError(`Array elements must be anonymous but tag ${tag} was supplied`);
        }
        if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
            throw new UnexpectedTlvError(`Context tag ${tag} is outside the range 0..255`);
        }
        return [tag];
    }

    #append(octets: number[]) {
        if (this.#maxLength !== undefined && this.#bytes.length + octets.length > this.#maxLength) {
            throw new TlvBufferExhaustedError(
                `Cannot write ${octets.length} byte(s) because only ${this.#maxLength - this.#bytes.length} of ${this.#maxLength} remain`,
            );
        }
        this.#bytes.push(...octets);
    }
}

export namespace TlvByteWriter {
    export interface Options {
        /**
         * Capacity in bytes.  Writes that would exceed the capacity throw {@link TlvBufferExhaustedError} and leave the
         * buffer unmodified.
         */
        maxLength?: number;
    }
}

function littleEndian(value: number, width: number) {
    const octets = new Array<number>();
    for (let i = 0; i < width; i++) {
        octets.push(value % 0x100);
        value = Math.floor(value / 0x100);
    }
    return octets;
}
