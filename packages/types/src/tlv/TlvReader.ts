/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { type TlvTag, TlvTagControl, TlvType, UnexpectedTlvError } from "./TlvCodec.js";

/**
 * A decoded TLV value.  Arrays and lists decode as arrays; structures decode as objects keyed by context tag.
 */
export type TlvValue = number | bigint | boolean | null | string | Uint8Array | TlvValue[] | TlvStructure;

export interface TlvStructure {
    [tag: number]: TlvValue;
}

export interface TlvElement {
    tag: TlvTag;
    value: TlvValue;
}

/**
 * Sequential TLV decoder.
 */
export class TlvReader {
    readonly #bytes: Uint8Array;
    readonly #view: DataView;
    #offset = 0;

    constructor(bytes: Uint8Array) {
        this.#bytes = bytes;
        this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get done() {
        return this.#offset >= this.#bytes.length;
    }

    get offset() {
        return this.#offset;
    }

    /**
     * Read the next complete element, including the contents of a container.
     */
    readElement(): TlvElement {
        const control = this.#uint(1);
        const type = control & 0x1f;
        const tagControl = control >> 5;

        let tag: TlvTag;
        switch (tagControl) {
            case TlvTagControl.Anonymous:
                break;

            case TlvTagControl.ContextSpecific:
                tag = this.#uint(1);
                break;

            default:
                throw new UnexpectedTlvError(`Unsupported tag control ${tagControl} at offset ${this.#offset - 1}`);
        }

        return { tag, value: this.#readValue(type) };
    }

    #readValue(type: number): TlvValue {
        switch (type) {
            case TlvType.SignedInt8:
                return this.#view.getInt8(this.#advance(1));

            case TlvType.SignedInt16:
                return this.#view.getInt16(this.#advance(2), true);

            case TlvType.SignedInt32:
                return this.#view.getInt32(this.#advance(4), true);

            case TlvType.SignedInt64:
                return narrow(this.#view.getBigInt64(this.#advance(8), true));

            case TlvType.UnsignedInt8:
                return this.#uint(1);

            case TlvType.UnsignedInt16:
                return this.#uint(2);

            case TlvType.UnsignedInt32:
                return this.#uint(4);

            case TlvType.UnsignedInt64:
                return narrow(this.#view.getBigUint64(this.#advance(8), true));

            case TlvType.False:
                return false;

            case TlvType.True:
                return true;

            case TlvType.Float:
                return this.#view.getFloat32(this.#advance(4), true);

            case TlvType.Double:
                return this.#view.getFloat64(this.#advance(8), true);

            case TlvType.Utf8String8:
                return new TextDecoder().decode(this.#octets(this.#uint(1)));

            case TlvType.Utf8String16:
                return new TextDecoder().decode(this.#octets(this.#uint(2)));

            case TlvType.Utf8String32:
                return new TextDecoder().decode(this.#octets(this.#uint(4)));

            case TlvType.ByteString8:
                return this.#octets(this.#uint(1));

            case TlvType.ByteString16:
                return this.#octets(this.#uint(2));

            case TlvType.ByteString32:
                return this.#octets(this.#uint(4));

            case TlvType.Null:
                return null;

            case TlvType.Array:
            case TlvType.List: {
                const elements = new Array<TlvValue>();
                while (!this.#atEndOfContainer()) {
                    elements.push(this.readElement().value);
                }
                return elements;
            }

            case TlvType.Structure: {
                const structure: TlvStructure = {};
                while (!this.#atEndOfContainer()) {
                    const { tag, value } = this.readElement();
                    if (tag === undefined) {
                        throw new UnexpectedTlvError(`Anonymous structure member at offset ${this.#offset}`);
                    }
                    structure[tag] = value;
                }
                return structure;
            }

            case TlvType.EndOfContainer:
                throw new UnexpectedTlvError(`Unexpected end of container at offset ${this.#offset - 1}`);

            default:
                throw new UnexpectedTlvError(`Unsupported element type 0x${type.toString(16)}`);
        }
    }

    #atEndOfContainer() {
        if (this.done) {
            throw new UnexpectedTlvError("Unterminated container");
        }
        if (this.#bytes[this.#offset] === TlvType.EndOfContainer) {
            this.#offset++;
            return true;
        }
        return false;
    }

    #uint(width: 1 | 2 | 4) {
        const at = this.#advance(width);
        switch (width) {
            case 1:
                return this.#view.getUint8(at);
            case 2:
                return this.#view.getUint16(at, true);
            case 4:
                return this.#view.getUint32(at, true);
        }
    }

    #octets(length: number) {
        const at = this.#advance(length);
        return this.#bytes.slice(at, at + length);
    }

    #advance(length: number) {
        const at = this.#offset;
        if (at + length > this.#bytes.length) {
            throw new UnexpectedTlvError(`Read of ${length} byte(s) at offset ${at} exceeds TLV length ${this.#bytes.length}`);
        }
        this.#offset += length;
        return at;
    }
}

export namespace Tlv {
    /**
     * Decode a buffer containing exactly one top-level element.
     */
    export function decode(bytes: Uint8Array): TlvValue {
        const reader = new TlvReader(bytes);
        const { value } = reader.readElement();
        if (!reader.done) {
            throw new UnexpectedTlvError(`Trailing data after top-level element at offset ${reader.offset}`);
        }
        return value;
    }
}

function narrow(value: bigint) {
    if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
        return Number(value);
    }
    return value;
}
