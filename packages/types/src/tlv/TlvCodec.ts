/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { DeviceError } from "#general";

/**
 * TLV element types.  The value occupies the low five bits of the control octet.
 */
export enum TlvType {
    SignedInt8 = 0x00,
    SignedInt16 = 0x01,
    SignedInt32 = 0x02,
    SignedInt64 = 0x03,
    UnsignedInt8 = 0x04,
    UnsignedInt16 = 0x05,
    UnsignedInt32 = 0x06,
    UnsignedInt64 = 0x07,
    False = 0x08,
    True = 0x09,
    Float = 0x0a,
    Double = 0x0b,
    Utf8String8 = 0x0c,
    Utf8String16 = 0x0d,
    Utf8String32 = 0x0e,
    ByteString8 = 0x10,
    ByteString16 = 0x11,
    ByteString32 = 0x12,
    Null = 0x14,
    Structure = 0x15,
    Array = 0x16,
    List = 0x17,
    EndOfContainer = 0x18,
}

/**
 * Tag control values.  The value occupies the high three bits of the control octet.
 */
export enum TlvTagControl {
    Anonymous = 0,
    ContextSpecific = 1,
}

/**
 * A context-specific tag number (0-255).  An undefined tag encodes as anonymous.
 */
export type TlvTag = number | undefined;

/**
 * Element types that open a container.
 */
export type TlvContainerType = TlvType.Structure | TlvType.Array | TlvType.List;

export namespace TlvCodec {
    export function controlOctet(type: TlvType, tag: TlvTag) {
        const tagControl = tag === undefined ? TlvTagControl.Anonymous : TlvTagControl.ContextSpecific;
        return (tagControl << 5) | type;
    }

    export function isContainer(type: TlvType): type is TlvContainerType {
        return type === TlvType.Structure || type === TlvType.Array || type === TlvType.List;
    }
}

/**
 * Base class for TLV encoding and decoding failures.
 */
export class TlvError extends DeviceError {}

/**
 * Thrown when an encoded element does not fit the writer's capacity.
 */
export class TlvBufferExhaustedError extends TlvError {}

/**
 * Thrown when TLV data or a sequence of writer calls is malformed.
 */
export class UnexpectedTlvError extends TlvError {}
