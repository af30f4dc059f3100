/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TlvTag } from "./TlvCodec.js";

/**
 * Streaming TLV encoder.
 *
 * Containers must be balanced: every {@link startStructure}, {@link startArray} or {@link startList} requires a
 * matching {@link endContainer}.
 */
export interface TlvWriter {
    startStructure(tag?: TlvTag): void;
    startArray(tag?: TlvTag): void;
    startList(tag?: TlvTag): void;
    endContainer(): void;

    uint8(value: number, tag?: TlvTag): void;
    uint16(value: number, tag?: TlvTag): void;
    uint32(value: number, tag?: TlvTag): void;
    uint64(value: number | bigint, tag?: TlvTag): void;
    boolean(value: boolean, tag?: TlvTag): void;
    null(tag?: TlvTag): void;
    utf8(value: string, tag?: TlvTag): void;
}
