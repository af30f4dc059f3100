/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TlvTag, TlvWriter } from "#types";

/**
 * Writes one attribute value bound to a data version.
 */
export interface AttributeDataWriter extends TlvWriter {
    /**
     * Tag the attribute value must be written with.
     */
    readonly tag: TlvTag;

    /**
     * Finish the value.  Nothing written becomes visible until this is called.
     */
    complete(): void;
}

export namespace AttributeDataWriter {
    /**
     * Context tag of the data field within attribute data.
     */
    export const DATA_TAG = 2;
}

/**
 * Encodes the response to an attribute read.
 */
export interface AttributeDataEncoder {
    /**
     * Begin a value at {@link dataVersion}.
     *
     * Returns undefined if the requester already holds data at this version, in which case nothing must be written.
     */
    withDataVersion(dataVersion: number): AttributeDataWriter | undefined;
}
