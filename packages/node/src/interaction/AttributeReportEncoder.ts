/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { ImplementationError } from "#general";
import { TlvByteWriter } from "#types";
import { type AttributeDataEncoder, AttributeDataWriter } from "./AttributeDataEncoder.js";
import type { AttributePath } from "./AttributeRequest.js";

/**
 * A completed attribute value.
 */
export interface AttributeReport {
    readonly path: AttributePath;
    readonly dataVersion: number;

    /**
     * The TLV-encoded value, tagged with {@link AttributeDataWriter.DATA_TAG}.
     */
    readonly payload: Uint8Array;
}

/**
 * {@link AttributeDataEncoder} that collects completed values as {@link AttributeReport}s.
 *
 * If the requester supplied a data version filter, values at that version are skipped.  A value that is never
 * completed, for example because encoding threw, produces no report.
 */
export class AttributeReportEncoder implements AttributeDataEncoder {
    readonly #path: AttributePath;
    readonly #dataVersionFilter?: number;
    readonly #maxLength?: number;
    readonly #reports = new Array<AttributeReport>();

    constructor(path: AttributePath, options: AttributeReportEncoder.Options = {}) {
        this.#path = path;
        this.#dataVersionFilter = options.dataVersionFilter;
        this.#maxLength = options.maxLength;
    }

    get reports(): readonly AttributeReport[] {
        return this.#reports;
    }

    withDataVersion(dataVersion: number) {
        if (dataVersion === this.#dataVersionFilter) {
            return;
        }

        return new ReportWriter(this.#maxLength, payload =>
            this.#reports.push({ path: this.#path, dataVersion, payload }),
        );
    }
}

export namespace AttributeReportEncoder {
    export interface Options {
        /**
         * The data version the requester already holds.
         */
        dataVersionFilter?: number;

        /**
         * Capacity of each encoded value in bytes.
         */
        maxLength?: number;
    }
}

class ReportWriter extends TlvByteWriter implements AttributeDataWriter {
    readonly tag = AttributeDataWriter.DATA_TAG;
    #onComplete?: (payload: Uint8Array) => void;

    constructor(maxLength: number | undefined, onComplete: (payload: Uint8Array) => void) {
        super({ maxLength });
        this.#onComplete = onComplete;
    }

    complete() {
        const onComplete = this.#onComplete;
        if (onComplete === undefined) {
            throw new ImplementationError("Attribute value is already complete");
        }
        const payload = this.toByteArray();
        this.#onComplete = undefined;
        onComplete(payload);
    }
}
