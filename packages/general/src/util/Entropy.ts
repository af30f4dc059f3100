/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomBytes } from "node:crypto";

/**
 * A source of entropy.
 */
export abstract class Entropy {
    /**
     * Create a random buffer from the most cryptographically-appropriate source available.
     */
    abstract randomBytes(length: number): Uint8Array;

    get randomUint8() {
        return this.randomBytes(1)[0];
    }

    get randomUint16() {
        return dataViewOf(this.randomBytes(2)).getUint16(0);
    }

    get randomUint32() {
        return dataViewOf(this.randomBytes(4)).getUint32(0);
    }
}

/**
 * Entropy from the Node.js cryptographic random generator.
 */
export class StandardEntropy extends Entropy {
    randomBytes(length: number): Uint8Array {
        return randomBytes(length);
    }
}

function dataViewOf(bytes: Uint8Array) {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
