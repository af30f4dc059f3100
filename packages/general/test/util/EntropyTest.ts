/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Entropy, StandardEntropy } from "../../src/util/Entropy.js";

class CountingEntropy extends Entropy {
    randomBytes(length: number) {
        return Uint8Array.from({ length }, (_, i) => 0xa0 + i);
    }
}

describe("Entropy", () => {
    it("reads big-endian integers", () => {
        const entropy = new CountingEntropy();

        expect(entropy.randomUint8).equals(0xa0);
        expect(entropy.randomUint16).equals(0xa0a1);
        expect(entropy.randomUint32).equals(0xa0a1a2a3);
    });

    it("produces platform random bytes", () => {
        const entropy = new StandardEntropy();

        expect(entropy.randomBytes(16).length).equals(16);
        expect(entropy.randomUint32).within(0, 0xffffffff);
    });
});
