/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { type Entropy, Observable } from "#general";

/**
 * A cluster's data version.
 *
 * The version starts at a random value and advances by one (modulo 2^32) on each {@link increment}.  Readers compare
 * it against the version a requester last saw to skip unchanged data.
 *
 * Change notification is edge-triggered and single-slot.  Any number of increments between two calls to
 * {@link consumeChange} produce one notification.
 */
export class Dataver {
    #version: number;
    #changePending = false;
    readonly #changed = Observable<[version: number]>();

    constructor(entropy: Entropy) {
        this.#version = entropy.randomUint32;
    }

    get value() {
        return this.#version;
    }

    /**
     * Emits the new version after each increment.
     */
    get changed() {
        return this.#changed;
    }

    /**
     * True if the version advanced since the last {@link consumeChange}.
     */
    get hasPendingChange() {
        return this.#changePending;
    }

    /**
     * Record a change to the data this version covers.
     */
    increment() {
        this.#version = (this.#version + 1) % 0x1_0000_0000;
        this.#changePending = true;
        this.#changed.emit(this.#version);
        return this.#version;
    }

    /**
     * Returns true exactly once per burst of increments, then false until the next increment.
     */
    consumeChange() {
        if (!this.#changePending) {
            return false;
        }
        this.#changePending = false;
        return true;
    }
}
