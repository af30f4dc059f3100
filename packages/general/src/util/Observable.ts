/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { asError } from "../DeviceError.js";
import { Logger } from "../log/Logger.js";

const logger = Logger.get("Observable");

export type Observer<T extends unknown[]> = (...args: T) => void;

/**
 * A synchronous event source.
 *
 * Observers run in registration order.  An observer that throws is logged and does not prevent delivery to the
 * observers that follow.
 */
export interface Observable<T extends unknown[] = []> {
    on(observer: Observer<T>): void;
    off(observer: Observer<T>): void;
    once(observer: Observer<T>): void;
    emit(...args: T): void;
    readonly isObserved: boolean;
}

export function Observable<T extends unknown[] = []>(): Observable<T> {
    return new BasicObservable<T>();
}

class BasicObservable<T extends unknown[]> implements Observable<T> {
    #observers = new Set<Observer<T>>();
    #once = new WeakSet<Observer<T>>();

    get isObserved() {
        return this.#observers.size > 0;
    }

    on(observer: Observer<T>) {
        this.#observers.add(observer);
    }

    off(observer: Observer<T>) {
        this.#observers.delete(observer);
        this.#once.delete(observer);
    }

    once(observer: Observer<T>) {
        this.#once.add(observer);
        this.on(observer);
    }

    emit(...args: T) {
        for (const observer of [...this.#observers]) {
            if (this.#once.has(observer)) {
                this.off(observer);
            }
            try {
                observer(...args);
            } catch (e) {
                logger.error("Unhandled error in observer:", asError(e));
            }
        }
    }
}
