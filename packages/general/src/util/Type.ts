/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

declare const __brand: unique symbol;

/**
 * A nominal type layered over a primitive.  Values of different brands are not assignable to one another even though
 * they share the same runtime representation.
 */
export type Branded<T, B extends string> = T & { readonly [__brand]: B };
