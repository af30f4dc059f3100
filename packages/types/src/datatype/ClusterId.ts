/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Branded } from "#general";
import { assertInteger } from "../common/ValidationError.js";

/**
 * A cluster identifier.
 */
export type ClusterId = Branded<number, "ClusterId">;

export function ClusterId(clusterId: number): ClusterId {
    assertInteger("Cluster ID", clusterId, 0, 0xffffffff);
    return clusterId as ClusterId;
}
