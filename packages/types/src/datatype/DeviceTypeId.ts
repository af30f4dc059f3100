/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Branded } from "#general";
import { assertInteger } from "../common/ValidationError.js";

/**
 * Identifies the kind of logical device an endpoint implements.
 */
export type DeviceTypeId = Branded<number, "DeviceTypeId">;

export function DeviceTypeId(deviceTypeId: number): DeviceTypeId {
    assertInteger("Device type ID", deviceTypeId, 0, 0xffffffff);
    return deviceTypeId as DeviceTypeId;
}
