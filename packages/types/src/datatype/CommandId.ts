/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Branded } from "#general";
import { assertInteger } from "../common/ValidationError.js";

export type CommandId = Branded<number, "CommandId">;

export function CommandId(commandId: number): CommandId {
    assertInteger("Command ID", commandId, 0, 0xffffffff);
    return commandId as CommandId;
}
