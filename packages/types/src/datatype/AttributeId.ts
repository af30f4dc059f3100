/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Branded } from "#general";
import { assertInteger } from "../common/ValidationError.js";

/**
 * An attribute identifier, unique within its cluster.
 */
export type AttributeId = Branded<number, "AttributeId">;

export function AttributeId(attributeId: number): AttributeId {
    assertInteger("Attribute ID", attributeId, 0, 0xffffffff);
    return attributeId as AttributeId;
}

export namespace AttributeId {
    /**
     * Global attributes occupy the top of the attribute range and are answered identically by every cluster.
     */
    export function isGlobal(attributeId: AttributeId) {
        return attributeId >= 0xfff8 && attributeId <= 0xfffd;
    }
}
