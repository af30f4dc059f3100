/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AttributeDataEncoder } from "./AttributeDataEncoder.js";
import type { AttributeRequest } from "./AttributeRequest.js";

/**
 * Serves attribute reads for one cluster instance.
 *
 * Reads are synchronous.  An implementation only traverses in-memory state and writes to the encoder; it never awaits
 * or performs I/O.
 */
export interface AttributeHandler {
    read(request: AttributeRequest, encoder: AttributeDataEncoder): void;
}

/**
 * Source of edge-triggered change notifications.
 */
export interface ChangeNotifier {
    /**
     * Returns true if a change occurred since the previous call.
     */
    consumeChange(): boolean;
}
