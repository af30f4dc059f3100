/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./DescriptorServer.js";
export * from "./PartsMatcher.js";
