/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./behavior/state/Dataver.js";
export * from "./behaviors/descriptor/index.js";
export * from "./interaction/AttributeDataEncoder.js";
export * from "./interaction/AttributeHandler.js";
export * from "./interaction/AttributeReportEncoder.js";
export * from "./interaction/AttributeRequest.js";
export * from "./interaction/GlobalAttributeReader.js";
export * from "./node/NodeStructure.js";
