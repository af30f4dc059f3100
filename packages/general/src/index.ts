/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./DeviceError.js";
export * from "./environment/VariableService.js";
export * from "./log/Diagnostic.js";
export * from "./log/Logger.js";
export * from "./log/LogLevel.js";
export * from "./util/Entropy.js";
export * from "./util/Observable.js";
export * from "./util/Type.js";
