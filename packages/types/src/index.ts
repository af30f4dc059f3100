/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./cluster/ClusterMetadata.js";
export * from "./clusters/descriptor.js";
export * from "./common/Status.js";
export * from "./common/StatusResponseError.js";
export * from "./common/ValidationError.js";
export * from "./datatype/AttributeId.js";
export * from "./datatype/ClusterId.js";
export * from "./datatype/CommandId.js";
export * from "./datatype/DeviceTypeId.js";
export * from "./datatype/EndpointNumber.js";
export * from "./tlv/TlvByteWriter.js";
export * from "./tlv/TlvCodec.js";
export * from "./tlv/TlvReader.js";
export * from "./tlv/TlvWriter.js";
