/**
 * @license
 * Copyright 2022-2025 Matter.js Authors
 * SPDX-License-Identifier: Apache-2.0
 */

import { Diagnostic, type Entropy, InternalError, Logger, StandardEntropy } from "#general";
import { Descriptor, type EndpointNumber, type TlvTag, type TlvWriter } from "#types";
import { Dataver } from "../../behavior/state/Dataver.js";
import type { AttributeDataEncoder } from "../../interaction/AttributeDataEncoder.js";
import type { AttributeHandler, ChangeNotifier } from "../../interaction/AttributeHandler.js";
import type { AttributeRequest } from "../../interaction/AttributeRequest.js";
import { type GlobalAttributeReader, StandardGlobalAttributeReader } from "../../interaction/GlobalAttributeReader.js";
import { NodeStructure } from "../../node/NodeStructure.js";
import { PartsMatcher } from "./PartsMatcher.js";

const logger = Logger.get("DescriptorServer");

/**
 * Serves the {@link Descriptor} cluster.
 *
 * Each attribute is a list computed from the node structure at read time:
 *
 *   - deviceTypeList - the device type of the addressed endpoint
 *   - serverList - ids of the clusters the endpoint hosts
 *   - clientList - always empty; client clusters are not modeled
 *   - partsList - endpoints selected by the {@link PartsMatcher}, in node order
 *
 * Global attributes are answered by the {@link GlobalAttributeReader}.
 */
export class DescriptorServer implements AttributeHandler, ChangeNotifier {
    readonly #matcher: PartsMatcher;
    readonly #dataver: Dataver;
    readonly #globals: GlobalAttributeReader;

    constructor(options: DescriptorServer.Options = {}) {
        this.#matcher = options.matcher ?? PartsMatcher.Standard;
        this.#dataver = options.dataver ?? new Dataver(options.entropy ?? new StandardEntropy());
        this.#globals = options.globals ?? new StandardGlobalAttributeReader();
    }

    /**
     * A server for a flat composite device.
     */
    static standard(options: Omit<DescriptorServer.Options, "matcher"> = {}) {
        return new DescriptorServer({ ...options, matcher: PartsMatcher.Standard });
    }

    /**
     * A server for a bridge whose endpoints are independent peer devices.
     */
    static aggregator(options: Omit<DescriptorServer.Options, "matcher"> = {}) {
        return new DescriptorServer({ ...options, matcher: PartsMatcher.Aggregator });
    }

    get cluster() {
        return Descriptor.Cluster;
    }

    get matcher() {
        return this.#matcher;
    }

    /**
     * The cluster's data version.  Code that changes the node structure increments it.
     */
    get dataver() {
        return this.#dataver;
    }

    read(request: AttributeRequest, encoder: AttributeDataEncoder) {
        const version = this.#dataver.value;
        const writer = encoder.withDataVersion(version);
        if (writer === undefined) {
            logger.debug(
                "Skipping unchanged",
                Diagnostic.dict({ endpoint: request.endpointId, attribute: request.attributeId, version }),
            );
            return;
        }

        if (request.isGlobal) {
            this.#globals.read(Descriptor.Cluster, request.attributeId, writer);
            return;
        }

        const attribute = Descriptor.attributeOf(request.attributeId);
        const { node, endpointId } = request;

        logger.debug(
            "Read",
            Diagnostic.strong(Descriptor.Attribute[attribute]),
            Diagnostic.dict({ endpoint: endpointId, version }),
        );

        switch (attribute) {
            case Descriptor.Attribute.DeviceTypeList:
                this.#encodeDeviceTypeList(node, endpointId, writer, writer.tag);
                break;

            case Descriptor.Attribute.ServerList:
                this.#encodeServerList(node, endpointId, writer, writer.tag);
                break;

            case Descriptor.Attribute.ClientList:
                this.#encodeClientList(writer, writer.tag);
                break;

            case Descriptor.Attribute.PartsList:
                this.#encodePartsList(node, endpointId, writer, writer.tag);
                break;

            default:
                throw new InternalError(`Unhandled descriptor attribute ${attribute satisfies never}`);
        }

        writer.complete();
    }

    consumeChange() {
        return this.#dataver.consumeChange();
    }

    #encodeDeviceTypeList(node: NodeStructure, endpointId: EndpointNumber, writer: TlvWriter, tag: TlvTag) {
        writer.startArray(tag);
        const endpoint = NodeStructure.endpointOf(node, endpointId);
        if (endpoint !== undefined) {
            Descriptor.encodeDeviceType(writer, endpoint.deviceType);
        }
        writer.endContainer();
    }

    #encodeServerList(node: NodeStructure, endpointId: EndpointNumber, writer: TlvWriter, tag: TlvTag) {
        writer.startArray(tag);
        for (const cluster of NodeStructure.endpointOf(node, endpointId)?.clusters ?? []) {
            writer.uint32(cluster.id);
        }
        writer.endContainer();
    }

    #encodeClientList(writer: TlvWriter, tag: TlvTag) {
        writer.startArray(tag);
        writer.endContainer();
    }

    #encodePartsList(node: NodeStructure, endpointId: EndpointNumber, writer: TlvWriter, tag: TlvTag) {
        writer.startArray(tag);
        for (const endpoint of node.endpoints) {
            if (this.#matcher.describe(endpointId, endpoint.id)) {
                writer.uint16(endpoint.id);
            }
        }
        writer.endContainer();
    }
}

export namespace DescriptorServer {
    export interface Options {
        /**
         * Parts list policy.  Defaults to {@link PartsMatcher.Standard}.
         */
        matcher?: PartsMatcher;

        /**
         * Entropy for the initial data version.  Ignored if {@link dataver} is supplied.
         */
        entropy?: Entropy;

        dataver?: Dataver;

        /**
         * Reader for global attributes.  Defaults to {@link StandardGlobalAttributeReader}.
         */
        globals?: GlobalAttributeReader;
    }
}
