/**
 * Contract-backed stand-ins that need no generated code: a client that
 * answers from a compiled service, and a Connect service implementation
 * that does the same behind a transport.
 */

import { create, type DescMessage, type DescService, type Message, type MessageInitShape } from "@bufbuild/protobuf";
import type { ServiceImpl } from "@connectrpc/connect";
import type { MethodDispatch, ServiceDispatch } from "./dispatch.js";
import { matchRequest, settle, unknownMethodError } from "./match.js";

export class ContractClient {
	private readonly methods = new Map<string, MethodDispatch>();

	constructor(readonly dispatch: ServiceDispatch) {
		for (const method of dispatch.methods) {
			this.methods.set(method.method.name, method);
			this.methods.set(method.method.localName, method);
		}
	}

	/**
	 * Calls `method` (proto name or local name) with a request message or
	 * its init shape.
	 */
	async call(method: string, request: Message | MessageInitShape<DescMessage>): Promise<Message> {
		const dispatch = this.methods.get(method);
		if (!dispatch) {
			throw unknownMethodError(this.dispatch.service.typeName, method);
		}
		const message = create(dispatch.method.input, request);
		return settle(dispatch, matchRequest(dispatch, message));
	}
}

/**
 * Connect implementation of a compiled service. Methods without contract
 * cases answer every request with an empty response.
 */
export function createContractServiceImpl(dispatch: ServiceDispatch): Partial<ServiceImpl<DescService>> {
	const implementation: Partial<ServiceImpl<DescService>> = {};
	for (const method of dispatch.methods) {
		implementation[method.method.localName] = async (request: Message) => settle(method, matchRequest(method, request));
	}
	return implementation;
}
