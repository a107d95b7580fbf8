import { create, equals, type Message } from "@bufbuild/protobuf";
import { Code, ConnectError } from "@connectrpc/connect";
import { toConnectCode } from "@covenant/contract";
import type { DispatchEntry, MethodDispatch, Outcome } from "./dispatch.js";

export type MatchResult =
	| { readonly matched: true; readonly entry: DispatchEntry; readonly outcome: Outcome }
	| { readonly matched: false; readonly outcome: { readonly kind: "default" } };

/**
 * First entry, in dispatch order, whose request equals `request`.
 * Requests that match nothing fall through to the default outcome.
 */
export function matchRequest(dispatch: MethodDispatch, request: Message): MatchResult {
	const input = dispatch.method.input;
	for (const entry of dispatch.entries) {
		if (equals(input, request, entry.request.message)) {
			return { matched: true, entry, outcome: entry.outcome };
		}
	}
	return { matched: false, outcome: { kind: "default" } };
}

/**
 * Settles a match the way generated clients do: the contract response, a
 * ConnectError carrying the contract code and message, or an empty response.
 */
export function settle(dispatch: MethodDispatch, result: MatchResult): Message {
	const outcome = result.outcome;
	switch (outcome.kind) {
		case "response":
			return outcome.response.message;
		case "error":
			throw new ConnectError(outcome.message, toConnectCode(outcome.code));
		case "default":
			return create(dispatch.method.output);
	}
}

export function unknownMethodError(service: string, method: string): ConnectError {
	return new ConnectError(`${service}.${method} is not part of this service`, Code.Unimplemented);
}
