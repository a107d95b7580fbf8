/**
 * Dispatch interpreter tests: the contract decides every answer.
 */

import { create, toJson } from "@bufbuild/protobuf";
import { Code, ConnectError } from "@connectrpc/connect";
import { parseContract } from "@covenant/contract";
import { greeterContractDocument, greeterSchema, requireValue } from "@covenant/test-utils";
import { describe, expect, it } from "vitest";
import { ContractClient } from "./contract-client.js";
import { CaseCompiler, type ServiceDispatch } from "./dispatch.js";
import { matchRequest } from "./match.js";

const schema = greeterSchema();

function compile(document: unknown): ServiceDispatch {
	const contract = parseContract(document);
	return new CaseCompiler().compileService(schema.service, requireValue(contract.services.MyService));
}

function greeterWith(cases: Record<string, unknown>): ServiceDispatch {
	return compile({ name: "test", services: { MyService: { MyMethod: cases } } });
}

async function rejection(promise: Promise<unknown>): Promise<ConnectError> {
	try {
		await promise;
	} catch (error) {
		return ConnectError.from(error);
	}
	throw new Error("expected the call to fail");
}

describe("ContractClient", () => {
	const client = new ContractClient(compile(greeterContractDocument()));

	it("answers a success case with its response", async () => {
		const response = await client.call("MyMethod", { requestField: "VALUE" });
		expect(toJson(schema.response, response)).toEqual({ responseField: "42" });
	});

	it("answers a failure case with its code and message", async () => {
		const error = await rejection(client.call("MyMethod", { requestField: "ANOTHER_VALUE" }));
		expect(error.code).toBe(Code.NotFound);
		expect(error.rawMessage).toBe("ANOTHER_VALUE NotFound");
		expect(error.message).toBe("[not_found] ANOTHER_VALUE NotFound");
	});

	it("answers an unmatched request with an empty response", async () => {
		const response = await client.call("MyMethod", { requestField: "SOMETHING_ELSE" });
		expect(toJson(schema.response, response)).toEqual({});
	});

	it("accepts request messages and local method names", async () => {
		const request = create(schema.request, { requestField: "VALUE" });
		const response = await client.call("myMethod", request);
		expect(toJson(schema.response, response)).toEqual({ responseField: "42" });
	});

	it("rejects methods the service does not declare", async () => {
		const error = await rejection(client.call("Missing", {}));
		expect(error.code).toBe(Code.Unimplemented);
	});

	it("returns the first of two success cases with equal requests", async () => {
		const duplicated = new ContractClient(
			greeterWith({
				successCases: [
					{ request: { requestField: "VALUE" }, response: { responseField: 1 } },
					{ request: { requestField: "VALUE" }, response: { responseField: 2 } },
				],
			}),
		);
		const response = await duplicated.call("MyMethod", { requestField: "VALUE" });
		expect(toJson(schema.response, response)).toEqual({ responseField: "1" });
	});

	it("prefers a success case over a failure case with an equal request", async () => {
		const shadowed = new ContractClient(
			greeterWith({
				failureCases: [{ request: { requestField: "VALUE" }, error: { code: "Internal", message: "never" } }],
				successCases: [{ request: { requestField: "VALUE" }, response: { responseField: 7 } }],
			}),
		);
		const response = await shadowed.call("MyMethod", { requestField: "VALUE" });
		expect(toJson(schema.response, response)).toEqual({ responseField: "7" });
	});

	it("returns the first of two failure cases with equal requests", async () => {
		const failing = new ContractClient(
			greeterWith({
				failureCases: [
					{ request: { requestField: "X" }, error: { code: "NotFound", message: "first" } },
					{ request: { requestField: "X" }, error: { code: "Internal", message: "second" } },
				],
			}),
		);
		const error = await rejection(failing.call("MyMethod", { requestField: "X" }));
		expect(error.message).toBe("[not_found] first");
	});
});

describe("matchRequest", () => {
	const dispatch = requireValue(compile(greeterContractDocument()).methods[0]);

	it("reports the matching entry", () => {
		const result = matchRequest(dispatch, create(schema.request, { requestField: "ANOTHER_VALUE" }));
		expect(result.matched).toBe(true);
		if (result.matched) {
			expect(result.entry.kind).toBe("failure");
			expect(result.entry.description).toBe("not found");
		}
	});

	it("falls through to the default outcome", () => {
		const result = matchRequest(dispatch, create(schema.request));
		expect(result).toEqual({ matched: false, outcome: { kind: "default" } });
	});
});
