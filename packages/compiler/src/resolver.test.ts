/**
 * Value Resolver Tests
 */

import { type JsonValue, ScalarType, toJson } from "@bufbuild/protobuf";
import { type CaseLocation, FieldMismatchError, SchemaConformanceError } from "@covenant/contract";
import { catalogSchema, greeterSchema, requireArrayItem } from "@covenant/test-utils";
import { describe, expect, it } from "vitest";
import { ValueResolver } from "./resolver.js";
import { fieldNumbers, findField } from "./values.js";

const REQUEST_AT: CaseLocation = { service: "MyService", method: "MyMethod", kind: "success", index: 0, part: "request" };
const ITEM_AT: CaseLocation = { service: "Catalog", method: "GetItem", kind: "success", index: 2, part: "response" };

const ITEM_JSON = {
	id: "sku-1",
	status: "STATUS_ACTIVE",
	price: { units: "12", nanos: 500000000, currency: "EUR" },
	tags: ["new", "sale"],
	stock: { berlin: 3 },
	checksum: "AQID",
	rating: 4.5,
	visible: true,
	sku: "A-1",
	note: "fragile",
	history: [{ units: "10" }],
	revision: "7",
	attributes: { color: "red" },
	dimensions: { width: 1.5, height: 2 },
} satisfies JsonValue;

describe("ValueResolver", () => {
	describe("scalars", () => {
		const schema = greeterSchema();
		const resolver = new ValueResolver();

		it("resolves populated fields against the message type", () => {
			const resolved = resolver.resolve({ requestField: "VALUE" }, schema.request, REQUEST_AT);

			expect(resolved.desc).toBe(schema.request);
			expect(resolved.fields).toHaveLength(1);
			const [entry] = resolved.fields;
			expect(entry?.field.name).toBe("request_field");
			expect(entry?.value).toEqual({ kind: "scalar", type: ScalarType.STRING, value: "VALUE" });
		});

		it("decodes 64-bit integers to bigint", () => {
			const resolved = resolver.resolve({ responseField: 42 }, schema.response, REQUEST_AT);
			expect(findField(resolved, 1)?.value).toEqual({ kind: "scalar", type: ScalarType.INT64, value: 42n });
		});

		it("accepts proto field names as keys", () => {
			const resolved = resolver.resolve({ request_field: "VALUE" }, schema.request, REQUEST_AT);
			expect(fieldNumbers(resolved)).toEqual([1]);
		});

		it("omits absent and null fields", () => {
			expect(resolver.resolve({}, schema.request, REQUEST_AT).fields).toEqual([]);
			expect(resolver.resolve({ requestField: null }, schema.request, REQUEST_AT).fields).toEqual([]);
		});

		it("reuses field tables across cases", () => {
			const local = new ValueResolver();
			local.resolve({ requestField: "A" }, schema.request, REQUEST_AT);
			local.resolve({ requestField: "B" }, schema.request, REQUEST_AT);
			expect(local.fieldIndexes.size).toBe(1);
		});
	});

	describe("field mismatches", () => {
		const schema = greeterSchema();
		const resolver = new ValueResolver();

		it("names an unknown key and the case", () => {
			const resolve = () => resolver.resolve({ requestFeild: "VALUE" }, schema.request, REQUEST_AT);

			expect(resolve).toThrow(FieldMismatchError);
			expect(resolve).toThrow(
				"field not found requestFeild while inspecting message acme.v1.MyRequest (MyService.MyMethod successCases[0] request)",
			);
		});

		it("reports nested keys with their path and message type", () => {
			const { item } = catalogSchema();
			try {
				resolver.resolve({ history: [{ units: "1" }, { unit: "2" }] }, item, ITEM_AT);
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(FieldMismatchError);
				if (error instanceof FieldMismatchError) {
					expect(error.field).toBe("history[1].unit");
					expect(error.typeName).toBe("acme.catalog.v1.Price");
				}
			}
		});

		it("detects fields renumbered in the decoding registry", () => {
			const newer = greeterSchema({ requestFieldNumber: 2 });
			const drifted = new ValueResolver({ registry: newer.registry });

			expect(() => drifted.resolve({ requestField: "VALUE" }, schema.request, REQUEST_AT)).toThrow(
				"field not found request_field while inspecting message acme.v1.MyRequest",
			);
		});
	});

	describe("schema conformance", () => {
		const schema = greeterSchema();
		const resolver = new ValueResolver();

		it("rejects values of the wrong type", () => {
			const resolve = () => resolver.resolve({ responseField: "forty-two" }, schema.response, REQUEST_AT);
			expect(resolve).toThrow(SchemaConformanceError);
			expect(resolve).toThrow("MyService.MyMethod successCases[0] request does not conform to acme.v1.MyResponse: ");
		});

		it("rejects a non-object message value", () => {
			expect(() => resolver.resolve("VALUE", schema.request, REQUEST_AT)).toThrow(SchemaConformanceError);
		});
	});

	describe("every field kind", () => {
		const schema = catalogSchema();
		const resolver = new ValueResolver();
		const resolved = resolver.resolve(ITEM_JSON, schema.item, ITEM_AT);

		it("orders fields by number", () => {
			expect(fieldNumbers(resolved)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 11, 12, 13, 14, 15]);
		});

		it("serializes back to the contract value", () => {
			expect(toJson(schema.item, resolved.message)).toEqual(ITEM_JSON);
		});

		it("keeps enum numbers with their type", () => {
			const status = findField(resolved, 2)?.value;
			expect(status?.kind).toBe("enum");
			if (status?.kind === "enum") {
				expect(status.value).toBe(1);
				expect(status.desc.typeName).toBe("acme.catalog.v1.Status");
			}
		});

		it("resolves nested messages", () => {
			const price = findField(resolved, 3)?.value;
			expect(price?.kind).toBe("message");
			if (price?.kind === "message") {
				expect(price.message.desc.typeName).toBe("acme.catalog.v1.Price");
				expect(fieldNumbers(price.message)).toEqual([1, 2, 3]);
			}
		});

		it("resolves lists and maps", () => {
			expect(findField(resolved, 4)?.value).toEqual({
				kind: "list",
				items: [
					{ kind: "scalar", type: ScalarType.STRING, value: "new" },
					{ kind: "scalar", type: ScalarType.STRING, value: "sale" },
				],
			});
			expect(findField(resolved, 5)?.value).toEqual({
				kind: "map",
				entries: [{ key: "berlin", value: { kind: "scalar", type: ScalarType.INT32, value: 3 } }],
			});
		});

		it("decodes bytes from base64", () => {
			expect(findField(resolved, 6)?.value).toEqual({
				kind: "scalar",
				type: ScalarType.BYTES,
				value: new Uint8Array([1, 2, 3]),
			});
		});

		it("keeps wrapper values as messages", () => {
			const note = findField(resolved, 11)?.value;
			expect(note?.kind).toBe("message");
			if (note?.kind === "message") {
				const inner = requireArrayItem(note.message.fields, 0);
				expect(inner.value).toEqual({ kind: "scalar", type: ScalarType.STRING, value: "fragile" });
			}
		});

		it("records the oneof member that is set", () => {
			const sku = findField(resolved, 9);
			expect(sku?.field.oneof?.name).toBe("lookup");
			expect(findField(resolved, 10)).toBeUndefined();
		});
	});
});
