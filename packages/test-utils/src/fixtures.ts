/**
 * Schemas shared by the test suites.
 *
 * greeter: `acme.v1.MyService/MyMethod`, one string field in, one int64
 * field out.
 *
 * catalog: every field kind the contract language can populate, plus a
 * server-streaming method and a second service.
 */

import type { DescMessage, DescMethodUnary, DescService, FileRegistry } from "@bufbuild/protobuf";
import type { FileDescriptorProto } from "@bufbuild/protobuf/wkt";
import { enumType, field, FieldType, mapField, message, method, protoFile, service, createTestRegistry } from "./descriptors.js";

export const GREETER_FILE = "acme/v1/greeter.proto";
export const CATALOG_FILE = "acme/catalog/v1/catalog.proto";

export interface GreeterOptions {
	/** Field number of MyRequest.request_field */
	requestFieldNumber?: number;
	/** Extra request field, e.g. to simulate a newer schema */
	extraRequestField?: boolean;
}

export function greeterProto(options: GreeterOptions = {}): FileDescriptorProto {
	const requestFields = [field("request_field", options.requestFieldNumber ?? 1, FieldType.STRING)];
	if (options.extraRequestField) {
		requestFields.push(field("locale", 5, FieldType.STRING));
	}
	return protoFile({
		name: GREETER_FILE,
		package: "acme.v1",
		messageType: [
			message("MyRequest", requestFields),
			message("MyResponse", [field("response_field", 1, FieldType.INT64)]),
		],
		service: [service("MyService", [method("MyMethod", ".acme.v1.MyRequest", ".acme.v1.MyResponse")])],
	});
}

export function catalogProto(): FileDescriptorProto {
	const stock = mapField(".acme.catalog.v1.Item", "stock", 5, FieldType.STRING, FieldType.INT32);
	return protoFile({
		name: CATALOG_FILE,
		package: "acme.catalog.v1",
		dependency: ["google/protobuf/wrappers.proto", "google/protobuf/struct.proto"],
		enumType: [enumType("Status", ["STATUS_UNSPECIFIED", "STATUS_ACTIVE", "STATUS_RETIRED"])],
		messageType: [
			message("Price", [
				field("units", 1, FieldType.INT64),
				field("nanos", 2, FieldType.INT32),
				field("currency", 3, FieldType.STRING),
			]),
			message(
				"Item",
				[
					field("id", 1, FieldType.STRING),
					field("status", 2, FieldType.ENUM, { typeName: ".acme.catalog.v1.Status" }),
					field("price", 3, FieldType.MESSAGE, { typeName: ".acme.catalog.v1.Price" }),
					field("tags", 4, FieldType.STRING, { repeated: true }),
					stock.field,
					field("checksum", 6, FieldType.BYTES),
					field("rating", 7, FieldType.DOUBLE),
					field("visible", 8, FieldType.BOOL),
					field("sku", 9, FieldType.STRING, { oneofIndex: 0 }),
					field("serial", 10, FieldType.UINT64, { oneofIndex: 0 }),
					field("note", 11, FieldType.MESSAGE, { typeName: ".google.protobuf.StringValue" }),
					field("history", 12, FieldType.MESSAGE, { repeated: true, typeName: ".acme.catalog.v1.Price" }),
					field("revision", 13, FieldType.INT64, { jsString: true }),
					field("attributes", 14, FieldType.MESSAGE, { typeName: ".google.protobuf.Struct" }),
					field("dimensions", 15, FieldType.MESSAGE, { typeName: ".acme.catalog.v1.Item.Dimensions" }),
				],
				{
					nestedType: [
						stock.entry,
						message("Dimensions", [field("width", 1, FieldType.DOUBLE), field("height", 2, FieldType.DOUBLE)]),
					],
					oneofs: ["lookup"],
				},
			),
			message("GetItemRequest", [field("id", 1, FieldType.STRING), field("include_history", 2, FieldType.BOOL)]),
		],
		service: [
			service("Catalog", [
				method("GetItem", ".acme.catalog.v1.GetItemRequest", ".acme.catalog.v1.Item"),
				method("WatchItems", ".acme.catalog.v1.GetItemRequest", ".acme.catalog.v1.Item", { serverStreaming: true }),
			]),
			service("Inventory", [method("CountItems", ".acme.catalog.v1.GetItemRequest", ".acme.catalog.v1.Price")]),
		],
	});
}

function requireMessage(registry: FileRegistry, typeName: string): DescMessage {
	const desc = registry.getMessage(typeName);
	if (!desc) {
		throw new Error(`Expected message ${typeName} in test registry`);
	}
	return desc;
}

function requireService(registry: FileRegistry, typeName: string): DescService {
	const desc = registry.getService(typeName);
	if (!desc) {
		throw new Error(`Expected service ${typeName} in test registry`);
	}
	return desc;
}

function requireUnary(desc: DescService, name: string): DescMethodUnary {
	const found = desc.methods.find((candidate) => candidate.name === name);
	if (!found || found.methodKind !== "unary") {
		throw new Error(`Expected unary method ${name} on ${desc.typeName}`);
	}
	return found;
}

export interface GreeterSchema {
	registry: FileRegistry;
	service: DescService;
	method: DescMethodUnary;
	request: DescMessage;
	response: DescMessage;
}

export function greeterSchema(options: GreeterOptions = {}): GreeterSchema {
	const registry = createTestRegistry(greeterProto(options));
	const myService = requireService(registry, "acme.v1.MyService");
	return {
		registry,
		service: myService,
		method: requireUnary(myService, "MyMethod"),
		request: requireMessage(registry, "acme.v1.MyRequest"),
		response: requireMessage(registry, "acme.v1.MyResponse"),
	};
}

export interface CatalogSchema {
	registry: FileRegistry;
	catalog: DescService;
	inventory: DescService;
	getItem: DescMethodUnary;
	item: DescMessage;
	price: DescMessage;
	getItemRequest: DescMessage;
}

export function catalogSchema(): CatalogSchema {
	const registry = createTestRegistry(catalogProto());
	const catalog = requireService(registry, "acme.catalog.v1.Catalog");
	return {
		registry,
		catalog,
		inventory: requireService(registry, "acme.catalog.v1.Inventory"),
		getItem: requireUnary(catalog, "GetItem"),
		item: requireMessage(registry, "acme.catalog.v1.Item"),
		price: requireMessage(registry, "acme.catalog.v1.Price"),
		getItemRequest: requireMessage(registry, "acme.catalog.v1.GetItemRequest"),
	};
}

/**
 * Contract document for the greeter schema: one success case and one
 * failure case for MyService/MyMethod.
 */
export function greeterContractDocument() {
	return {
		name: "greeter-contract",
		services: {
			MyService: {
				MyMethod: {
					successCases: [
						{
							description: "returns 42",
							request: { requestField: "VALUE" },
							response: { responseField: 42 },
						},
					],
					failureCases: [
						{
							description: "not found",
							request: { requestField: "ANOTHER_VALUE" },
							error: { code: "NotFound", message: "ANOTHER_VALUE NotFound" },
						},
					],
				},
			},
		},
	};
}
