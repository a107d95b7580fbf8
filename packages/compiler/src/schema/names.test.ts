import { describe, expect, it } from "vitest";
import {
	CATALOG_FILE,
	catalogProto,
	catalogSchema,
	createTestRegistry,
	GREETER_FILE,
	greeterProto,
	requireValue,
} from "@covenant/test-utils";
import {
	contractFileName,
	isWellKnownFile,
	localTypeName,
	pbImportPath,
	safeIdentifier,
	schemaIdentifier,
} from "./names.js";

const registry = createTestRegistry(greeterProto(), catalogProto());
const greeterFile = requireValue(registry.getFile(GREETER_FILE), "greeter file");
const catalogFile = requireValue(registry.getFile(CATALOG_FILE), "catalog file");
const wrappersFile = requireValue(registry.getFile("google/protobuf/wrappers.proto"), "wrappers file");

describe("safeIdentifier", () => {
	it("suffixes reserved words", () => {
		expect(safeIdentifier("class")).toBe("class$");
		expect(safeIdentifier("Object")).toBe("Object$");
	});

	it("keeps other names", () => {
		expect(safeIdentifier("Item")).toBe("Item");
	});
});

describe("localTypeName", () => {
	const schema = catalogSchema();

	it("drops the package", () => {
		expect(localTypeName(schema.item)).toBe("Item");
		expect(localTypeName(schema.catalog)).toBe("Catalog");
	});

	it("joins nested names with underscores", () => {
		const dimensions = requireValue(schema.registry.getMessage("acme.catalog.v1.Item.Dimensions"));
		expect(localTypeName(dimensions)).toBe("Item_Dimensions");
		expect(schemaIdentifier(dimensions)).toBe("Item_DimensionsSchema");
	});

	it("names enum schemas like message schemas", () => {
		const status = requireValue(schema.registry.getEnum("acme.catalog.v1.Status"));
		expect(localTypeName(status)).toBe("Status");
		expect(schemaIdentifier(status)).toBe("StatusSchema");
	});
});

describe("contractFileName", () => {
	it("replaces the .proto suffix", () => {
		expect(contractFileName(greeterFile)).toBe("acme/v1/greeter_contract.ts");
	});
});

describe("pbImportPath", () => {
	it("uses a same-directory path for the file itself", () => {
		expect(pbImportPath(greeterFile, greeterFile, "js")).toBe("./greeter_pb.js");
	});

	it("walks up to other directories", () => {
		expect(pbImportPath(catalogFile, greeterFile, "js")).toBe("../../v1/greeter_pb.js");
	});

	it("applies the configured extension", () => {
		expect(pbImportPath(greeterFile, greeterFile, "ts")).toBe("./greeter_pb.ts");
		expect(pbImportPath(greeterFile, greeterFile, "none")).toBe("./greeter_pb");
	});

	it("imports well-known types from the runtime package", () => {
		expect(isWellKnownFile(wrappersFile)).toBe(true);
		expect(pbImportPath(catalogFile, wrappersFile, "js")).toBe("@bufbuild/protobuf/wkt");
	});
});
