/**
 * Identifiers and module paths of the code protoc-gen-es v2 generates, so the
 * emitted contract files can import the schemas they compare against.
 */

import { posix } from "node:path";
import type { DescEnum, DescFile, DescMessage, DescService } from "@bufbuild/protobuf";
import reservedIdentifiers from "./reserved-identifiers.json";

export type ImportExtension = "js" | "ts" | "none";

const RESERVED = new Set<string>(reservedIdentifiers);

const WKT_MODULE = "@bufbuild/protobuf/wkt";

export function safeIdentifier(name: string): string {
	return RESERVED.has(name) ? `${name}$` : name;
}

/**
 * `acme.v1.Outer.Inner` in package `acme.v1` → `Outer_Inner`
 */
export function localTypeName(desc: DescMessage | DescEnum | DescService): string {
	const pkg = desc.file.proto.package;
	const offset = pkg.length > 0 ? pkg.length + 1 : 0;
	return safeIdentifier(desc.typeName.substring(offset).replace(/\./g, "_"));
}

export function schemaIdentifier(desc: DescMessage | DescEnum): string {
	return `${localTypeName(desc)}Schema`;
}

export function protoFileStem(file: DescFile): string {
	return file.proto.name.replace(/\.proto$/, "");
}

export function contractFileName(file: DescFile): string {
	return `${protoFileStem(file)}_contract.ts`;
}

export function isWellKnownFile(file: DescFile): boolean {
	return file.proto.name.startsWith("google/protobuf/");
}

function withExtension(path: string, extension: ImportExtension): string {
	return extension === "none" ? path : `${path}.${extension}`;
}

/**
 * Module specifier used from the contract file of `from` to reach the
 * generated `_pb` module of `to`
 */
export function pbImportPath(from: DescFile, to: DescFile, extension: ImportExtension): string {
	if (isWellKnownFile(to)) {
		return WKT_MODULE;
	}
	const fromDir = posix.dirname(protoFileStem(from));
	const relative = posix.relative(fromDir, `${protoFileStem(to)}_pb`);
	const specifier = relative.startsWith("../") ? relative : `./${relative}`;
	return withExtension(specifier, extension);
}
