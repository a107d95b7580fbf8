import type { DescEnum, DescFile, DescMessage, DescService } from "@bufbuild/protobuf";
import { type ImportExtension, localTypeName, pbImportPath, schemaIdentifier } from "../schema/names.js";
import type { LiteralContext } from "./literal.js";
import type { SourcePrinter } from "./printer.js";

const PROTOBUF = "@bufbuild/protobuf";
const CONNECT = "@connectrpc/connect";

/**
 * Resolves the identifiers one generated unit references, registering the
 * matching imports on its printer.
 */
export class EmitContext implements LiteralContext {
	constructor(
		readonly printer: SourcePrinter,
		readonly file: DescFile,
		readonly importExtension: ImportExtension,
	) {}

	schema(desc: DescMessage): string {
		return this.printer.import(schemaIdentifier(desc), pbImportPath(this.file, desc.file, this.importExtension));
	}

	enumRef(desc: DescEnum): string {
		return this.printer.import(localTypeName(desc), pbImportPath(this.file, desc.file, this.importExtension));
	}

	service(desc: DescService): string {
		return this.printer.import(localTypeName(desc), pbImportPath(this.file, desc.file, this.importExtension));
	}

	protobuf(name: string, typeOnly = false): string {
		return this.printer.import(name, PROTOBUF, { typeOnly });
	}

	connect(name: string, typeOnly = false): string {
		return this.printer.import(name, CONNECT, { typeOnly });
	}

	nodeTest(name: string): string {
		return this.printer.import(name, "node:test", { typeOnly: true });
	}
}
