import type { FileDispatch } from "../dispatch.js";
import { contractFileName, type ImportExtension } from "../schema/names.js";
import { EmitContext } from "./context.js";
import { BUFFER_SIZE_CONSTANT, emitHarness, harnessNames } from "./harness.js";
import { emitMockClient, mockClientName } from "./mock-client.js";
import { SourcePrinter } from "./printer.js";

export const GENERATOR_NAME = "protoc-gen-covenant";

export interface EmitOptions {
	/** Extension of relative `_pb` imports */
	importExtension?: ImportExtension;
}

export interface GeneratedUnit {
	/** Path relative to the output directory */
	readonly name: string;
	readonly content: string;
}

/**
 * Renders the mock clients and conformance harnesses of every contracted
 * service in one schema file. Equal input gives byte-identical output.
 */
export function emitContractUnit(dispatch: FileDispatch, options: EmitOptions = {}): GeneratedUnit {
	const printer = new SourcePrinter();
	const context = new EmitContext(printer, dispatch.file, options.importExtension ?? "js");

	printer.reserve(BUFFER_SIZE_CONSTANT);
	for (const service of dispatch.services) {
		const { test, run } = harnessNames(service.service);
		printer.reserve(mockClientName(service.service), test, run);
	}

	printer.line("/** Per-message limit of the in-process transport used by the contract tests */");
	printer.line(`const ${BUFFER_SIZE_CONSTANT} = 1024 * 1024;`);
	for (const service of dispatch.services) {
		printer.blank();
		emitMockClient(context, service);
		printer.blank();
		emitHarness(context, service);
	}

	const header = [
		`// Code generated by ${GENERATOR_NAME}. DO NOT EDIT.`,
		`// source: ${dispatch.file.proto.name}`,
		`// contract: ${dispatch.contractName}`,
		"",
		"/* eslint-disable */",
	];
	return { name: contractFileName(dispatch.file), content: printer.toString(header) };
}
