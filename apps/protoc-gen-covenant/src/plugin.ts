/**
 * Plugin driver: one CodeGeneratorRequest in, one CodeGeneratorResponse out.
 */

import { create, createFileRegistry } from "@bufbuild/protobuf";
import {
	type CodeGeneratorRequest,
	type CodeGeneratorResponse,
	CodeGeneratorResponse_Feature,
	type CodeGeneratorResponse_File,
	CodeGeneratorResponse_FileSchema,
	CodeGeneratorResponseSchema,
	FileDescriptorSetSchema,
} from "@bufbuild/protobuf/wkt";
import { CaseCompiler, emitContractUnit, ValueResolver } from "@covenant/compiler";
import { type Contract, loadContractFile } from "@covenant/contract";
import { type Logger, withRunContext } from "@covenant/logger";
import { createPluginLogger } from "./logger.js";
import { type PluginOptions, parsePluginParameter } from "./options.js";

export interface GenerateDeps {
	loadContract?: (path: string) => Promise<Contract>;
	logger?: Logger;
}

/**
 * Compiles the contract against every file protoc asked for. Files whose
 * services the contract does not name produce no output. Any error aborts
 * the whole run.
 */
export async function generate(request: CodeGeneratorRequest, deps: GenerateDeps = {}): Promise<CodeGeneratorResponse> {
	const options: PluginOptions = parsePluginParameter(request.parameter);
	const logger = deps.logger ?? createPluginLogger(options.logLevel);
	const contract = await (deps.loadContract ?? loadContractFile)(options.contractFile);
	const log = withRunContext(logger, { contract: contract.name });

	log.debug(
		{ contractFile: options.contractFile, files: request.fileToGenerate.length },
		"Generating contract units",
	);

	const registry = createFileRegistry(create(FileDescriptorSetSchema, { file: request.protoFile }));
	const compiler = new CaseCompiler({ resolver: new ValueResolver({ registry }), logger: log });

	const files: CodeGeneratorResponse_File[] = [];
	for (const fileName of request.fileToGenerate) {
		const file = registry.getFile(fileName);
		if (!file) {
			throw new Error(`${fileName} is listed for generation but its descriptor is missing`);
		}
		const dispatch = compiler.compileFile(file, contract);
		if (!dispatch) {
			continue;
		}
		const unit = emitContractUnit(dispatch, { importExtension: options.importExtension });
		withRunContext(log, { file: fileName }).info(
			{ output: unit.name, services: dispatch.services.length },
			"Generated contract unit",
		);
		files.push(create(CodeGeneratorResponse_FileSchema, { name: unit.name, content: unit.content }));
	}

	return create(CodeGeneratorResponseSchema, {
		supportedFeatures: BigInt(CodeGeneratorResponse_Feature.PROTO3_OPTIONAL),
		file: files,
	});
}
