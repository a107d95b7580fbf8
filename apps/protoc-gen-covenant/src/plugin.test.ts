/**
 * Plugin Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { create, fromBinary, toBinary } from "@bufbuild/protobuf";
import { CodeGeneratorRequestSchema, CodeGeneratorResponseSchema } from "@bufbuild/protobuf/wkt";
import { InvalidErrorCodeError, MissingOptionError, parseContract } from "@covenant/contract";
import { type LogLevel, pino } from "@covenant/logger";
import {
	CATALOG_FILE,
	catalogProto,
	GREETER_FILE,
	greeterContractDocument,
	greeterProto,
	requireArrayItem,
	wellKnownProtos,
} from "@covenant/test-utils";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { main, type PluginLoggerFactory } from "./index.js";
import { generate } from "./plugin.js";

const logger = pino({ level: "silent" });

function greeterRequest(parameter: string) {
	return create(CodeGeneratorRequestSchema, {
		parameter,
		fileToGenerate: [GREETER_FILE],
		protoFile: [greeterProto()],
	});
}

describe("generate", () => {
	it("emits one unit per contracted schema file", async () => {
		const loaded: string[] = [];
		const response = await generate(greeterRequest("contract-file=contracts/greeter.json"), {
			logger,
			loadContract: async (path) => {
				loaded.push(path);
				return parseContract(greeterContractDocument());
			},
		});

		expect(loaded).toEqual(["contracts/greeter.json"]);
		expect(response.supportedFeatures).toBe(1n);
		expect(response.file.map((file) => file.name)).toEqual(["acme/v1/greeter_contract.ts"]);
		const content = requireArrayItem(response.file, 0).content;
		expect(content.startsWith("// Code generated by protoc-gen-covenant. DO NOT EDIT.\n")).toBe(true);
		expect(content).toContain('import { MyRequestSchema, MyResponseSchema, MyService } from "./greeter_pb.js";\n');
	});

	it("passes the import extension through", async () => {
		const response = await generate(greeterRequest("contract-file=c.json,import_extension=ts"), {
			logger,
			loadContract: async () => parseContract(greeterContractDocument()),
		});
		expect(requireArrayItem(response.file, 0).content).toContain('from "./greeter_pb.ts";\n');
	});

	it("emits nothing for files without contracted services", async () => {
		const request = create(CodeGeneratorRequestSchema, {
			parameter: "contract-file=c.json",
			fileToGenerate: [CATALOG_FILE],
			protoFile: [...wellKnownProtos(), catalogProto()],
		});
		const response = await generate(request, {
			logger,
			loadContract: async () => parseContract(greeterContractDocument()),
		});
		expect(response.file).toEqual([]);
	});

	it("reports a missing contract-file option", async () => {
		await expect(generate(greeterRequest(""), { logger })).rejects.toThrow(MissingOptionError);
	});

	it("fails on an invalid error code", async () => {
		const document = greeterContractDocument();
		const contract = parseContract({
			...document,
			services: {
				MyService: {
					MyMethod: {
						failureCases: [{ request: {}, error: { code: "Teapot", message: "short and stout" } }],
					},
				},
			},
		});
		await expect(
			generate(greeterRequest("contract-file=c.json"), { logger, loadContract: async () => contract }),
		).rejects.toThrow(InvalidErrorCodeError);
	});
});

describe("main", () => {
	let dir = "";

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "covenant-plugin-"));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	async function runMain(request: ReturnType<typeof greeterRequest>, createLogger?: PluginLoggerFactory) {
		const stdout: Uint8Array[] = [];
		const stderr: string[] = [];
		const status = await main({
			stdin: (async function* () {
				yield Buffer.from(toBinary(CodeGeneratorRequestSchema, request));
			})(),
			stdout: {
				write: (chunk: Uint8Array) => {
					stdout.push(chunk);
					return true;
				},
			},
			stderr: {
				write: (chunk: string) => {
					stderr.push(chunk);
					return true;
				},
			},
		}, createLogger);
		return { status, stdout, stderr };
	}

	it("answers a request read from stdin", async () => {
		const contractFile = join(dir, "greeter.yaml");
		await writeFile(
			contractFile,
			[
				"name: greeter-yaml",
				"services:",
				"  MyService:",
				"    MyMethod:",
				"      successCases:",
				"        - description: returns 42",
				"          request: { requestField: VALUE }",
				"          response: { responseField: 42 }",
				"",
			].join("\n"),
		);

		const { status, stdout, stderr } = await runMain(greeterRequest(`contract-file=${contractFile}`));

		expect(status).toBe(0);
		expect(stderr).toEqual([]);
		const response = fromBinary(CodeGeneratorResponseSchema, requireArrayItem(stdout, 0));
		expect(response.file.map((file) => file.name)).toEqual(["acme/v1/greeter_contract.ts"]);
		expect(requireArrayItem(response.file, 0).content).toContain("// contract: greeter-yaml\n");
	});

	it("writes errors to stderr and exits with status 1", async () => {
		const { status, stdout, stderr } = await runMain(greeterRequest(""));

		expect(status).toBe(1);
		expect(stdout).toEqual([]);
		expect(stderr).toEqual(["protoc-gen-covenant: 'contract-file' option not provided\n"]);
	});

	it("logs a failure once, at the requested level, through a single logger", async () => {
		const levels: (LogLevel | undefined)[] = [];
		const lines: string[] = [];
		const createLogger: PluginLoggerFactory = (level) => {
			levels.push(level);
			return pino({ level: level ?? "warn", base: null }, { write: (line: string) => lines.push(line) });
		};

		const missing = join(dir, "missing.json");
		const { status, stderr } = await runMain(greeterRequest(`contract-file=${missing},log_level=debug`), createLogger);

		expect(status).toBe(1);
		expect(levels).toEqual(["debug"]);
		expect(stderr).toHaveLength(1);
		expect(stderr[0]?.startsWith("protoc-gen-covenant: ")).toBe(true);
		const failures = lines.filter((line) => line.includes('"msg":"Contract generation failed"'));
		expect(failures).toHaveLength(1);
		expect(failures[0]).toContain('"level":20');
		expect(failures[0]).toContain('"code":"MALFORMED_CONTRACT"');
	});

	it("falls back to the default logger when the parameter does not parse", async () => {
		const levels: (LogLevel | undefined)[] = [];
		const createLogger: PluginLoggerFactory = (level) => {
			levels.push(level);
			return pino({ level: "silent" });
		};

		const { status } = await runMain(greeterRequest("log_level=loud"), createLogger);

		expect(status).toBe(1);
		expect(levels).toEqual([undefined]);
	});
});
