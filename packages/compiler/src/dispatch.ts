/**
 * Case Compiler
 *
 * Turns the contract of one method into an ordered dispatch table: success
 * cases in declared order, then failure cases in declared order. The first
 * entry whose request equals the incoming request decides the outcome.
 */

import type { DescFile, DescMethod, DescMethodUnary, DescService } from "@bufbuild/protobuf";
import {
	assertStatusCodeName,
	type CaseLocation,
	type Contract,
	findMethodContract,
	findServiceContract,
	type MethodContract,
	type ServiceContract,
	type StatusCodeName,
	UnsupportedMethodError,
} from "@covenant/contract";
import type { Logger } from "@covenant/logger";
import { ValueResolver } from "./resolver.js";
import type { ResolvedMessage } from "./values.js";

// ============================================
// Dispatch IR
// ============================================

export type Outcome =
	| { readonly kind: "response"; readonly response: ResolvedMessage }
	| { readonly kind: "error"; readonly code: StatusCodeName; readonly message: string };

export interface DispatchEntry {
	readonly kind: "success" | "failure";
	/** Position within the contract's successCases / failureCases */
	readonly index: number;
	readonly description: string;
	readonly request: ResolvedMessage;
	readonly outcome: Outcome;
}

export interface MethodDispatch {
	readonly method: DescMethodUnary;
	/** False when the contract says nothing about the method */
	readonly contracted: boolean;
	readonly entries: readonly DispatchEntry[];
}

export interface ServiceDispatch {
	readonly service: DescService;
	readonly methods: readonly MethodDispatch[];
}

export interface FileDispatch {
	readonly file: DescFile;
	readonly contractName: string;
	readonly services: readonly ServiceDispatch[];
}

export function entriesOfKind(method: MethodDispatch, kind: DispatchEntry["kind"]): DispatchEntry[] {
	return method.entries.filter((entry) => entry.kind === kind);
}

export function caseName(entry: DispatchEntry): string {
	return entry.description.length > 0 ? entry.description : `case ${entry.index + 1}`;
}

/**
 * Contracts key services by simple name; the fully-qualified name is
 * accepted as well.
 */
export function serviceContractFor(contract: Contract, service: DescService): ServiceContract | undefined {
	return findServiceContract(contract, service.name) ?? findServiceContract(contract, service.typeName);
}

// ============================================
// Compiler
// ============================================

export interface CaseCompilerOptions {
	resolver?: ValueResolver;
	logger?: Logger;
}

export class CaseCompiler {
	private readonly resolver: ValueResolver;
	private readonly logger: Logger | undefined;

	constructor(options: CaseCompilerOptions = {}) {
		this.resolver = options.resolver ?? new ValueResolver();
		this.logger = options.logger;
	}

	compileMethod(method: DescMethodUnary, contract: MethodContract | undefined): MethodDispatch {
		if (!contract) {
			return { method, contracted: false, entries: [] };
		}

		const service = method.parent.name;
		const entries: DispatchEntry[] = [];

		contract.successCases.forEach((testCase, index) => {
			const at = (part: CaseLocation["part"]): CaseLocation => ({
				service,
				method: method.name,
				kind: "success",
				index,
				description: testCase.description,
				part,
			});
			const request = this.resolver.resolve(testCase.request, method.input, at("request"));
			const response = this.resolver.resolve(testCase.response, method.output, at("response"));
			entries.push({
				kind: "success",
				index,
				description: testCase.description,
				request,
				outcome: { kind: "response", response },
			});
		});

		contract.failureCases.forEach((testCase, index) => {
			const at = (part: CaseLocation["part"]): CaseLocation => ({
				service,
				method: method.name,
				kind: "failure",
				index,
				description: testCase.description,
				part,
			});
			const request = this.resolver.resolve(testCase.request, method.input, at("request"));
			const code = testCase.error.code;
			assertStatusCodeName(code, at("error"));
			entries.push({
				kind: "failure",
				index,
				description: testCase.description,
				request,
				outcome: { kind: "error", code, message: testCase.error.message },
			});
		});

		this.logger?.debug(
			{ service, method: method.name, entries: entries.length },
			"Compiled method contract",
		);
		return { method, contracted: true, entries };
	}

	compileService(service: DescService, contract: ServiceContract): ServiceDispatch {
		const known = new Set(service.methods.map((method) => method.name));
		for (const name of Object.keys(contract)) {
			if (!known.has(name)) {
				this.logger?.warn(
					{ service: service.typeName, method: name },
					"Contract names a method the service does not declare; skipping",
				);
			}
		}

		const methods: MethodDispatch[] = [];
		for (const method of service.methods) {
			const methodContract = findMethodContract(contract, method.name);
			if (!isUnary(method)) {
				if (methodContract) {
					throw new UnsupportedMethodError(service.name, method.name, method.methodKind);
				}
				continue;
			}
			methods.push(this.compileMethod(method, methodContract));
		}
		return { service, methods };
	}

	/**
	 * Compiles every contracted service of a schema file, or returns
	 * undefined when the contract names none of them.
	 */
	compileFile(file: DescFile, contract: Contract): FileDispatch | undefined {
		const services: ServiceDispatch[] = [];
		for (const service of file.services) {
			const serviceContract = serviceContractFor(contract, service);
			if (!serviceContract) {
				this.logger?.debug({ file: file.proto.name, service: service.typeName }, "Service not in contract");
				continue;
			}
			services.push(this.compileService(service, serviceContract));
		}
		if (services.length === 0) {
			return undefined;
		}
		return { file, contractName: contract.name, services };
	}
}

export function isUnary(method: DescMethod): method is DescMethodUnary {
	return method.methodKind === "unary";
}
