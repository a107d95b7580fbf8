export const PACKAGE_NAME = "@covenant/compiler";

export {
	CaseCompiler,
	type CaseCompilerOptions,
	caseName,
	type DispatchEntry,
	entriesOfKind,
	type FileDispatch,
	isUnary,
	type MethodDispatch,
	type Outcome,
	type ServiceDispatch,
	serviceContractFor,
} from "./dispatch.js";
export { type EmitOptions, emitContractUnit, GENERATOR_NAME, type GeneratedUnit } from "./emit/unit.js";
export { SourcePrinter } from "./emit/printer.js";
export { renderMessageInit, renderNumber, renderScalar, renderValue, type LiteralContext } from "./emit/literal.js";
export { ContractClient, createContractServiceImpl } from "./contract-client.js";
export {
	CONTRACT_BUFFER_SIZE,
	type ContractTestContext,
	createContractTransport,
	expectedErrorText,
	runServiceConformance,
	type ServiceConformanceOptions,
} from "./harness.js";
export { type MatchResult, matchRequest, settle } from "./match.js";
export { ValueResolver, type ValueResolverOptions } from "./resolver.js";
export * from "./schema/index.js";
export * from "./values.js";
