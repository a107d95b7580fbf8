/**
 * @covenant/contract - Contract documents
 *
 * This package contains:
 * - Zod schemas for contract documents (services → methods → cases)
 * - The JSON/YAML contract loader
 * - The closed set of RPC status codes a failure case may use
 * - The error taxonomy shared by every stage of a generation run
 */

export const PACKAGE_NAME = "@covenant/contract";

export {
	type CaseLocation,
	ContractViolationError,
	CovenantError,
	CovenantErrorCode,
	FieldMismatchError,
	formatLocation,
	InvalidErrorCodeError,
	InvalidOptionError,
	isCovenantError,
	MalformedContractError,
	MissingOptionError,
	SchemaConformanceError,
	UnsupportedMethodError,
} from "./errors.js";
export {
	type ContractFormat,
	detectContractFormat,
	loadContractFile,
	type ParseContractOptions,
	parseContract,
	parseContractText,
} from "./loader.js";
export {
	type Contract,
	ContractSchema,
	type ErrorSpec,
	ErrorSpecSchema,
	type FailureCase,
	FailureCaseSchema,
	findMethodContract,
	findServiceContract,
	JsonValueSchema,
	type MethodContract,
	MethodContractSchema,
	type ServiceContract,
	ServiceContractSchema,
	type SuccessCase,
	SuccessCaseSchema,
} from "./schemas.js";
export {
	assertStatusCodeName,
	isStatusCodeName,
	STATUS_CODE_NAMES,
	STATUS_CODES,
	type StatusCodeName,
	toConnectCode,
} from "./status-codes.js";
