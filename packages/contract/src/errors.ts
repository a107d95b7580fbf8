/**
 * Contract Compilation Errors
 *
 * Every failure of a generation run is one of these classes. Runs are
 * fail-fast: the first error aborts the run and no file is emitted.
 *
 * | Error                    | Code               | Raised by            |
 * |--------------------------|--------------------|----------------------|
 * | MalformedContractError   | MALFORMED_CONTRACT | contract loader      |
 * | MissingOptionError       | MISSING_OPTION     | plugin options       |
 * | InvalidOptionError       | INVALID_OPTION     | plugin options       |
 * | SchemaConformanceError   | SCHEMA_CONFORMANCE | value resolver       |
 * | FieldMismatchError       | FIELD_MISMATCH     | value resolver       |
 * | InvalidErrorCodeError    | INVALID_ERROR_CODE | case compiler        |
 * | UnsupportedMethodError   | UNSUPPORTED_METHOD | case compiler        |
 * | ContractViolationError   | CONTRACT_VIOLATION | conformance harness  |
 */

// ============================================
// Error Codes
// ============================================

export const CovenantErrorCode = {
	MALFORMED_CONTRACT: "MALFORMED_CONTRACT",
	MISSING_OPTION: "MISSING_OPTION",
	INVALID_OPTION: "INVALID_OPTION",
	SCHEMA_CONFORMANCE: "SCHEMA_CONFORMANCE",
	FIELD_MISMATCH: "FIELD_MISMATCH",
	INVALID_ERROR_CODE: "INVALID_ERROR_CODE",
	UNSUPPORTED_METHOD: "UNSUPPORTED_METHOD",
	CONTRACT_VIOLATION: "CONTRACT_VIOLATION",
} as const;

export type CovenantErrorCode = (typeof CovenantErrorCode)[keyof typeof CovenantErrorCode];

// ============================================
// Case Location
// ============================================

/**
 * Points at one value inside a contract document, e.g. the response of the
 * second success case of `Greeter.SayHello`.
 */
export interface CaseLocation {
	service: string;
	method: string;
	kind: "success" | "failure";
	/** Zero-based position within successCases / failureCases */
	index: number;
	description?: string;
	part: "request" | "response" | "error";
}

export function formatLocation(location: CaseLocation): string {
	const list = location.kind === "success" ? "successCases" : "failureCases";
	const description = location.description ? ` (${JSON.stringify(location.description)})` : "";
	return `${location.service}.${location.method} ${list}[${location.index}]${description} ${location.part}`;
}

// ============================================
// Base Error Class
// ============================================

export class CovenantError extends Error {
	readonly code: CovenantErrorCode;

	/** Structured context for logs (service, method, field, ...) */
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: CovenantErrorCode,
		options: {
			context?: Record<string, unknown>;
			cause?: unknown;
		} = {},
	) {
		super(message, { cause: options.cause });
		this.name = this.constructor.name;
		this.code = code;
		this.context = options.context ?? {};

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	toFormattedString(): string {
		return `[${this.code}] ${this.message}`;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
			stack: this.stack,
		};
	}
}

// ============================================
// Contract Document Errors
// ============================================

/**
 * The contract document cannot be read or does not have the contract shape.
 */
export class MalformedContractError extends CovenantError {
	/** File path or label of the document */
	readonly source: string;

	/** One entry per shape violation, formatted `path: message` */
	readonly issues: string[];

	constructor(
		source: string,
		reason: string,
		options: {
			issues?: string[];
			cause?: unknown;
		} = {},
	) {
		const issues = options.issues ?? [];
		const detail = issues.length > 0 ? `\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : "";
		super(`Malformed contract ${source}: ${reason}${detail}`, CovenantErrorCode.MALFORMED_CONTRACT, {
			context: { source, issues },
			cause: options.cause,
		});
		this.source = source;
		this.issues = issues;
	}
}

// ============================================
// Plugin Option Errors
// ============================================

export class MissingOptionError extends CovenantError {
	readonly option: string;

	constructor(option: string) {
		super(`'${option}' option not provided`, CovenantErrorCode.MISSING_OPTION, {
			context: { option },
		});
		this.option = option;
	}
}

export class InvalidOptionError extends CovenantError {
	readonly option: string;

	constructor(option: string, reason: string) {
		super(`invalid '${option}' option: ${reason}`, CovenantErrorCode.INVALID_OPTION, {
			context: { option },
		});
		this.option = option;
	}
}

// ============================================
// Compilation Errors
// ============================================

/**
 * A contract value does not decode against its declared message type, e.g.
 * a string where an int64 is declared.
 */
export class SchemaConformanceError extends CovenantError {
	readonly typeName: string;
	readonly location: CaseLocation;

	constructor(typeName: string, location: CaseLocation, reason: string, cause?: unknown) {
		super(
			`${formatLocation(location)} does not conform to ${typeName}: ${reason}`,
			CovenantErrorCode.SCHEMA_CONFORMANCE,
			{ context: { typeName, ...location }, cause },
		);
		this.typeName = typeName;
		this.location = location;
	}
}

/**
 * A populated field has no descriptor in the message type: the contract and
 * the schema have drifted apart.
 */
export class FieldMismatchError extends CovenantError {
	readonly field: string;
	readonly typeName: string;
	readonly location: CaseLocation;

	constructor(field: string, typeName: string, location: CaseLocation) {
		super(
			`field not found ${field} while inspecting message ${typeName} (${formatLocation(location)})`,
			CovenantErrorCode.FIELD_MISMATCH,
			{ context: { field, typeName, ...location } },
		);
		this.field = field;
		this.typeName = typeName;
		this.location = location;
	}
}

export class InvalidErrorCodeError extends CovenantError {
	/** The code string as written in the contract */
	readonly errorCode: string;
	readonly location: CaseLocation;

	constructor(errorCode: string, location: CaseLocation) {
		super(`invalid error code: ${errorCode} (${formatLocation(location)})`, CovenantErrorCode.INVALID_ERROR_CODE, {
			context: { errorCode, ...location },
		});
		this.errorCode = errorCode;
		this.location = location;
	}
}

/**
 * Contracts only describe unary calls; a contract entry for a streaming
 * method cannot be compiled.
 */
export class UnsupportedMethodError extends CovenantError {
	readonly service: string;
	readonly method: string;
	readonly methodKind: string;

	constructor(service: string, method: string, methodKind: string) {
		super(
			`${service}.${method} is a ${methodKind.replace("_", "-")} method; contracts support unary methods only`,
			CovenantErrorCode.UNSUPPORTED_METHOD,
			{ context: { service, method, methodKind } },
		);
		this.service = service;
		this.method = method;
		this.methodKind = methodKind;
	}
}

// ============================================
// Conformance Errors
// ============================================

/**
 * Raised inside a conformance subtest when the server disagrees with the
 * contract. Fails that subtest only.
 */
export class ContractViolationError extends CovenantError {
	readonly expected: string;
	readonly actual: string;

	constructor(message: string, expected: string, actual: string) {
		super(message, CovenantErrorCode.CONTRACT_VIOLATION, {
			context: { expected, actual },
		});
		this.expected = expected;
		this.actual = actual;
	}
}

/**
 * Check if an error belongs to the contract taxonomy
 */
export function isCovenantError(error: unknown): error is CovenantError {
	return error instanceof CovenantError;
}
