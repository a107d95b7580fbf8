/**
 * Contract Document Schemas
 *
 * Shape of the JSON/YAML contract a consumer writes:
 *
 * ```json
 * {
 *   "name": "greeter-consumer",
 *   "services": {
 *     "Greeter": {
 *       "SayHello": {
 *         "successCases": [{ "description": "...", "request": {}, "response": {} }],
 *         "failureCases": [{ "description": "...", "request": {}, "error": { "code": "NotFound", "message": "..." } }]
 *       }
 *     }
 *   }
 * }
 * ```
 *
 * Request and response values stay untyped JSON here; they are checked
 * against the message types when the contract is compiled.
 */

import type { JsonValue } from "@bufbuild/protobuf";
import { z } from "zod";

// ============================================
// Values
// ============================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

// ============================================
// Cases
// ============================================

/**
 * Expected error of a failure case. `errorCode` is the key used by older
 * contracts and is accepted in place of `code`.
 */
export const ErrorSpecSchema = z
	.object({
		code: z.string().min(1).optional(),
		errorCode: z.string().min(1).optional(),
		message: z.string(),
	})
	.strict()
	.superRefine((value, ctx) => {
		if ((value.code === undefined) === (value.errorCode === undefined)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "exactly one of 'code' or 'errorCode' is required",
			});
		}
	})
	.transform(({ code, errorCode, message }) => ({ code: code ?? errorCode ?? "", message }));

export type ErrorSpec = z.infer<typeof ErrorSpecSchema>;

export const SuccessCaseSchema = z
	.object({
		/** Human-readable name, used for generated test names */
		description: z.string().default(""),
		request: JsonValueSchema,
		response: JsonValueSchema,
	})
	.strict();

export type SuccessCase = z.infer<typeof SuccessCaseSchema>;

export const FailureCaseSchema = z
	.object({
		description: z.string().default(""),
		request: JsonValueSchema,
		error: ErrorSpecSchema,
	})
	.strict();

export type FailureCase = z.infer<typeof FailureCaseSchema>;

// ============================================
// Contract
// ============================================

export const MethodContractSchema = z
	.object({
		successCases: z.array(SuccessCaseSchema).default([]),
		failureCases: z.array(FailureCaseSchema).default([]),
	})
	.strict();

export type MethodContract = z.infer<typeof MethodContractSchema>;

/** Method name → method contract */
export const ServiceContractSchema = z.record(MethodContractSchema);

export type ServiceContract = z.infer<typeof ServiceContractSchema>;

export const ContractSchema = z.object({
	name: z.string(),
	/** Service name → service contract */
	services: z.record(ServiceContractSchema).default({}),
});

export type Contract = z.infer<typeof ContractSchema>;

// ============================================
// Lookups
// ============================================

export function findServiceContract(contract: Contract, serviceName: string): ServiceContract | undefined {
	return Object.hasOwn(contract.services, serviceName) ? contract.services[serviceName] : undefined;
}

export function findMethodContract(service: ServiceContract, methodName: string): MethodContract | undefined {
	return Object.hasOwn(service, methodName) ? service[methodName] : undefined;
}
