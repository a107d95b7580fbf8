/**
 * RPC Status Codes
 *
 * The closed set of codes a failure case may declare. Names follow the
 * Connect `Code` enum (and the gRPC status names). `OK` is not an error and
 * is not part of the set.
 *
 * @see https://connectrpc.com/docs/protocol/#error-codes
 */

import { Code } from "@connectrpc/connect";
import { type CaseLocation, InvalidErrorCodeError } from "./errors.js";

export const STATUS_CODES = {
	Canceled: Code.Canceled,
	Unknown: Code.Unknown,
	InvalidArgument: Code.InvalidArgument,
	DeadlineExceeded: Code.DeadlineExceeded,
	NotFound: Code.NotFound,
	AlreadyExists: Code.AlreadyExists,
	PermissionDenied: Code.PermissionDenied,
	ResourceExhausted: Code.ResourceExhausted,
	FailedPrecondition: Code.FailedPrecondition,
	Aborted: Code.Aborted,
	OutOfRange: Code.OutOfRange,
	Unimplemented: Code.Unimplemented,
	Internal: Code.Internal,
	Unavailable: Code.Unavailable,
	DataLoss: Code.DataLoss,
	Unauthenticated: Code.Unauthenticated,
} as const satisfies Record<string, Code>;

export type StatusCodeName = keyof typeof STATUS_CODES;

export const STATUS_CODE_NAMES: readonly StatusCodeName[] = [
	"Canceled",
	"Unknown",
	"InvalidArgument",
	"DeadlineExceeded",
	"NotFound",
	"AlreadyExists",
	"PermissionDenied",
	"ResourceExhausted",
	"FailedPrecondition",
	"Aborted",
	"OutOfRange",
	"Unimplemented",
	"Internal",
	"Unavailable",
	"DataLoss",
	"Unauthenticated",
];

export function isStatusCodeName(value: string): value is StatusCodeName {
	return Object.hasOwn(STATUS_CODES, value);
}

export function toConnectCode(name: StatusCodeName): Code {
	return STATUS_CODES[name];
}

/**
 * Validate a failure case's code, naming the case when it is not a known
 * status.
 */
export function assertStatusCodeName(value: string, location: CaseLocation): asserts value is StatusCodeName {
	if (!isStatusCodeName(value)) {
		throw new InvalidErrorCodeError(value, location);
	}
}
