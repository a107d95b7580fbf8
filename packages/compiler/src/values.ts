/**
 * Contract values after they have been decoded against the schema.
 *
 * Both emitters and the runtime interpreter work on this closed union
 * instead of inspecting decoded messages again.
 */

import type { DescEnum, DescField, DescMessage, Message, ScalarType } from "@bufbuild/protobuf";

export type PrimitiveValue = string | number | bigint | boolean | Uint8Array;

export type MapKey = string | number | bigint | boolean;

export interface ScalarContractValue {
	readonly kind: "scalar";
	readonly type: ScalarType;
	readonly value: PrimitiveValue;
}

export interface EnumContractValue {
	readonly kind: "enum";
	readonly desc: DescEnum;
	readonly value: number;
}

export interface MessageContractValue {
	readonly kind: "message";
	readonly message: ResolvedMessage;
}

export interface ListContractValue {
	readonly kind: "list";
	readonly items: readonly ContractValue[];
}

export interface MapEntryValue {
	readonly key: MapKey;
	readonly value: ContractValue;
}

export interface MapContractValue {
	readonly kind: "map";
	readonly entries: readonly MapEntryValue[];
}

export type ContractValue =
	| ScalarContractValue
	| EnumContractValue
	| MessageContractValue
	| ListContractValue
	| MapContractValue;

export interface ResolvedField {
	readonly field: DescField;
	readonly value: ContractValue;
}

/**
 * A contract request or response bound to its message type. `fields` holds
 * the populated fields only, in ascending field-number order.
 */
export interface ResolvedMessage {
	readonly desc: DescMessage;
	readonly message: Message;
	readonly fields: readonly ResolvedField[];
}

export function isPrimitiveValue(value: unknown): value is PrimitiveValue {
	switch (typeof value) {
		case "string":
		case "number":
		case "bigint":
		case "boolean":
			return true;
		default:
			return value instanceof Uint8Array;
	}
}

export function isMapKey(value: unknown): value is MapKey {
	const type = typeof value;
	return type === "string" || type === "number" || type === "bigint" || type === "boolean";
}

export function findField(message: ResolvedMessage, number: number): ResolvedField | undefined {
	return message.fields.find((entry) => entry.field.number === number);
}

export function fieldNumbers(message: ResolvedMessage): number[] {
	return message.fields.map((entry) => entry.field.number);
}
