/**
 * Renders resolved contract values as Protobuf-ES v2 init-shape literals.
 */

import { type DescEnum, type DescField, type JsonValue, ScalarType, toJson } from "@bufbuild/protobuf";
import type { ContractValue, PrimitiveValue, ResolvedField, ResolvedMessage } from "../values.js";

export interface LiteralContext {
	/** Identifier of the generated TypeScript enum for `desc` */
	enumRef(desc: DescEnum): string;
}

const WRAPPER_TYPES = new Set([
	"google.protobuf.DoubleValue",
	"google.protobuf.FloatValue",
	"google.protobuf.Int64Value",
	"google.protobuf.UInt64Value",
	"google.protobuf.Int32Value",
	"google.protobuf.UInt32Value",
	"google.protobuf.BoolValue",
	"google.protobuf.StringValue",
	"google.protobuf.BytesValue",
]);

const STRUCT_TYPE = "google.protobuf.Struct";

function is64Bit(type: ScalarType): boolean {
	switch (type) {
		case ScalarType.INT64:
		case ScalarType.UINT64:
		case ScalarType.FIXED64:
		case ScalarType.SFIXED64:
		case ScalarType.SINT64:
			return true;
		default:
			return false;
	}
}

/** Fields declared with `jstype = JS_STRING` keep 64-bit values as strings */
function longAsString(field: DescField): boolean {
	if (field.fieldKind === "scalar") {
		return field.longAsString;
	}
	if (field.fieldKind === "list" && field.listKind === "scalar") {
		return field.longAsString;
	}
	return false;
}

export function renderNumber(value: number): string {
	if (Number.isNaN(value)) {
		return "Number.NaN";
	}
	if (value === Number.POSITIVE_INFINITY) {
		return "Number.POSITIVE_INFINITY";
	}
	if (value === Number.NEGATIVE_INFINITY) {
		return "Number.NEGATIVE_INFINITY";
	}
	return Object.is(value, -0) ? "-0" : String(value);
}

export function renderScalar(type: ScalarType, value: PrimitiveValue, asString = false): string {
	if (value instanceof Uint8Array) {
		return `new Uint8Array([${Array.from(value).join(", ")}])`;
	}
	switch (typeof value) {
		case "bigint":
			return asString ? JSON.stringify(value.toString()) : `${value}n`;
		case "number":
			return renderNumber(value);
		case "string":
			return is64Bit(type) && !asString ? `${value}n` : JSON.stringify(value);
		default:
			return String(value);
	}
}

function zeroLiteral(type: ScalarType): string {
	switch (type) {
		case ScalarType.STRING:
			return '""';
		case ScalarType.BOOL:
			return "false";
		case ScalarType.BYTES:
			return "new Uint8Array(0)";
		default:
			return is64Bit(type) ? "0n" : "0";
	}
}

export function renderEnum(desc: DescEnum, value: number, context: LiteralContext): string {
	const known = desc.values.find((candidate) => candidate.number === value);
	return known ? `${context.enumRef(desc)}.${known.localName}` : renderNumber(value);
}

/**
 * Wrapper messages in singular fields are plain optional scalars in the
 * generated shape.
 */
function renderWrapper(message: ResolvedMessage): string {
	const [inner] = message.fields;
	if (inner && inner.value.kind === "scalar") {
		return renderScalar(inner.value.type, inner.value.value);
	}
	const [valueField] = message.desc.fields;
	return valueField?.fieldKind === "scalar" ? zeroLiteral(valueField.scalar) : "undefined";
}

function renderStruct(message: ResolvedMessage): string {
	const json: JsonValue = toJson(message.desc, message.message);
	return JSON.stringify(json);
}

export function renderValue(value: ContractValue, context: LiteralContext, field?: DescField): string {
	switch (value.kind) {
		case "scalar":
			return renderScalar(value.type, value.value, field ? longAsString(field) : false);
		case "enum":
			return renderEnum(value.desc, value.value, context);
		case "message":
			return renderMessageInit(value.message, context);
		case "list":
			return `[${value.items.map((item) => renderValue(item, context, field)).join(", ")}]`;
		case "map": {
			const entries = value.entries.map(
				(entry) => `${JSON.stringify(String(entry.key))}: ${renderValue(entry.value, context)}`,
			);
			return `{ ${entries.join(", ")} }`;
		}
	}
}

function renderFieldValue(resolved: ResolvedField, context: LiteralContext): string {
	const { field, value } = resolved;
	if (field.fieldKind === "message" && field.oneof === undefined && value.kind === "message") {
		if (WRAPPER_TYPES.has(field.message.typeName)) {
			return renderWrapper(value.message);
		}
		if (field.message.typeName === STRUCT_TYPE) {
			return renderStruct(value.message);
		}
	}
	return renderValue(value, context, field);
}

/**
 * `{ requestField: "VALUE" }` for the populated fields of `message`, in
 * field-number order. Oneof members become `{ case, value }` objects.
 */
export function renderMessageInit(message: ResolvedMessage, context: LiteralContext): string {
	if (message.fields.length === 0) {
		return "{}";
	}
	const properties = message.fields.map((resolved) => {
		const rendered = renderFieldValue(resolved, context);
		const oneof = resolved.field.oneof;
		if (oneof) {
			return `${oneof.localName}: { case: ${JSON.stringify(resolved.field.localName)}, value: ${rendered} }`;
		}
		return `${resolved.field.localName}: ${rendered}`;
	});
	return `{ ${properties.join(", ")} }`;
}
