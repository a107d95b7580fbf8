/**
 * Value Resolver
 *
 * Correlates a contract JSON value with a message type: unknown keys are
 * rejected by name, the value is decoded with the schema-aware JSON reader,
 * and the populated fields are returned in field-number order.
 */

import {
	type DescField,
	type DescMessage,
	fromJson,
	type JsonObject,
	type JsonValue,
	type Message,
	type Registry,
	type ScalarType,
} from "@bufbuild/protobuf";
import { isReflectList, isReflectMap, isReflectMessage, type ReflectMessage, reflect } from "@bufbuild/protobuf/reflect";
import { type CaseLocation, FieldMismatchError, SchemaConformanceError } from "@covenant/contract";
import { FieldIndexCache } from "./schema/field-index.js";
import {
	type ContractValue,
	isMapKey,
	isPrimitiveValue,
	type MapEntryValue,
	type ResolvedField,
	type ResolvedMessage,
} from "./values.js";

export interface ValueResolverOptions {
	/**
	 * Registry used while decoding. Needed for `google.protobuf.Any` values,
	 * and to check contracts against a newer published version of a type.
	 */
	registry?: Registry;
	fieldIndexes?: FieldIndexCache;
}

// ============================================
// Helpers
// ============================================

function isJsonObject(value: JsonValue): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWellKnownType(desc: DescMessage): boolean {
	return desc.typeName.startsWith("google.protobuf.");
}

/** Message type a field holds, directly or as list/map element */
function elementMessage(field: DescField): DescMessage | undefined {
	switch (field.fieldKind) {
		case "message":
			return field.message;
		case "list":
			return field.listKind === "message" ? field.message : undefined;
		case "map":
			return field.mapKind === "message" ? field.message : undefined;
		default:
			return undefined;
	}
}

function unexpectedValue(field: DescField, value: unknown): Error {
	return new Error(`unexpected ${typeof value} value for ${field.fieldKind} field ${field.name}`);
}

function describeCause(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ============================================
// Resolver
// ============================================

export class ValueResolver {
	private readonly registry: Registry | undefined;
	readonly fieldIndexes: FieldIndexCache;

	constructor(options: ValueResolverOptions = {}) {
		this.registry = options.registry;
		this.fieldIndexes = options.fieldIndexes ?? new FieldIndexCache();
	}

	resolve(json: JsonValue, desc: DescMessage, location: CaseLocation): ResolvedMessage {
		this.checkKeys(json, desc, location, []);

		const decodeDesc = this.registry?.getMessage(desc.typeName) ?? desc;
		let message: Message;
		try {
			message = fromJson(decodeDesc, json, { registry: this.registry });
		} catch (error) {
			throw new SchemaConformanceError(desc.typeName, location, describeCause(error), error);
		}

		return this.describe(reflect(decodeDesc, message), desc, location, []);
	}

	private checkKeys(json: JsonValue, desc: DescMessage, location: CaseLocation, path: string[]): void {
		if (isWellKnownType(desc) || !isJsonObject(json)) {
			return;
		}
		const index = this.fieldIndexes.get(desc);
		for (const [key, value] of Object.entries(json)) {
			// Extensions are written as "[full.name]" and looked up by the decoder
			if (key.startsWith("[")) {
				continue;
			}
			const field = index.byJsonKey.get(key);
			if (!field) {
				throw new FieldMismatchError([...path, key].join("."), desc.typeName, location);
			}
			const nested = elementMessage(field);
			if (!nested || value === null || value === undefined) {
				continue;
			}
			if (field.fieldKind === "list" && Array.isArray(value)) {
				value.forEach((item, i) => {
					this.checkKeys(item, nested, location, [...path, `${key}[${i}]`]);
				});
			} else if (field.fieldKind === "map" && isJsonObject(value)) {
				for (const [mapKey, item] of Object.entries(value)) {
					if (item !== undefined) {
						this.checkKeys(item, nested, location, [...path, `${key}[${mapKey}]`]);
					}
				}
			} else if (field.fieldKind === "message") {
				this.checkKeys(value, nested, location, [...path, key]);
			}
		}
	}

	private describe(
		source: ReflectMessage,
		target: DescMessage,
		location: CaseLocation,
		path: string[],
	): ResolvedMessage {
		const index = this.fieldIndexes.get(target);
		const fields: ResolvedField[] = [];
		for (const field of source.sortedFields) {
			if (!source.isSet(field)) {
				continue;
			}
			const targetField = index.byNumber.get(field.number);
			if (!targetField || targetField.fieldKind !== field.fieldKind) {
				throw new FieldMismatchError([...path, field.name].join("."), target.typeName, location);
			}
			const value: unknown = source.get(field);
			fields.push({
				field: targetField,
				value: this.fieldValue(value, field, elementMessage(targetField), location, [...path, field.name]),
			});
		}
		return { desc: target, message: source.message, fields };
	}

	private fieldValue(
		value: unknown,
		field: DescField,
		target: DescMessage | undefined,
		location: CaseLocation,
		path: string[],
	): ContractValue {
		switch (field.fieldKind) {
			case "scalar":
				return this.scalarValue(value, field.scalar, field);
			case "enum":
				return this.enumValue(value, field);
			case "message":
				return this.messageValue(value, target ?? field.message, field, location, path);
			case "list": {
				if (!isReflectList(value)) {
					throw unexpectedValue(field, value);
				}
				const items: ContractValue[] = [];
				for (const item of value) {
					switch (field.listKind) {
						case "scalar":
							items.push(this.scalarValue(item, field.scalar, field));
							break;
						case "enum":
							items.push(this.enumValue(item, field));
							break;
						case "message":
							items.push(this.messageValue(item, target ?? field.message, field, location, path));
							break;
					}
				}
				return { kind: "list", items };
			}
			case "map": {
				if (!isReflectMap(value)) {
					throw unexpectedValue(field, value);
				}
				const entries: MapEntryValue[] = [];
				for (const [key, item] of value) {
					if (!isMapKey(key)) {
						throw unexpectedValue(field, key);
					}
					switch (field.mapKind) {
						case "scalar":
							entries.push({ key, value: this.scalarValue(item, field.scalar, field) });
							break;
						case "enum":
							entries.push({ key, value: this.enumValue(item, field) });
							break;
						case "message":
							entries.push({
								key,
								value: this.messageValue(item, target ?? field.message, field, location, [...path, String(key)]),
							});
							break;
					}
				}
				return { kind: "map", entries };
			}
		}
	}

	private scalarValue(value: unknown, type: ScalarType, field: DescField): ContractValue {
		if (!isPrimitiveValue(value)) {
			throw unexpectedValue(field, value);
		}
		return { kind: "scalar", type, value };
	}

	private enumValue(value: unknown, field: DescField): ContractValue {
		if (typeof value !== "number" || field.enum === undefined) {
			throw unexpectedValue(field, value);
		}
		return { kind: "enum", desc: field.enum, value };
	}

	private messageValue(
		value: unknown,
		target: DescMessage,
		field: DescField,
		location: CaseLocation,
		path: string[],
	): ContractValue {
		if (!isReflectMessage(value)) {
			throw unexpectedValue(field, value);
		}
		return { kind: "message", message: this.describe(value, target, location, path) };
	}
}
