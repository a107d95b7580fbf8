import type { DescField, DescMessage } from "@bufbuild/protobuf";

/**
 * Lookup tables for one message type: field number → descriptor, and JSON
 * key (JSON name or proto name) → descriptor.
 */
export interface FieldIndex {
	readonly message: DescMessage;
	readonly byNumber: ReadonlyMap<number, DescField>;
	readonly byJsonKey: ReadonlyMap<string, DescField>;
}

export function buildFieldIndex(message: DescMessage): FieldIndex {
	const byNumber = new Map<number, DescField>();
	const byJsonKey = new Map<string, DescField>();
	for (const field of message.fields) {
		byNumber.set(field.number, field);
		byJsonKey.set(field.jsonName, field);
		byJsonKey.set(field.name, field);
	}
	return { message, byNumber, byJsonKey };
}

/**
 * Builds each message type's index once per run and hands the same table to
 * every case that references the type.
 */
export class FieldIndexCache {
	private readonly indexes = new WeakMap<DescMessage, FieldIndex>();
	private built = 0;

	get(message: DescMessage): FieldIndex {
		let index = this.indexes.get(message);
		if (!index) {
			index = buildFieldIndex(message);
			this.indexes.set(message, index);
			this.built++;
		}
		return index;
	}

	/** Number of tables built so far */
	get size(): number {
		return this.built;
	}
}
