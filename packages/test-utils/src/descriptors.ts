/**
 * Builders for descriptor protos, so tests can describe schemas in memory
 * the way protoc hands them to a plugin.
 */

import { create, createFileRegistry, type FileRegistry } from "@bufbuild/protobuf";
import {
	type DescriptorProto,
	DescriptorProtoSchema,
	type EnumDescriptorProto,
	EnumDescriptorProtoSchema,
	type FieldDescriptorProto,
	FieldDescriptorProto_Label,
	FieldDescriptorProto_Type,
	FieldDescriptorProtoSchema,
	FieldOptions_JSType,
	type FileDescriptorProto,
	FileDescriptorProtoSchema,
	FileDescriptorSetSchema,
	file_google_protobuf_struct,
	file_google_protobuf_wrappers,
	type MethodDescriptorProto,
	MethodDescriptorProtoSchema,
	type ServiceDescriptorProto,
	ServiceDescriptorProtoSchema,
} from "@bufbuild/protobuf/wkt";

export { FieldDescriptorProto_Type as FieldType };

export interface FieldSpec {
	repeated?: boolean;
	/** Fully-qualified with a leading dot, e.g. `.acme.v1.Price` */
	typeName?: string;
	oneofIndex?: number;
	proto3Optional?: boolean;
	/** `[jstype = JS_STRING]` */
	jsString?: boolean;
}

export function jsonNameOf(name: string): string {
	return name.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

export function field(
	name: string,
	number: number,
	type: FieldDescriptorProto_Type,
	spec: FieldSpec = {},
): FieldDescriptorProto {
	return create(FieldDescriptorProtoSchema, {
		name,
		number,
		type,
		jsonName: jsonNameOf(name),
		label: spec.repeated ? FieldDescriptorProto_Label.REPEATED : FieldDescriptorProto_Label.OPTIONAL,
		typeName: spec.typeName,
		oneofIndex: spec.oneofIndex,
		proto3Optional: spec.proto3Optional,
		options: spec.jsString ? { jstype: FieldOptions_JSType.JS_STRING } : undefined,
	});
}

export interface MessageSpec {
	nestedType?: DescriptorProto[];
	enumType?: EnumDescriptorProto[];
	oneofs?: string[];
	mapEntry?: boolean;
}

export function message(name: string, fields: FieldDescriptorProto[], spec: MessageSpec = {}): DescriptorProto {
	return create(DescriptorProtoSchema, {
		name,
		field: fields,
		nestedType: spec.nestedType ?? [],
		enumType: spec.enumType ?? [],
		oneofDecl: (spec.oneofs ?? []).map((oneof) => ({ name: oneof })),
		options: spec.mapEntry ? { mapEntry: true } : undefined,
	});
}

/**
 * Nested entry type plus the repeated field that refers to it, as protoc
 * emits them for `map<K, V> name = number`
 */
export function mapField(
	parentTypeName: string,
	name: string,
	number: number,
	key: FieldDescriptorProto_Type,
	value: FieldDescriptorProto_Type,
	valueTypeName?: string,
): { entry: DescriptorProto; field: FieldDescriptorProto } {
	const entryName = `${jsonNameOf(name).replace(/^./, (c) => c.toUpperCase())}Entry`;
	const entry = message(entryName, [field("key", 1, key), field("value", 2, value, { typeName: valueTypeName })], {
		mapEntry: true,
	});
	return {
		entry,
		field: field(name, number, FieldDescriptorProto_Type.MESSAGE, {
			repeated: true,
			typeName: `${parentTypeName}.${entryName}`,
		}),
	};
}

export function enumType(name: string, values: readonly string[]): EnumDescriptorProto {
	return create(EnumDescriptorProtoSchema, {
		name,
		value: values.map((valueName, number) => ({ name: valueName, number })),
	});
}

export interface MethodSpec {
	serverStreaming?: boolean;
	clientStreaming?: boolean;
}

export function method(name: string, inputType: string, outputType: string, spec: MethodSpec = {}): MethodDescriptorProto {
	return create(MethodDescriptorProtoSchema, {
		name,
		inputType,
		outputType,
		serverStreaming: spec.serverStreaming,
		clientStreaming: spec.clientStreaming,
	});
}

export function service(name: string, methods: MethodDescriptorProto[]): ServiceDescriptorProto {
	return create(ServiceDescriptorProtoSchema, { name, method: methods });
}

export interface FileSpec {
	name: string;
	package: string;
	dependency?: string[];
	messageType?: DescriptorProto[];
	enumType?: EnumDescriptorProto[];
	service?: ServiceDescriptorProto[];
}

export function protoFile(spec: FileSpec): FileDescriptorProto {
	return create(FileDescriptorProtoSchema, {
		name: spec.name,
		package: spec.package,
		syntax: "proto3",
		dependency: spec.dependency ?? [],
		messageType: spec.messageType ?? [],
		enumType: spec.enumType ?? [],
		service: spec.service ?? [],
	});
}

/** Descriptor protos of the well-known types test schemas may import */
export function wellKnownProtos(): FileDescriptorProto[] {
	return [file_google_protobuf_wrappers.proto, file_google_protobuf_struct.proto];
}

export function createTestRegistry(...files: FileDescriptorProto[]): FileRegistry {
	return createFileRegistry(create(FileDescriptorSetSchema, { file: [...wellKnownProtos(), ...files] }));
}
