export { buildFieldIndex, type FieldIndex, FieldIndexCache } from "./field-index.js";
export {
	contractFileName,
	type ImportExtension,
	isWellKnownFile,
	localTypeName,
	pbImportPath,
	protoFileStem,
	safeIdentifier,
	schemaIdentifier,
} from "./names.js";
