/**
 * Mock Client Emitter
 *
 * One class per contracted service. Each unary method compares the request
 * with the dispatch entries in order and settles with the first match.
 */

import type { DescService } from "@bufbuild/protobuf";
import type { DispatchEntry, MethodDispatch, ServiceDispatch } from "../dispatch.js";
import { localTypeName } from "../schema/names.js";
import type { EmitContext } from "./context.js";
import { renderMessageInit } from "./literal.js";

export function mockClientName(service: DescService): string {
	return `${localTypeName(service)}ContractClient`;
}

/** Contract descriptions as single-line comments */
export function commentText(description: string): string {
	return description.replace(/\s+/g, " ").trim();
}

/**
 * `create(Schema, { ... })`, or `create(Schema)` for an empty init
 */
export function createExpression(context: EmitContext, schema: string, init: string): string {
	const create = context.protobuf("create");
	return init === "{}" ? `${create}(${schema})` : `${create}(${schema}, ${init})`;
}

function emitEntry(context: EmitContext, method: MethodDispatch, entry: DispatchEntry): void {
	const p = context.printer;
	const input = context.schema(method.method.input);
	const equals = context.protobuf("equals");
	const expected = createExpression(context, input, renderMessageInit(entry.request, context));

	const comment = commentText(entry.description);
	if (comment.length > 0) {
		p.line(`// ${comment}`);
	}
	p.block(`if (${equals}(${input}, request, ${expected})) {`, () => {
		const outcome = entry.outcome;
		if (outcome.kind === "response") {
			const output = context.schema(method.method.output);
			p.line(`return ${createExpression(context, output, renderMessageInit(outcome.response, context))};`);
		} else {
			const connectError = context.connect("ConnectError");
			const code = context.connect("Code");
			p.line(`throw new ${connectError}(${JSON.stringify(outcome.message)}, ${code}.${outcome.code});`);
		}
	});
}

function emitMethod(context: EmitContext, method: MethodDispatch): void {
	const p = context.printer;
	const input = context.schema(method.method.input);
	const output = context.schema(method.method.output);
	const initShape = context.protobuf("MessageInitShape", true);
	const shape = context.protobuf("MessageShape", true);
	const callOptions = context.connect("CallOptions", true);
	const create = context.protobuf("create");
	const hasEntries = method.entries.length > 0;

	const param = hasEntries ? "input" : "_input";
	const signature = `async ${method.method.localName}(${param}: ${initShape}<typeof ${input}>, _options?: ${callOptions}): Promise<${shape}<typeof ${output}>>`;
	p.block(`${signature} {`, () => {
		if (hasEntries) {
			p.line(`const request = ${create}(${input}, input);`);
			for (const entry of method.entries) {
				emitEntry(context, method, entry);
			}
		}
		p.line(`return ${create}(${output});`);
	});
}

export function emitMockClient(context: EmitContext, dispatch: ServiceDispatch): void {
	const p = context.printer;
	const service = context.service(dispatch.service);
	const client = context.connect("Client", true);
	const methods = dispatch.methods.map((method) => JSON.stringify(method.method.localName));
	const picked = methods.length > 0 ? methods.join(" | ") : "never";

	p.doc(
		[`Contract-backed client for ${dispatch.service.typeName}.`],
		[
			"Each method compares the request with the contract cases in order,",
			"success cases first, and answers with the first case that matches.",
		],
		[
			"A request that matches no case resolves to an empty response and no",
			"error. Add a case to the contract rather than relying on that default.",
		],
	);
	p.block(`export class ${mockClientName(dispatch.service)} implements Pick<${client}<typeof ${service}>, ${picked}> {`, () => {
		dispatch.methods.forEach((method, i) => {
			if (i > 0) {
				p.blank();
			}
			emitMethod(context, method);
		});
	});
}
