/**
 * Conformance Harness Emitter
 *
 * Emits `test<Service>Contract`, which serves a server implementation on
 * an in-process transport and runs the contract cases against it as
 * `node:test` subtests.
 */

import type { DescService } from "@bufbuild/protobuf";
import { caseName, type DispatchEntry, entriesOfKind, type MethodDispatch, type ServiceDispatch } from "../dispatch.js";
import { localTypeName } from "../schema/names.js";
import type { EmitContext } from "./context.js";
import { renderMessageInit } from "./literal.js";
import { createExpression } from "./mock-client.js";

export const BUFFER_SIZE_CONSTANT = "CONTRACT_BUFFER_SIZE";

export function harnessNames(service: DescService): { test: string; run: string } {
	const name = localTypeName(service);
	return { test: `test${name}Contract`, run: `run${name}ContractTests` };
}

function emitSuccessCases(context: EmitContext, method: MethodDispatch, entries: DispatchEntry[]): void {
	const p = context.printer;
	const input = context.schema(method.method.input);
	const output = context.schema(method.method.output);
	const initShape = context.protobuf("MessageInitShape", true);
	const shape = context.protobuf("MessageShape", true);
	const equals = context.protobuf("equals");
	const toJsonString = context.protobuf("toJsonString");
	const connectError = context.connect("ConnectError");
	const call = method.method.localName;

	p.block('await t.test("Success Cases", async (t) => {', () => {
		p.line(
			`const tests: { name: string; request: ${initShape}<typeof ${input}>; expected: ${shape}<typeof ${output}> }[] = [`,
		);
		p.indent(() => {
			for (const entry of entries) {
				if (entry.outcome.kind !== "response") {
					continue;
				}
				const request = renderMessageInit(entry.request, context);
				const expected = createExpression(context, output, renderMessageInit(entry.outcome.response, context));
				p.line(`{ name: ${JSON.stringify(caseName(entry))}, request: ${request}, expected: ${expected} },`);
			}
		});
		p.line("];");
		p.blank();
		p.block("for (const test of tests) {", () => {
			p.block("await t.test(test.name, async () => {", () => {
				p.line("signal.throwIfAborted();");
				p.line(`let response: ${shape}<typeof ${output}>;`);
				p.block("try {", () => {
					p.line(`response = await client.${call}(test.request, { signal });`);
				}, "} catch (error) {");
				p.indent(() => {
					p.line(`throw new Error(\`unexpected error happened: \${${connectError}.from(error).message}\`);`);
				});
				p.line("}");
				p.block(`if (!${equals}(${output}, response, test.expected)) {`, () => {
					p.line(
						`throw new Error(\`expected response: \${${toJsonString}(${output}, test.expected)}, given response: \${${toJsonString}(${output}, response)}\`);`,
					);
				});
			}, "});");
		});
	}, "});");
}

function emitFailureCases(context: EmitContext, method: MethodDispatch, entries: DispatchEntry[]): void {
	const p = context.printer;
	const input = context.schema(method.method.input);
	const initShape = context.protobuf("MessageInitShape", true);
	const connectError = context.connect("ConnectError");
	const code = context.connect("Code");
	const call = method.method.localName;

	p.block('await t.test("Failure Cases", async (t) => {', () => {
		p.line(`const tests: { name: string; request: ${initShape}<typeof ${input}>; expectedError: string }[] = [`);
		p.indent(() => {
			for (const entry of entries) {
				if (entry.outcome.kind !== "error") {
					continue;
				}
				const request = renderMessageInit(entry.request, context);
				const error = `new ${connectError}(${JSON.stringify(entry.outcome.message)}, ${code}.${entry.outcome.code}).message`;
				p.line(`{ name: ${JSON.stringify(caseName(entry))}, request: ${request}, expectedError: ${error} },`);
			}
		});
		p.line("];");
		p.blank();
		p.block("for (const test of tests) {", () => {
			p.block("await t.test(test.name, async () => {", () => {
				p.line("signal.throwIfAborted();");
				p.line(`let given: ${connectError} | undefined;`);
				p.block("try {", () => {
					p.line(`await client.${call}(test.request, { signal });`);
				}, "} catch (error) {");
				p.indent(() => {
					p.line(`given = ${connectError}.from(error);`);
				});
				p.line("}");
				p.block("if (given === undefined) {", () => {
					p.line('throw new Error("an error was expected but no one was returned");');
				});
				p.block("if (given.message !== test.expectedError) {", () => {
					p.line("throw new Error(`expected error: ${test.expectedError}, given error: ${given.message}`);");
				});
			}, "});");
		});
	}, "});");
}

function emitRunTests(context: EmitContext, dispatch: ServiceDispatch, service: string): void {
	const p = context.printer;
	const testContext = context.nodeTest("TestContext");
	const client = context.connect("Client", true);
	const { run } = harnessNames(dispatch.service);

	p.block(
		`async function ${run}(t: ${testContext}, signal: AbortSignal, client: ${client}<typeof ${service}>): Promise<void> {`,
		() => {
			const methods = dispatch.methods.filter((method) => method.entries.length > 0);
			methods.forEach((method, i) => {
				if (i > 0) {
					p.blank();
				}
				p.block(`await t.test(${JSON.stringify(`Contract test for '${method.method.name}' method`)}, async (t) => {`, () => {
					const successes = entriesOfKind(method, "success");
					const failures = entriesOfKind(method, "failure");
					if (successes.length > 0) {
						emitSuccessCases(context, method, successes);
					}
					if (successes.length > 0 && failures.length > 0) {
						p.blank();
					}
					if (failures.length > 0) {
						emitFailureCases(context, method, failures);
					}
				}, "});");
			});
		},
	);
}

export function emitHarness(context: EmitContext, dispatch: ServiceDispatch): void {
	const p = context.printer;
	const service = context.service(dispatch.service);
	const testContext = context.nodeTest("TestContext");
	const serviceImpl = context.connect("ServiceImpl", true);
	const createRouterTransport = context.connect("createRouterTransport");
	const createClient = context.connect("createClient");
	const { test, run } = harnessNames(dispatch.service);
	const limits = `{ readMaxBytes: ${BUFFER_SIZE_CONSTANT}, writeMaxBytes: ${BUFFER_SIZE_CONSTANT} }`;

	p.doc(
		[`Runs the contract of ${dispatch.service.typeName} against \`server\` over an`, "in-process transport."],
		[
			"Every contracted method and case is its own subtest of `t`. Aborting",
			"`signal` cancels calls in flight and fails the cases not yet run. A",
			"signal aborted beforehand rejects before any call is made.",
		],
	);
	p.block(
		`export async function ${test}(t: ${testContext}, signal: AbortSignal, server: Partial<${serviceImpl}<typeof ${service}>>): Promise<void> {`,
		() => {
			p.line("signal.throwIfAborted();");
			p.line("const lifetime = new AbortController();");
			p.line("const release = (): void => lifetime.abort(signal.reason);");
			p.line('signal.addEventListener("abort", release, { once: true });');
			p.block("try {", () => {
				p.line(`const transport = ${createRouterTransport}(`);
				p.indent(() => {
					p.block("(router) => {", () => {
						p.line(`router.service(${service}, server);`);
					}, "},");
					p.block("{", () => {
						p.line(`router: ${limits},`);
						p.line(`transport: ${limits},`);
					}, "},");
				});
				p.line(");");
				p.line(`await ${run}(t, lifetime.signal, ${createClient}(${service}, transport));`);
			}, "} finally {");
			p.indent(() => {
				p.line('signal.removeEventListener("abort", release);');
				p.line("lifetime.abort();");
			});
			p.line("}");
		},
	);
	p.blank();
	emitRunTests(context, dispatch, service);
}
