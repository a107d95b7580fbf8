/**
 * Runtime Conformance Harness
 *
 * Drives a server implementation through a compiled service contract over
 * an in-process Connect transport. Each method gets a subtest, each case a
 * nested subtest, all run sequentially in dispatch order.
 */

import { type DescService, equals, type Message, toJsonString } from "@bufbuild/protobuf";
import { ConnectError, createRouterTransport, type ServiceImpl, type Transport } from "@connectrpc/connect";
import { ContractViolationError, toConnectCode } from "@covenant/contract";
import { caseName, type DispatchEntry, entriesOfKind, type MethodDispatch, type ServiceDispatch } from "./dispatch.js";

/** Read and write limit of the loopback transport, on both sides */
export const CONTRACT_BUFFER_SIZE = 1024 * 1024;

/**
 * The part of `node:test`'s TestContext the harness needs. Subtests run
 * one at a time; a thrown error fails that subtest only.
 */
export interface ContractTestContext {
	test(name: string, fn: (t: ContractTestContext) => Promise<void>): Promise<unknown>;
}

export interface ServiceConformanceOptions {
	dispatch: ServiceDispatch;
	implementation: Partial<ServiceImpl<DescService>>;
	context: ContractTestContext;
	/** Aborting cancels in-flight calls and fails the cases not yet run */
	signal?: AbortSignal;
	bufferSize?: number;
}

export function createContractTransport(
	service: DescService,
	implementation: Partial<ServiceImpl<DescService>>,
	bufferSize = CONTRACT_BUFFER_SIZE,
): Transport {
	const limits = { readMaxBytes: bufferSize, writeMaxBytes: bufferSize };
	return createRouterTransport(
		(router) => {
			router.service(service, implementation);
		},
		{ router: limits, transport: limits },
	);
}

/**
 * Full text a ConnectError with the contract's code and message carries
 */
export function expectedErrorText(entry: DispatchEntry): string | undefined {
	if (entry.outcome.kind !== "error") {
		return undefined;
	}
	return new ConnectError(entry.outcome.message, toConnectCode(entry.outcome.code)).message;
}

export async function runServiceConformance(options: ServiceConformanceOptions): Promise<void> {
	const { dispatch, context } = options;
	options.signal?.throwIfAborted();
	const lifetime = new AbortController();
	const release = (): void => {
		lifetime.abort(options.signal?.reason);
	};
	options.signal?.addEventListener("abort", release, { once: true });

	try {
		const transport = createContractTransport(dispatch.service, options.implementation, options.bufferSize);
		for (const method of dispatch.methods) {
			if (method.entries.length === 0) {
				continue;
			}
			await context.test(`Contract test for '${method.method.name}' method`, (t) =>
				runMethodCases(t, transport, method, lifetime.signal),
			);
		}
	} finally {
		options.signal?.removeEventListener("abort", release);
		lifetime.abort();
	}
}

async function runMethodCases(
	t: ContractTestContext,
	transport: Transport,
	method: MethodDispatch,
	signal: AbortSignal,
): Promise<void> {
	const successes = entriesOfKind(method, "success");
	const failures = entriesOfKind(method, "failure");

	if (successes.length > 0) {
		await t.test("Success Cases", async (t) => {
			for (const entry of successes) {
				await t.test(caseName(entry), async () => {
					signal.throwIfAborted();
					await checkSuccess(transport, method, entry, signal);
				});
			}
		});
	}

	if (failures.length > 0) {
		await t.test("Failure Cases", async (t) => {
			for (const entry of failures) {
				await t.test(caseName(entry), async () => {
					signal.throwIfAborted();
					await checkFailure(transport, method, entry, signal);
				});
			}
		});
	}
}

async function call(
	transport: Transport,
	method: MethodDispatch,
	request: Message,
	signal: AbortSignal,
): Promise<Message> {
	const response = await transport.unary(method.method, signal, undefined, undefined, request);
	return response.message;
}

async function checkSuccess(
	transport: Transport,
	method: MethodDispatch,
	entry: DispatchEntry,
	signal: AbortSignal,
): Promise<void> {
	if (entry.outcome.kind !== "response") {
		return;
	}
	const output = method.method.output;
	const expected = entry.outcome.response.message;

	let given: Message;
	try {
		given = await call(transport, method, entry.request.message, signal);
	} catch (error) {
		const text = ConnectError.from(error).message;
		throw new ContractViolationError(`unexpected error happened: ${text}`, toJsonString(output, expected), text);
	}

	if (!equals(output, given, expected)) {
		const expectedJson = toJsonString(output, expected);
		const givenJson = toJsonString(output, given);
		throw new ContractViolationError(
			`expected response: ${expectedJson}, given response: ${givenJson}`,
			expectedJson,
			givenJson,
		);
	}
}

async function checkFailure(
	transport: Transport,
	method: MethodDispatch,
	entry: DispatchEntry,
	signal: AbortSignal,
): Promise<void> {
	const expected = expectedErrorText(entry);
	if (expected === undefined) {
		return;
	}

	let given: ConnectError | undefined;
	try {
		await call(transport, method, entry.request.message, signal);
	} catch (error) {
		given = ConnectError.from(error);
	}

	if (!given) {
		throw new ContractViolationError("an error was expected but no one was returned", expected, "");
	}
	if (given.message !== expected) {
		throw new ContractViolationError(`expected error: ${expected}, given error: ${given.message}`, expected, given.message);
	}
}
