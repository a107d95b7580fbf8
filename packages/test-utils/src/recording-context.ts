export interface SubtestResult {
	/** Names from the outermost subtest down */
	path: string[];
	passed: boolean;
	error?: unknown;
}

/**
 * In-memory stand-in for `node:test`'s TestContext. Subtests run in call
 * order; a thrown error fails the subtest and every enclosing one.
 */
export class RecordingTestContext {
	constructor(
		readonly results: SubtestResult[] = [],
		private readonly path: string[] = [],
	) {}

	async test(name: string, fn: (t: RecordingTestContext) => Promise<void>): Promise<void> {
		const path = [...this.path, name];
		const before = this.results.length;
		try {
			await fn(new RecordingTestContext(this.results, path));
			const nestedFailure = this.results.slice(before).some((result) => !result.passed);
			this.results.push({ path, passed: !nestedFailure });
		} catch (error) {
			this.results.push({ path, passed: false, error });
		}
	}

	/** Result of the subtest at `path`, joined with " > " */
	find(path: string): SubtestResult | undefined {
		return this.results.find((result) => result.path.join(" > ") === path);
	}

	failures(): SubtestResult[] {
		return this.results.filter((result) => !result.passed);
	}
}
