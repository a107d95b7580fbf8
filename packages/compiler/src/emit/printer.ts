/**
 * Line printer for generated TypeScript with an import registry.
 *
 * Imports are collected while the body is printed and rendered above it,
 * grouped per module: packages first, then relative paths, each sorted.
 */

interface ImportedSymbol {
	readonly module: string;
	readonly exportName: string;
	typeOnly: boolean;
}

export interface ImportOptions {
	typeOnly?: boolean;
}

export class SourcePrinter {
	private readonly lines: string[] = [];
	/** local identifier → imported symbol */
	private readonly symbols = new Map<string, ImportedSymbol>();
	private readonly reserved = new Set<string>();
	private depth = 0;

	constructor(private readonly indentUnit = "\t") {}

	/**
	 * Identifiers declared by the generated code itself. Imports that would
	 * collide with them get an alias.
	 */
	reserve(...names: string[]): this {
		for (const name of names) {
			this.reserved.add(name);
		}
		return this;
	}

	/**
	 * Registers an import and returns the identifier to reference it by.
	 * A symbol imported both as type and as value is imported as value.
	 */
	import(exportName: string, module: string, options: ImportOptions = {}): string {
		const typeOnly = options.typeOnly ?? false;
		let local = exportName;
		for (let n = 1; ; n++) {
			const existing = this.symbols.get(local);
			if (existing && existing.module === module && existing.exportName === exportName) {
				existing.typeOnly &&= typeOnly;
				return local;
			}
			if (!existing && !this.reserved.has(local)) {
				break;
			}
			local = `${exportName}$${n}`;
		}
		this.symbols.set(local, { module, exportName, typeOnly });
		return local;
	}

	line(text = ""): this {
		this.lines.push(text.length > 0 ? this.indentUnit.repeat(this.depth) + text : "");
		return this;
	}

	blank(): this {
		return this.line();
	}

	/**
	 * Prints `open`, the body one level deeper, then `close`
	 */
	block(open: string, body: () => void, close = "}"): this {
		this.line(open);
		this.indent(body);
		return this.line(close);
	}

	indent(body: () => void): this {
		this.depth++;
		try {
			body();
		} finally {
			this.depth--;
		}
		return this;
	}

	/** TSDoc block; paragraphs are separated by an empty comment line */
	doc(...paragraphs: string[][]): this {
		this.line("/**");
		paragraphs.forEach((paragraph, i) => {
			if (i > 0) {
				this.line(" *");
			}
			for (const text of paragraph) {
				this.line(` * ${text}`);
			}
		});
		return this.line(" */");
	}

	renderImports(): string[] {
		const byModule = new Map<string, { specifier: string; typeOnly: boolean; sortKey: string }[]>();
		for (const [local, symbol] of this.symbols) {
			const specifier = local === symbol.exportName ? local : `${symbol.exportName} as ${local}`;
			const list = byModule.get(symbol.module) ?? [];
			list.push({ specifier, typeOnly: symbol.typeOnly, sortKey: local });
			byModule.set(symbol.module, list);
		}

		const modules = [...byModule.keys()].sort((a, b) => {
			const rank = (m: string): number => (m.startsWith(".") ? 1 : 0);
			return rank(a) - rank(b) || compareStrings(a, b);
		});

		return modules.map((module) => {
			const symbols = (byModule.get(module) ?? []).sort((a, b) => compareNames(a.sortKey, b.sortKey));
			const allTypes = symbols.every((symbol) => symbol.typeOnly);
			const names = symbols.map((symbol) =>
				!allTypes && symbol.typeOnly ? `type ${symbol.specifier}` : symbol.specifier,
			);
			return `import ${allTypes ? "type " : ""}{ ${names.join(", ")} } from "${module}";`;
		});
	}

	/**
	 * Header, imports and body joined with `\n`, ending in a newline
	 */
	toString(header: readonly string[] = []): string {
		const parts: string[] = [];
		if (header.length > 0) {
			parts.push(...header, "");
		}
		const imports = this.renderImports();
		if (imports.length > 0) {
			parts.push(...imports, "");
		}
		parts.push(...this.lines);
		while (parts.length > 0 && parts[parts.length - 1] === "") {
			parts.pop();
		}
		return `${parts.join("\n")}\n`;
	}
}

/** Locale-independent ordering, so output does not depend on the host */
function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareNames(a: string, b: string): number {
	return compareStrings(a.toLowerCase(), b.toLowerCase()) || compareStrings(a, b);
}
