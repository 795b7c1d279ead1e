/**
 * The compilation unit.
 *
 * `loadSource` runs the per-file phases (decode, tokenize, parse, expand,
 * collect declarations) and queues the file; `compile` merges the queued
 * files, checks and flattens them, and empties the queue.
 */

import { checkUnit, type CompiledScriptData } from './check/checker.ts'
import { buildSymbolTable } from './check/symbols.ts'
import { CompilationContext } from './core/context.ts'
import { SourceFile } from './core/source.ts'
import type { BuiltinTable } from './definitions/builtins.ts'
import { getBuiltinTable } from './definitions/index.ts'
import type { Target } from './definitions/schema.ts'
import { decodeSource, SourceEncoding } from './lex/encoding.ts'
import { tokenize } from './lex/tokenizer.ts'
import { collectDeclarations, type Declaration } from './parse/declarations.ts'
import { expandMacros } from './parse/macros.ts'
import { parse } from './parse/parser.ts'

export interface ScriptCompilerOptions {
	readonly target: Target
	/** Defaults to UTF-8 */
	readonly encoding?: SourceEncoding
	/** Replaces the shipped table of `target` */
	readonly builtins?: BuiltinTable
}

interface LoadedFile {
	readonly file: SourceFile
	readonly declarations: readonly Declaration[]
}

export class ScriptCompiler {
	readonly target: Target
	readonly encoding: SourceEncoding
	readonly builtins: BuiltinTable
	private pending: LoadedFile[] = []

	constructor(options: ScriptCompilerOptions) {
		this.target = options.target
		this.encoding = options.encoding ?? SourceEncoding.Utf8
		this.builtins = options.builtins ?? getBuiltinTable(options.target)
	}

	/** Files queued for the next compile, in load order. */
	get pendingFiles(): readonly string[] {
		return this.pending.map((loaded) => loaded.file.name)
	}

	/**
	 * Decode and parse one file into the pending unit.
	 * @throws {CompileError} The file is not added.
	 */
	loadSource(filename: string, bytes: Uint8Array): void {
		const context = new CompilationContext(this.builtins)
		const text = decodeSource(filename, bytes, this.encoding, context)
		const file = new SourceFile(filename, text)
		tokenize(file, context)
		parse(file, context)
		expandMacros(file, context)
		const declarations = collectDeclarations(file, context)
		this.pending.push({ declarations, file })
	}

	/**
	 * Compile the pending unit. The unit is emptied whether or not this
	 * succeeds.
	 * @throws {CompileError} On the first fatal diagnostic.
	 */
	compile(): CompiledScriptData {
		const loaded = this.pending
		this.pending = []

		const context = new CompilationContext(this.builtins)
		const table = buildSymbolTable(
			loaded.flatMap((entry) => entry.declarations),
			context
		)
		return checkUnit(
			table,
			loaded.map((entry) => entry.file),
			context
		)
	}
}

/** A named source file. Text is encoded as UTF-8 before loading. */
export interface Source {
	readonly name: string
	readonly content: string | Uint8Array
}

const encoder = new TextEncoder()

/**
 * Compile a unit in one call.
 *
 * @example
 * ```ts
 * const data = compile([{ name: 'a.hsc', content: '(script startup main (print "hi"))' }], {
 *   target: Target.Retail,
 * })
 * ```
 */
export function compile(sources: readonly Source[], options: ScriptCompilerOptions): CompiledScriptData {
	const compiler = new ScriptCompiler(options)
	for (const source of sources) {
		const bytes = typeof source.content === 'string' ? encoder.encode(source.content) : source.content
		compiler.loadSource(source.name, bytes)
	}
	return compiler.compile()
}
