import assert from 'node:assert'
import type { CompiledScriptData } from '../../src/check/checker.ts'
import { compile } from '../../src/compiler.ts'
import { CompilationContext, CompileError } from '../../src/core/context.ts'
import { SourceFile } from '../../src/core/source.ts'
import type { BuiltinTable } from '../../src/definitions/builtins.ts'
import { getBuiltinTable } from '../../src/definitions/index.ts'
import { Target } from '../../src/definitions/schema.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { expandMacros } from '../../src/parse/macros.ts'
import { parse } from '../../src/parse/parser.ts'

export function retail(): BuiltinTable {
	return getBuiltinTable(Target.Retail)
}

export function createContext(builtins: BuiltinTable = retail()): CompilationContext {
	return new CompilationContext(builtins)
}

/** Tokenize and parse one file, expanding macros unless told not to. */
export function read(text: string, options: { name?: string; expand?: boolean } = {}): SourceFile {
	const context = createContext()
	const file = new SourceFile(options.name ?? 'test.hsc', text)
	tokenize(file, context)
	parse(file, context)
	if (options.expand ?? true) expandMacros(file, context)
	return file
}

export function compileText(text: string, target: Target = Target.Retail): CompiledScriptData {
	return compile([{ content: text, name: 'test.hsc' }], { target })
}

export function compileWith(builtins: BuiltinTable, text: string): CompiledScriptData {
	return compile([{ content: text, name: 'test.hsc' }], { builtins, target: builtins.target.id })
}

/** Run `fn`, which must throw a CompileError, and return that error. */
export function expectCompileError(fn: () => unknown): CompileError {
	try {
		fn()
	} catch (error) {
		if (error instanceof CompileError) return error
		throw error
	}
	return assert.fail('expected a CompileError')
}
