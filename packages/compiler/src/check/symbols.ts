/**
 * Unit-wide symbol table and identifier resolution.
 */

import type { CompilationContext } from '../core/context.ts'
import type { NodeId } from '../core/nodes.ts'
import { formatLocation, type SourceFile } from '../core/source.ts'
import type { EngineGlobal, FunctionSignature } from '../definitions/builtins.ts'
import {
	type Declaration,
	DeclarationKind,
	type GlobalDeclaration,
	type ScriptDeclaration,
} from '../parse/declarations.ts'
import { ScriptType, scriptTypeName, valueTypeDisplayName } from './types.ts'

export interface ScriptSymbol {
	/** Script id: position among the unit's surviving scripts */
	readonly index: number
	readonly declaration: ScriptDeclaration
	used: boolean
}

export interface GlobalSymbol {
	/** Global slot: position among the unit's globals */
	readonly slot: number
	readonly declaration: GlobalDeclaration
	used: boolean
}

export type DefinitionSymbol =
	| { readonly kind: typeof DeclarationKind.Script; readonly symbol: ScriptSymbol }
	| { readonly kind: typeof DeclarationKind.Global; readonly symbol: GlobalSymbol }

/** A stub whose static replacement survives; checked but never emitted. */
export interface ReplacedStub {
	readonly kind: 'replacedStub'
	readonly declaration: ScriptDeclaration
}

export type TableEntry = DefinitionSymbol | ReplacedStub

export type CallTarget =
	| { readonly kind: 'script'; readonly symbol: ScriptSymbol }
	| { readonly kind: 'function'; readonly signature: FunctionSignature }

export type ValueTarget =
	| { readonly kind: 'global'; readonly symbol: GlobalSymbol }
	| { readonly kind: 'engineGlobal'; readonly global: EngineGlobal }

export class SymbolTable {
	readonly scripts: ScriptSymbol[] = []
	readonly globals: GlobalSymbol[] = []
	/** Surviving definitions in document order */
	readonly definitions: DefinitionSymbol[] = []
	/** Every declaration in document order, replaced stubs included */
	readonly entries: TableEntry[] = []

	private readonly scriptsByName = new Map<string, ScriptSymbol>()
	private readonly globalsByName = new Map<string, GlobalSymbol>()

	lookupScript(name: string): ScriptSymbol | undefined {
		return this.scriptsByName.get(name)
	}

	lookupGlobal(name: string): GlobalSymbol | undefined {
		return this.globalsByName.get(name)
	}

	addScript(declaration: ScriptDeclaration): ScriptSymbol {
		const symbol: ScriptSymbol = { declaration, index: this.scripts.length, used: false }
		this.scripts.push(symbol)
		this.scriptsByName.set(declaration.name, symbol)
		this.addDefinition({ kind: DeclarationKind.Script, symbol })
		return symbol
	}

	addGlobal(declaration: GlobalDeclaration): GlobalSymbol {
		const symbol: GlobalSymbol = { declaration, slot: this.globals.length, used: false }
		this.globals.push(symbol)
		this.globalsByName.set(declaration.name, symbol)
		this.addDefinition({ kind: DeclarationKind.Global, symbol })
		return symbol
	}

	addReplacedStub(declaration: ScriptDeclaration): void {
		this.entries.push({ declaration, kind: 'replacedStub' })
	}

	private addDefinition(definition: DefinitionSymbol): void {
		this.definitions.push(definition)
		this.entries.push(definition)
	}
}

function failDuplicate(context: CompilationContext, declaration: Declaration, previous: Declaration): never {
	return context.failAtNode('SCNDEF001', declaration.file, declaration.nameNode, {
		kind: declaration.kind,
		name: declaration.name,
		previous: formatLocation(previous.location),
	})
}

function failClash(context: CompilationContext, declaration: Declaration, previous: Declaration): never {
	return context.failAtNode('SCNDEF002', declaration.file, declaration.nameNode, {
		name: declaration.name,
		previous: formatLocation(previous.location),
	})
}

/**
 * A stub and a static script of the same name merge into the static one.
 * Diagnostics point at the later of the two.
 */
function checkStubReplacement(
	context: CompilationContext,
	stub: ScriptDeclaration,
	replacement: ScriptDeclaration,
	later: ScriptDeclaration
): void {
	if (replacement.scriptType !== ScriptType.Static) {
		context.failAtNode('SCNDEF003', later.file, later.nameNode, {
			found: scriptTypeName(replacement.scriptType),
			name: stub.name,
		})
	}
	if (replacement.returnType !== stub.returnType) {
		context.failAtNode('SCNDEF004', later.file, later.nameNode, {
			expected: valueTypeDisplayName(stub.returnType),
			found: valueTypeDisplayName(replacement.returnType),
			name: stub.name,
		})
	}
}

/**
 * Validate names across the unit and return the stubs a static script
 * replaces.
 */
function findReplacedStubs(declarations: readonly Declaration[], context: CompilationContext): Set<Declaration> {
	const scripts = new Map<string, ScriptDeclaration>()
	const globals = new Map<string, GlobalDeclaration>()
	const replaced = new Set<Declaration>()

	for (const declaration of declarations) {
		const { name } = declaration
		if (declaration.kind === DeclarationKind.Global) {
			const previous = globals.get(name)
			if (previous !== undefined) failDuplicate(context, declaration, previous)
			const script = scripts.get(name)
			if (script !== undefined) failClash(context, declaration, script)
			globals.set(name, declaration)
			continue
		}

		const global = globals.get(name)
		if (global !== undefined) failClash(context, declaration, global)

		const previous = scripts.get(name)
		if (previous === undefined) {
			scripts.set(name, declaration)
			continue
		}
		const previousIsStub = previous.scriptType === ScriptType.Stub
		if (previousIsStub === (declaration.scriptType === ScriptType.Stub)) {
			failDuplicate(context, declaration, previous)
		}
		if (previousIsStub) {
			checkStubReplacement(context, previous, declaration, declaration)
			replaced.add(previous)
			scripts.set(name, declaration)
		} else {
			checkStubReplacement(context, declaration, previous, declaration)
			replaced.add(declaration)
		}
	}
	return replaced
}

function checkCount(
	context: CompilationContext,
	category: string,
	declarations: readonly Declaration[],
	limit: number
): void {
	const first = declarations[limit]
	if (first !== undefined) {
		context.failAtNode('SCNRES005', first.file, first.nameNode, {
			category,
			count: declarations.length,
			limit,
		})
	}
}

/**
 * Merge the unit's declarations and assign script ids and global slots in
 * document order. Duplicate names are reported at the later declaration; a
 * replaced stub gives up its place to the static script.
 */
export function buildSymbolTable(declarations: readonly Declaration[], context: CompilationContext): SymbolTable {
	const replaced = findReplacedStubs(declarations, context)
	const table = new SymbolTable()
	for (const declaration of declarations) {
		if (declaration.kind === DeclarationKind.Global) table.addGlobal(declaration)
		else if (replaced.has(declaration)) table.addReplacedStub(declaration)
		else table.addScript(declaration)
	}

	const { limits } = context.builtins.target
	checkCount(
		context,
		'scripts',
		table.scripts.map((symbol) => symbol.declaration),
		limits.scripts
	)
	checkCount(
		context,
		'globals',
		table.globals.map((symbol) => symbol.declaration),
		limits.globals
	)
	return table
}

/**
 * Classifies call heads and bare atoms against the unit and the target's
 * builtin table.
 */
export class Resolver {
	private readonly table: SymbolTable
	private readonly context: CompilationContext

	constructor(table: SymbolTable, context: CompilationContext) {
		this.table = table
		this.context = context
	}

	/** Unit scripts shadow builtin functions. */
	resolveCall(name: string, file: SourceFile, call: NodeId): CallTarget {
		const script = this.table.lookupScript(name)
		if (script !== undefined) {
			return { kind: 'script', symbol: script }
		}

		const signature = this.context.builtins.lookupFunction(name)
		if (signature === undefined) {
			return this.context.failAtNode('SCNRES001', file, call, { name })
		}
		this.checkId(file, call, 'function', name, signature.id, this.context.builtins.target.limits.functions)
		return { kind: 'function', signature }
	}

	/** Unit globals shadow engine globals; anything else is a literal. */
	resolveValue(name: string, file: SourceFile, atom: NodeId): ValueTarget | undefined {
		const symbol = this.table.lookupGlobal(name)
		if (symbol !== undefined) {
			return { kind: 'global', symbol }
		}

		const global = this.context.builtins.lookupGlobal(name)
		if (global === undefined) return undefined
		this.checkId(file, atom, 'global', name, global.id, this.context.builtins.target.limits.globals)
		return { global, kind: 'engineGlobal' }
	}

	private checkId(file: SourceFile, node: NodeId, category: string, name: string, id: number, limit: number): void {
		if (id >= limit) {
			this.context.failAtNode('SCNRES006', file, node, { category, id, limit, name })
		}
	}
}
