/**
 * Check phase: resolves, type checks and flattens every surviving definition
 * of the unit into one node arena. Replaced stubs are checked but not
 * flattened.
 *
 * Definitions are processed in document order. Nodes are appended in
 * preorder, so a call node always precedes its arguments and the arena
 * layout is a pure function of the unit.
 */

import { type CompilationContext, CompileError, type Diagnostic } from '../core/context.ts'
import type { SourceFile } from '../core/source.ts'
import type { FunctionSignature } from '../definitions/builtins.ts'
import type { Target } from '../definitions/schema.ts'
import { DeclarationKind, type ScriptDeclaration } from '../parse/declarations.ts'
import { NodeArena } from './arena.ts'
import { type Expr, resolveExpression } from './expressions.ts'
import { canConvert } from './lattice.ts'
import { DefinitionPhase, PhaseTracker } from './state.ts'
import { type GlobalSymbol, Resolver, type ScriptSymbol, type SymbolTable, type TableEntry } from './symbols.ts'
import { retype, type TypedExpr, TypeChecker } from './typing.ts'
import {
	type CompiledGlobal,
	type CompiledNode,
	type CompiledScript,
	NO_NODE,
	NodeKind,
	type NodeIndex,
	ScriptType,
	ValueType,
	valueTypeDisplayName,
} from './types.ts'
import { reportUnused } from './usage.ts'

/**
 * The immutable result of one successful compile.
 */
export interface CompiledScriptData {
	readonly target: Target
	/** Display names of the unit's files in load order */
	readonly files: readonly string[]
	readonly nodes: readonly CompiledNode[]
	readonly scripts: readonly CompiledScript[]
	readonly globals: readonly CompiledGlobal[]
	readonly warnings: readonly Diagnostic[]
}

interface CheckerState {
	readonly table: SymbolTable
	readonly resolver: Resolver
	readonly context: CompilationContext
	readonly arena: NodeArena
}

function flattenExpr(arena: NodeArena, file: SourceFile, typed: TypedExpr): NodeIndex {
	const index = arena.add({
		data: typed.data,
		external: typed.external,
		id: typed.id,
		kind: typed.kind,
		location: file.nodeLocation(typed.expr.node),
		text: typed.text,
		valueType: typed.valueType,
	})
	if (typed.kind === NodeKind.FunctionCall || typed.kind === NodeKind.ScriptCall) {
		arena.setData(index, { index: flattenSequence(arena, file, typed.args), kind: 'node' })
	}
	return index
}

/** Flatten siblings and chain them; returns the first index or NO_NODE. */
function flattenSequence(arena: NodeArena, file: SourceFile, sequence: readonly TypedExpr[]): NodeIndex {
	let first = NO_NODE
	let previous: NodeIndex | null = null
	for (const typed of sequence) {
		const index = flattenExpr(arena, file, typed)
		if (previous === null) first = index
		else arena.setNext(previous, index)
		previous = index
	}
	return first
}

function beginSignature(state: CheckerState, declaration: ScriptDeclaration): FunctionSignature {
	const target = state.resolver.resolveCall('begin', declaration.file, declaration.form)
	if (target.kind !== 'function') {
		throw new Error('begin cannot be a unit script')
	}
	return target.signature
}

/** The last expression of a body must convert to the script's return type. */
function checkResult(
	state: CheckerState,
	checker: TypeChecker,
	declaration: ScriptDeclaration,
	expr: Expr
): TypedExpr {
	const { returnType } = declaration
	const result = checker.check(expr, returnType)
	if (canConvert(result.valueType, returnType, state.context.builtins)) {
		return retype(result, returnType)
	}
	if (declaration.scriptType === ScriptType.Stub) return result
	return state.context.failAtNode('SCNCHECK007', declaration.file, expr.node, {
		expected: valueTypeDisplayName(returnType),
		found: valueTypeDisplayName(result.valueType),
		name: declaration.name,
	})
}

/**
 * Resolve and type a script body into one root expression. Bodies of several
 * expressions run inside an implicit `begin` located at the script form.
 */
function checkBody(state: CheckerState, tracker: PhaseTracker, declaration: ScriptDeclaration): TypedExpr | null {
	const { file } = declaration

	tracker.advance(DefinitionPhase.Resolving)
	const body: Expr[] = declaration.body.map((id) => resolveExpression(file, id, state.resolver, state.context))
	const begin = body.length > 1 ? beginSignature(state, declaration) : null

	tracker.advance(DefinitionPhase.TypeChecking)
	const checker = new TypeChecker(file, state.table, state.context, null)
	const last = body.length - 1
	const typed = body.map((expr, i) =>
		i < last ? checker.checkArgument(expr, ValueType.Void) : checkResult(state, checker, declaration, expr)
	)
	if (begin === null) return typed[0] ?? null

	return {
		args: typed,
		data: { kind: 'none' },
		expr: {
			args: body,
			kind: 'call',
			name: begin.name,
			node: declaration.form,
			target: { kind: 'function', signature: begin },
		},
		external: true,
		id: begin.id,
		kind: NodeKind.FunctionCall,
		text: begin.name,
		valueType: declaration.returnType,
	}
}

function checkScript(state: CheckerState, tracker: PhaseTracker, symbol: ScriptSymbol): CompiledScript {
	const { declaration } = symbol
	const root = checkBody(state, tracker, declaration)
	const firstNode = root === null ? NO_NODE : flattenExpr(state.arena, declaration.file, root)
	tracker.advance(DefinitionPhase.Flattened)
	return {
		firstNode,
		location: declaration.location,
		name: declaration.name,
		returnType: declaration.returnType,
		scriptType: declaration.scriptType,
	}
}

function checkGlobal(state: CheckerState, tracker: PhaseTracker, symbol: GlobalSymbol): CompiledGlobal {
	const { declaration } = symbol
	const { file } = declaration

	tracker.advance(DefinitionPhase.Resolving)
	const initializer = resolveExpression(file, declaration.initializer, state.resolver, state.context)

	tracker.advance(DefinitionPhase.TypeChecking)
	const typed = new TypeChecker(file, state.table, state.context, symbol).checkArgument(
		initializer,
		declaration.valueType
	)

	const firstNode = flattenExpr(state.arena, file, typed)
	tracker.advance(DefinitionPhase.Flattened)
	return {
		firstNode,
		location: declaration.location,
		name: declaration.name,
		valueType: declaration.valueType,
	}
}

function entryName(entry: TableEntry): string {
	switch (entry.kind) {
		case 'replacedStub':
			return `script ${entry.declaration.name}`
		default:
			return `${entry.kind} ${entry.symbol.declaration.name}`
	}
}

/**
 * Runs `check` for one table entry, attaching the definition and its phase to
 * any fatal diagnostic.
 */
function withPhases<T>(entry: TableEntry, check: (tracker: PhaseTracker) => T): T {
	const tracker = new PhaseTracker(entryName(entry))
	try {
		return check(tracker)
	} catch (error) {
		if (!(error instanceof CompileError)) throw error
		tracker.advance(DefinitionPhase.Failed)
		throw new CompileError(error.diagnostic, error.warnings, {
			definition: tracker.definition,
			phase: tracker.failedPhase ?? tracker.phase,
		})
	}
}

/**
 * Check and flatten the unit. Throws CompileError on the first fatal
 * diagnostic; nothing of the arena survives a failure.
 */
export function checkUnit(
	table: SymbolTable,
	files: readonly SourceFile[],
	context: CompilationContext
): CompiledScriptData {
	const state: CheckerState = {
		arena: new NodeArena(),
		context,
		resolver: new Resolver(table, context),
		table,
	}

	const scripts = new Map<ScriptSymbol, CompiledScript>()
	const globals = new Map<GlobalSymbol, CompiledGlobal>()
	for (const entry of table.entries) {
		switch (entry.kind) {
			case 'replacedStub':
				withPhases(entry, (tracker) => checkBody(state, tracker, entry.declaration))
				break
			case DeclarationKind.Script: {
				const { symbol } = entry
				scripts.set(
					symbol,
					withPhases(entry, (tracker) => checkScript(state, tracker, symbol))
				)
				break
			}
			case DeclarationKind.Global: {
				const { symbol } = entry
				globals.set(
					symbol,
					withPhases(entry, (tracker) => checkGlobal(state, tracker, symbol))
				)
				break
			}
		}
	}

	reportUnused(table, context)

	return Object.freeze({
		files: Object.freeze(files.map((file) => file.name)),
		globals: Object.freeze(table.globals.map((symbol) => compiled(globals, symbol))),
		nodes: state.arena.freeze(),
		scripts: Object.freeze(table.scripts.map((symbol) => compiled(scripts, symbol))),
		target: context.builtins.target.id,
		warnings: Object.freeze([...context.getWarnings()]),
	})
}

function compiled<K, V>(entries: ReadonlyMap<K, V>, key: K): V {
	const value = entries.get(key)
	if (value === undefined) {
		throw new Error('Definition was never checked')
	}
	return Object.freeze(value)
}
