/**
 * Macro expansion over the parsed forest.
 *
 *   (cond (c1 e1...) (c2 e2...) ...)
 *     => (if c1 (begin e1...) (if c2 (begin e2...) ...))
 *
 * The forest is copied into a fresh store in postorder; synthetic `if` and
 * `begin` atoms point at the clause they came from.
 */

import type { CompilationContext } from '../core/context.ts'
import { FormKind, type NodeId, NodeStore } from '../core/nodes.ts'
import type { SourceFile } from '../core/source.ts'
import type { TokenId } from '../core/tokens.ts'

interface ExpansionState {
	readonly file: SourceFile
	readonly context: CompilationContext
	readonly source: NodeStore
	readonly target: NodeStore
}

function headText(state: ExpansionState, id: NodeId): string | null {
	const node = state.source.get(id)
	if (node.kind !== FormKind.List) return null
	const head = state.source.children(id)[0]
	if (head === undefined) return null
	const headNode = state.source.get(head)
	if (headNode.kind !== FormKind.Atom) return null
	return state.file.nodeText(headNode).toLowerCase()
}

function addAtom(state: ExpansionState, text: string, token: TokenId): void {
	state.target.add({
		kind: FormKind.Atom,
		payload: state.file.strings.intern(text),
		subtreeSize: 1,
		tokenId: token,
	})
}

function addList(state: ExpansionState, startCount: number, childCount: number, token: TokenId): NodeId {
	return state.target.add({
		kind: FormKind.List,
		payload: childCount,
		subtreeSize: state.target.count() - startCount + 1,
		tokenId: token,
	})
}

function copyForm(state: ExpansionState, id: NodeId, expand: boolean): NodeId {
	const node = state.source.get(id)
	if (node.kind !== FormKind.List) {
		return state.target.add(node)
	}
	if (expand && headText(state, id) === 'cond') {
		return expandCond(state, id)
	}

	const startCount = state.target.count()
	const children = state.source.children(id)
	for (const child of children) {
		copyForm(state, child, true)
	}
	return addList(state, startCount, children.length, node.tokenId)
}

function expandCond(state: ExpansionState, id: NodeId): NodeId {
	const clauses = state.source.children(id).slice(1)
	if (clauses.length === 0) {
		state.context.failAtNode('SCNPARSE008', state.file, id, { detail: 'expected at least one clause' })
	}
	for (const clause of clauses) {
		const node = state.source.get(clause)
		if (node.kind !== FormKind.List || node.payload < 2) {
			state.context.failAtNode('SCNPARSE008', state.file, clause, {
				detail: 'each clause needs a condition and at least one expression',
			})
		}
	}
	return emitClause(state, clauses, 0)
}

function emitClause(state: ExpansionState, clauses: readonly NodeId[], index: number): NodeId {
	const clause = clauses[index]
	if (clause === undefined) {
		throw new Error(`cond clause ${index} out of range`)
	}
	const token = state.source.get(clause).tokenId
	const [condition, ...body] = state.source.children(clause)
	if (condition === undefined) {
		throw new Error('cond clause without condition')
	}

	const startCount = state.target.count()
	addAtom(state, 'if', token)
	copyForm(state, condition, true)

	const beginStart = state.target.count()
	addAtom(state, 'begin', token)
	for (const expression of body) {
		copyForm(state, expression, true)
	}
	addList(state, beginStart, body.length + 1, token)

	const hasRest = index + 1 < clauses.length
	if (hasRest) {
		emitClause(state, clauses, index + 1)
	}
	return addList(state, startCount, hasRest ? 4 : 3, token)
}

/**
 * Expand macros below the top level of every root form. Top-level forms are
 * declarations and keep their shape.
 */
export function expandMacros(file: SourceFile, context: CompilationContext): void {
	const state: ExpansionState = { context, file, source: file.nodes, target: new NodeStore() }
	file.roots = file.roots.map((root) => copyForm(state, root, false))
	file.nodes = state.target
}
