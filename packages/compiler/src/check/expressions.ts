/**
 * Resolved expression trees: every call head and bare atom classified, no
 * types assigned yet.
 */

import type { CompilationContext } from '../core/context.ts'
import { FormKind, type NodeId } from '../core/nodes.ts'
import type { SourceFile } from '../core/source.ts'
import type { EngineGlobal } from '../definitions/builtins.ts'
import type { CallTarget, GlobalSymbol, Resolver } from './symbols.ts'

export interface LiteralExpr {
	readonly kind: 'literal'
	readonly node: NodeId
	/** Source text with its original case */
	readonly text: string
	/** Written in quotes; never resolves to a global */
	readonly quoted: boolean
}

export interface GlobalExpr {
	readonly kind: 'global'
	readonly node: NodeId
	readonly name: string
	readonly symbol: GlobalSymbol
}

export interface EngineGlobalExpr {
	readonly kind: 'engineGlobal'
	readonly node: NodeId
	readonly name: string
	readonly global: EngineGlobal
}

export interface CallExpr {
	readonly kind: 'call'
	readonly node: NodeId
	readonly name: string
	readonly target: CallTarget
	readonly args: readonly Expr[]
}

export type Expr = LiteralExpr | GlobalExpr | EngineGlobalExpr | CallExpr

/**
 * Resolve one form, outermost first, arguments left to right.
 */
export function resolveExpression(
	file: SourceFile,
	id: NodeId,
	resolver: Resolver,
	context: CompilationContext
): Expr {
	const node = file.nodes.get(id)

	if (node.kind === FormKind.String) {
		return { kind: 'literal', node: id, quoted: true, text: file.nodeText(node) }
	}

	if (node.kind === FormKind.Atom) {
		const text = file.nodeText(node)
		const name = text.toLowerCase()
		const value = resolver.resolveValue(name, file, id)
		if (value === undefined) {
			return { kind: 'literal', node: id, quoted: false, text }
		}
		return value.kind === 'global'
			? { kind: 'global', name, node: id, symbol: value.symbol }
			: { global: value.global, kind: 'engineGlobal', name, node: id }
	}

	const [head, ...rest] = file.nodes.children(id)
	const headNode = head === undefined ? undefined : file.nodes.get(head)
	if (head === undefined || headNode === undefined || headNode.kind !== FormKind.Atom) {
		const found =
			headNode === undefined
				? '()'
				: headNode.kind === FormKind.String
					? `"${file.nodeText(headNode)}"`
					: 'a list'
		return context.failAtNode('SCNPARSE009', file, head ?? id, { found })
	}

	const name = file.nodeText(headNode).toLowerCase()
	const target = resolver.resolveCall(name, file, id)
	const args = rest.map((arg) => resolveExpression(file, arg, resolver, context))
	return { args, kind: 'call', name, node: id, target }
}
