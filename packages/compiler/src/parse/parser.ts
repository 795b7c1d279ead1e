import type { FailedMatchResult, Node, Semantics } from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import { FormKind, type NodeId, NodeStore } from '../core/nodes.ts'
import type { SourceFile } from '../core/source.ts'
import { type Token, type TokenId, TokenKind, tokenId } from '../core/tokens.ts'
import { FormGrammar } from '../grammar/index.ts'

export interface ParseResult {
	readonly roots: readonly NodeId[]
}

function tokenToOhmChar(token: Token): string {
	switch (token.kind) {
		case TokenKind.LeftParen:
			return '('
		case TokenKind.RightParen:
			return ')'
		case TokenKind.Atom:
			return 'a'
		case TokenKind.String:
			return 's'
		default:
			return ''
	}
}

/** One character per token; Eof renders as nothing and is always last. */
function tokensToOhmInput(file: SourceFile): string {
	const parts: string[] = []
	for (const [, token] of file.tokens) {
		parts.push(tokenToOhmChar(token))
	}
	return parts.join('')
}

function createNodeEmittingSemantics(file: SourceFile, nodes: NodeStore): Semantics {
	const semantics = FormGrammar.createSemantics()

	function leaf(node: Node, kind: typeof FormKind.Atom | typeof FormKind.String): NodeId {
		const id = tokenId(node.source.startIdx)
		return nodes.add({ kind, payload: file.tokens.get(id).payload, subtreeSize: 1, tokenId: id })
	}

	semantics.addOperation<NodeId>('emitForm', {
		atom(_a: Node): NodeId {
			return leaf(this, FormKind.Atom)
		},
		form(inner: Node): NodeId {
			return inner['emitForm']()
		},
		list(_open: Node, forms: Node, _close: Node): NodeId {
			const startCount = nodes.count()
			for (const form of forms.children) {
				form['emitForm']()
			}
			return nodes.add({
				kind: FormKind.List,
				payload: forms.children.length,
				subtreeSize: nodes.count() - startCount + 1,
				tokenId: tokenId(this.source.startIdx),
			})
		},
		string(_s: Node): NodeId {
			return leaf(this, FormKind.String)
		},
	})

	semantics.addOperation<NodeId[]>('emitProgram', {
		program(forms: Node): NodeId[] {
			return forms.children.map((form: Node): NodeId => form['emitForm']())
		},
	})

	return semantics
}

/**
 * The rendered input is a single line, so the failure column reported by the
 * matcher is the 1-based index of the offending token.
 */
function failureToken(file: SourceFile, matchResult: FailedMatchResult): TokenId {
	const column = /col (\d+)/.exec(matchResult.shortMessage ?? '')?.[1]
	const index = column === undefined ? 0 : Number(column) - 1
	return tokenId(Math.min(index, file.tokens.count() - 1))
}

/** Parses tokens from file.tokens into file.nodes (postorder) and file.roots. */
export function parse(file: SourceFile, context: CompilationContext): ParseResult {
	const ohmInput = tokensToOhmInput(file)
	const matchResult = FormGrammar.match(ohmInput)

	if (matchResult.failed()) {
		context.failAtToken('SCNPARSE001', file, failureToken(file, matchResult), {
			detail: matchResult.shortMessage ?? 'unexpected input',
		})
	}

	const nodes = new NodeStore()
	const semantics = createNodeEmittingSemantics(file, nodes)
	const roots: NodeId[] = semantics(matchResult)['emitProgram']()

	file.nodes = nodes
	file.roots = roots
	return { roots }
}
