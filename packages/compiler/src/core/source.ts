/**
 * Per-file state owned by the reader: decoded text, interned strings,
 * tokens and the parsed form forest.
 */

import { FormKind, type NodeId, NodeStore, type ParseNode } from './nodes.ts'
import { type TokenId, TokenStore } from './tokens.ts'

/**
 * Where something came from. Lines and columns are 1-based; columns count
 * UTF-16 code units of the decoded text.
 */
export interface SourceLocation {
	readonly file: string
	readonly line: number
	readonly column: number
}

export function formatLocation(location: SourceLocation): string {
	return `${location.file}:${location.line}:${location.column}`
}

/**
 * Branded type for string IDs.
 * Used for atom and string text interned in StringStore.
 */
export type StringId = number & { readonly __brand: 'StringId' }

export function stringId(n: number): StringId {
	return n as StringId
}

/**
 * Dense array storage for interned strings.
 * Same string always returns same ID.
 */
export class StringStore {
	private readonly strings: string[] = []
	private readonly stringToId: Map<string, StringId> = new Map()

	/** Intern a string, returning its ID. Same string always returns same ID. */
	intern(s: string): StringId {
		const existing = this.stringToId.get(s)
		if (existing !== undefined) return existing

		const id = stringId(this.strings.length)
		this.strings.push(s)
		this.stringToId.set(s, id)
		return id
	}

	get(id: StringId): string {
		const s = this.strings[id]
		if (s === undefined) throw new Error(`Invalid StringId: ${id}`)
		return s
	}

	count(): number {
		return this.strings.length
	}

	isValid(id: StringId): boolean {
		return id >= 0 && id < this.strings.length
	}
}

/**
 * One loaded source file.
 *
 * The stores are filled by the reader phases in order: tokenize fills
 * `tokens`, parse fills `nodes` and `roots`, macro expansion swaps both
 * for the expanded forest.
 */
export class SourceFile {
	readonly name: string
	readonly text: string
	readonly strings = new StringStore()
	readonly tokens = new TokenStore()
	nodes = new NodeStore()
	roots: readonly NodeId[] = []

	private lines: readonly string[] | null = null

	constructor(name: string, text: string) {
		this.name = name
		this.text = text
	}

	getSourceLine(line: number): string | undefined {
		if (this.lines === null) {
			this.lines = this.text.split('\n').map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l))
		}
		return this.lines[line - 1]
	}

	location(line: number, column: number): SourceLocation {
		return { column, file: this.name, line }
	}

	tokenLocation(id: TokenId): SourceLocation {
		const token = this.tokens.get(id)
		return this.location(token.line, token.column)
	}

	nodeLocation(id: NodeId): SourceLocation {
		return this.tokenLocation(this.nodes.get(id).tokenId)
	}

	/** Text of an atom or string node. */
	nodeText(node: ParseNode): string {
		if (node.kind === FormKind.List) {
			throw new Error('List nodes carry no text')
		}
		return this.strings.get(stringId(node.payload))
	}
}
