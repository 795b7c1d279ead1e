/**
 * Parse node storage using dense arrays with integer IDs.
 * Nodes are stored in postorder - children precede their parent.
 * This enables O(1) child range lookup via subtreeSize.
 */

import type { TokenId } from './tokens.ts'

/**
 * Form kinds produced by the reader. A list's head is its first child.
 */
export const FormKind = {
	Atom: 0,
	List: 2,
	String: 1,
} as const

export type FormKind = (typeof FormKind)[keyof typeof FormKind]

/**
 * Branded type for node IDs.
 * Provides type safety while remaining a plain number at runtime.
 */
export type NodeId = number & { readonly __brand: 'NodeId' }

export function nodeId(n: number): NodeId {
	return n as NodeId
}

/**
 * A single parse node - fixed size, no pointers.
 *
 * Stored in postorder: children precede parent.
 * subtreeSize encodes tree structure:
 * - For leaf nodes: subtreeSize = 1
 * - For parent nodes: subtreeSize = 1 + sum of children's subtreeSizes
 */
export interface ParseNode {
	readonly kind: FormKind
	/** Primary token for this node; the opening parenthesis for lists */
	readonly tokenId: TokenId
	/** Number of nodes in subtree including self */
	readonly subtreeSize: number
	/** StringId of the text for atoms and strings, direct child count for lists */
	readonly payload: number
}

/**
 * Dense array storage for parse nodes (postorder).
 * Append-only during parsing phase.
 */
export class NodeStore {
	private readonly nodes: ParseNode[] = []

	add(node: ParseNode): NodeId {
		const id = nodeId(this.nodes.length)
		this.nodes.push(node)
		return id
	}

	get(id: NodeId): ParseNode {
		const node = this.nodes[id]
		if (node === undefined) {
			throw new Error(`Invalid NodeId: ${id}`)
		}
		return node
	}

	count(): number {
		return this.nodes.length
	}

	isValid(id: NodeId): boolean {
		return id >= 0 && id < this.nodes.length
	}

	/**
	 * Iterate over direct children of a node.
	 * In postorder, direct children are found by walking backwards from the
	 * node, skipping each child's subtree.
	 * Note: This yields children in reverse order (rightmost first).
	 */
	*iterateChildren(id: NodeId): Generator<[NodeId, ParseNode]> {
		const node = this.get(id)
		const start = id - node.subtreeSize + 1
		let pos = id - 1

		while (pos >= start) {
			const child = this.nodes[pos]
			if (child === undefined) break
			yield [nodeId(pos), child]
			pos -= child.subtreeSize
		}
	}

	/** Direct children in source order. */
	children(id: NodeId): NodeId[] {
		const result: NodeId[] = []
		for (const [childId] of this.iterateChildren(id)) {
			result.push(childId)
		}
		return result.reverse()
	}

	*[Symbol.iterator](): Generator<[NodeId, ParseNode]> {
		for (let i = 0; i < this.nodes.length; i++) {
			const node = this.nodes[i]
			if (node !== undefined) yield [nodeId(i), node]
		}
	}
}
