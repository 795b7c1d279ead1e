/**
 * The flattened node array. Nodes are appended in preorder and patched in
 * place once their arguments and siblings are known.
 */

import { type CompiledNode, NO_NODE, type NodeData, type NodeIndex, nodeIndex } from './types.ts'

type ArenaNode = { -readonly [K in keyof CompiledNode]: CompiledNode[K] }

export class NodeArena {
	private readonly nodes: ArenaNode[] = []

	add(node: Omit<CompiledNode, 'next'>): NodeIndex {
		const index = nodeIndex(this.nodes.length)
		this.nodes.push({ ...node, next: NO_NODE })
		return index
	}

	get(index: NodeIndex): CompiledNode {
		return this.at(index)
	}

	setNext(index: NodeIndex, next: NodeIndex): void {
		this.at(index).next = next
	}

	setData(index: NodeIndex, data: NodeData): void {
		this.at(index).data = data
	}

	count(): number {
		return this.nodes.length
	}

	/** Frozen copies; the arena is left untouched. */
	freeze(): readonly CompiledNode[] {
		return Object.freeze(this.nodes.map((node) => Object.freeze({ ...node })))
	}

	private at(index: NodeIndex): ArenaNode {
		const node = this.nodes[index]
		if (node === undefined) {
			throw new Error(`Invalid NodeIndex: ${index}`)
		}
		return node
	}
}
