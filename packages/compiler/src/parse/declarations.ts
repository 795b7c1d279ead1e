/**
 * Top-level declarations of one file.
 *
 *   (global <type> <name> <expression>)
 *   (script <script-type> [<return-type>] <name> <expression>...)
 */

import {
	isDeclarableType,
	isReturnType,
	ScriptType,
	scriptTypeFromName,
	ValueType,
	valueTypeFromName,
} from '../check/types.ts'
import type { CompilationContext } from '../core/context.ts'
import { FormKind, type NodeId, type ParseNode } from '../core/nodes.ts'
import type { SourceFile, SourceLocation } from '../core/source.ts'

export const DeclarationKind = {
	Global: 'global',
	Script: 'script',
} as const

export type DeclarationKind = (typeof DeclarationKind)[keyof typeof DeclarationKind]

interface DeclarationBase {
	readonly name: string
	readonly file: SourceFile
	/** The whole form */
	readonly form: NodeId
	/** The name atom; diagnostics about the declaration point here */
	readonly nameNode: NodeId
	readonly location: SourceLocation
}

export interface GlobalDeclaration extends DeclarationBase {
	readonly kind: typeof DeclarationKind.Global
	readonly valueType: ValueType
	readonly initializer: NodeId
}

export interface ScriptDeclaration extends DeclarationBase {
	readonly kind: typeof DeclarationKind.Script
	readonly scriptType: ScriptType
	readonly returnType: ValueType
	readonly body: readonly NodeId[]
}

export type Declaration = GlobalDeclaration | ScriptDeclaration

interface FormReader {
	readonly file: SourceFile
	readonly context: CompilationContext
}

function describeForm(file: SourceFile, node: ParseNode): string {
	switch (node.kind) {
		case FormKind.Atom:
			return file.nodeText(node)
		case FormKind.String:
			return `"${file.nodeText(node)}"`
		default:
			return node.payload === 0 ? '()' : 'a list'
	}
}

function atomText(reader: FormReader, id: NodeId): string | null {
	const node = reader.file.nodes.get(id)
	return node.kind === FormKind.Atom ? reader.file.nodeText(node).toLowerCase() : null
}

function readName(reader: FormReader, kind: DeclarationKind, id: NodeId): string {
	const name = atomText(reader, id)
	if (name === null) {
		return reader.context.failAtNode('SCNPARSE003', reader.file, id, { detail: 'the name must be a word', kind })
	}
	const limit = reader.context.builtins.target.maxNameLength
	if (name.length > limit) {
		reader.context.failAtNode('SCNPARSE006', reader.file, id, { length: name.length, limit, name })
	}
	return name
}

function readValueType(reader: FormReader, kind: DeclarationKind, id: NodeId, allowVoid: boolean): ValueType {
	const text = atomText(reader, id)
	if (text === null) {
		return reader.context.failAtNode('SCNPARSE003', reader.file, id, { detail: 'the type must be a word', kind })
	}
	const type = valueTypeFromName(text)
	if (type === undefined || !(allowVoid ? isReturnType(type) : isDeclarableType(type))) {
		return reader.context.failAtNode('SCNPARSE004', reader.file, id, { name: text })
	}
	return type
}

function readGlobal(reader: FormReader, form: NodeId, parts: readonly NodeId[]): GlobalDeclaration {
	const [, typeNode, nameNode, initializer, extra] = parts
	if (typeNode === undefined || nameNode === undefined || initializer === undefined) {
		return reader.context.failAtNode('SCNPARSE003', reader.file, form, {
			detail: 'expected a type, a name and one expression',
			kind: DeclarationKind.Global,
		})
	}
	if (extra !== undefined) {
		reader.context.failAtNode('SCNPARSE003', reader.file, extra, {
			detail: `expected exactly one expression, got ${parts.length - 3}`,
			kind: DeclarationKind.Global,
		})
	}

	const valueType = readValueType(reader, DeclarationKind.Global, typeNode, false)
	return {
		file: reader.file,
		form,
		initializer,
		kind: DeclarationKind.Global,
		location: reader.file.nodeLocation(nameNode),
		name: readName(reader, DeclarationKind.Global, nameNode),
		nameNode,
		valueType,
	}
}

/**
 * A stub may leave out its return type, which is then void: the element after
 * the script type is a return type only if it names one and something follows it.
 */
function stubHasReturnType(reader: FormReader, parts: readonly NodeId[]): boolean {
	const candidate = parts[2]
	if (candidate === undefined || parts.length < 4) return false
	const text = atomText(reader, candidate)
	const type = text === null ? undefined : valueTypeFromName(text)
	return type !== undefined && isReturnType(type)
}

function readScript(reader: FormReader, form: NodeId, parts: readonly NodeId[]): ScriptDeclaration {
	const kind = DeclarationKind.Script
	const typeNode = parts[1]
	if (typeNode === undefined) {
		return reader.context.failAtNode('SCNPARSE003', reader.file, form, {
			detail: 'expected a script type and a name',
			kind,
		})
	}
	const typeText = atomText(reader, typeNode)
	const scriptType = typeText === null ? undefined : scriptTypeFromName(typeText)
	if (scriptType === undefined) {
		return reader.context.failAtNode('SCNPARSE005', reader.file, typeNode, {
			name: typeText ?? describeForm(reader.file, reader.file.nodes.get(typeNode)),
		})
	}

	const declaresReturnType =
		scriptType === ScriptType.Static || (scriptType === ScriptType.Stub && stubHasReturnType(reader, parts))
	const nameIndex = declaresReturnType ? 3 : 2
	const nameNode = parts[nameIndex]
	const returnTypeNode = declaresReturnType ? parts[2] : undefined
	if (nameNode === undefined) {
		return reader.context.failAtNode('SCNPARSE003', reader.file, form, {
			detail: scriptType === ScriptType.Static ? 'expected a return type and a name' : 'expected a name',
			kind,
		})
	}

	const returnType =
		returnTypeNode === undefined ? ValueType.Void : readValueType(reader, kind, returnTypeNode, true)
	const name = readName(reader, kind, nameNode)
	if (reader.context.builtins.isReservedName(name)) {
		reader.context.failAtNode('SCNPARSE007', reader.file, nameNode, { name })
	}

	const body = parts.slice(nameIndex + 1)
	if (body.length === 0 && scriptType !== ScriptType.Stub) {
		reader.context.failAtNode('SCNPARSE003', reader.file, form, {
			detail: 'expected at least one expression',
			kind,
		})
	}

	return {
		body,
		file: reader.file,
		form,
		kind: DeclarationKind.Script,
		location: reader.file.nodeLocation(nameNode),
		name,
		nameNode,
		returnType,
		scriptType,
	}
}

/**
 * Validate the top-level forms of a file and return its declarations in
 * source order. Names are case-insensitive and stored lowercased.
 */
export function collectDeclarations(file: SourceFile, context: CompilationContext): Declaration[] {
	const reader: FormReader = { context, file }
	return file.roots.map((form) => {
		const parts = file.nodes.children(form)
		const head = parts[0]
		const keyword = head === undefined ? null : atomText(reader, head)
		if (keyword === DeclarationKind.Global) return readGlobal(reader, form, parts)
		if (keyword === DeclarationKind.Script) return readScript(reader, form, parts)

		const found = head === undefined ? '()' : describeForm(file, file.nodes.get(head))
		return context.failAtNode('SCNPARSE002', file, head ?? form, { found })
	})
}
