/**
 * Count-then-fill access to compiled data: call without a buffer to learn the
 * count, then again with a buffer of at least that length.
 */

import type { CompiledScriptData } from './check/checker.ts'
import type { CompiledGlobal, CompiledNode, CompiledScript } from './check/types.ts'
import type { Diagnostic } from './core/context.ts'

function fill<T>(what: string, items: readonly T[], out?: T[]): number {
	if (out !== undefined) {
		if (out.length < items.length) {
			throw new RangeError(`${what} buffer holds ${out.length} entries, ${items.length} needed`)
		}
		items.forEach((item, i) => {
			out[i] = item
		})
	}
	return items.length
}

export function getNodes(data: CompiledScriptData, out?: CompiledNode[]): number {
	return fill('node', data.nodes, out)
}

export function getScripts(data: CompiledScriptData, out?: CompiledScript[]): number {
	return fill('script', data.scripts, out)
}

export function getGlobals(data: CompiledScriptData, out?: CompiledGlobal[]): number {
	return fill('global', data.globals, out)
}

export function getWarnings(data: CompiledScriptData, out?: Diagnostic[]): number {
	return fill('warning', data.warnings, out)
}
