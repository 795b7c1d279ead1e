import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * One-line rendering of a catalog entry: `[CODE] message`.
 */
export function formatCatalogMessage(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
