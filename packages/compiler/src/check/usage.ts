/**
 * Unused-definition warnings, reported once the whole unit is checked.
 */

import type { CompilationContext } from '../core/context.ts'
import { DeclarationKind } from '../parse/declarations.ts'
import type { SymbolTable } from './symbols.ts'
import { ScriptType } from './types.ts'

/** Scripts the engine runs on its own. */
function isEntryPoint(scriptType: ScriptType): boolean {
	return scriptType === ScriptType.Startup || scriptType === ScriptType.Continuous
}

export function reportUnused(table: SymbolTable, context: CompilationContext): void {
	for (const definition of table.definitions) {
		const { symbol } = definition
		if (symbol.used) continue
		const { declaration } = symbol
		if (definition.kind === DeclarationKind.Script && isEntryPoint(definition.symbol.declaration.scriptType)) {
			continue
		}
		context.warn('SCNCHECK050', declaration.file, declaration.nameNode, {
			kind: definition.kind,
			name: declaration.name,
		})
	}
}
