/**
 * Builtin definitions shipped with the compiler.
 */

import { readFileSync } from 'node:fs'
import { type BuiltinTable, createBuiltinTable } from './builtins.ts'
import { type Definitions, parseDefinitions, type Target } from './schema.ts'

export {
	type BuiltinTable,
	createBuiltinTable,
	type EngineGlobal,
	type FunctionSignature,
	type IdentifierLimits,
	type ParameterSignature,
	type TargetProfile,
} from './builtins.ts'
export {
	ALL_TARGETS,
	type Definitions,
	definitionsSchema,
	isTarget,
	parseDefinitions,
	Target,
} from './schema.ts'

const DEFINITIONS_URL = new URL('../../data/definitions.json', import.meta.url)

let cachedDefinitions: Definitions | null = null
const tables = new Map<Target, BuiltinTable>()

/** Read and validate the shipped definitions file once per process. */
export function loadDefinitions(): Definitions {
	if (cachedDefinitions === null) {
		const raw: unknown = JSON.parse(readFileSync(DEFINITIONS_URL, 'utf8'))
		cachedDefinitions = parseDefinitions(raw)
	}
	return cachedDefinitions
}

/** The shipped table of a target, built once and shared read-only. */
export function getBuiltinTable(target: Target): BuiltinTable {
	let table = tables.get(target)
	if (table === undefined) {
		table = createBuiltinTable(loadDefinitions(), target)
		tables.set(target, table)
	}
	return table
}
