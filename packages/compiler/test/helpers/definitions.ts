import assert from 'node:assert'
import { ValueType } from '../../src/check/types.ts'
import { type BuiltinTable, createBuiltinTable, type IdentifierLimits } from '../../src/definitions/builtins.ts'
import { loadDefinitions } from '../../src/definitions/index.ts'
import { type FunctionDefinition, Target } from '../../src/definitions/schema.ts'

/** The retail table with some identifier limits lowered. */
export function retailWithLimits(limits: Partial<IdentifierLimits>): BuiltinTable {
	const definitions = loadDefinitions()
	const profile = definitions.targets[Target.Retail]
	assert.ok(profile)
	return createBuiltinTable(
		{ ...definitions, targets: { [Target.Retail]: { ...profile, limits: { ...profile.limits, ...limits } } } },
		Target.Retail
	)
}

/** The retail table plus void functions without parameters at the given ids. */
export function retailWithFunctions(ids: Readonly<Record<string, number>>): BuiltinTable {
	const definitions = loadDefinitions()
	const added = Object.entries(ids).map(
		([name, id]): FunctionDefinition => ({
			assignsGlobal: false,
			engines: { [Target.Retail]: id },
			inequality: false,
			name,
			numberPassthrough: false,
			parameters: [],
			passthroughLast: false,
			returnType: ValueType.Void,
			specialForm: false,
		})
	)
	return createBuiltinTable({ ...definitions, functions: [...definitions.functions, ...added] }, Target.Retail)
}
