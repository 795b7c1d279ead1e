/**
 * Per-target builtin tables.
 *
 * A table is an injected, read-only lookup from identifier name to the
 * function or global signature the active target declares for it.
 */

import type { CoercionTable } from '../check/lattice.ts'
import { type ValueType, valueTypeFromName } from '../check/types.ts'
import type { Definitions, FunctionDefinition, GlobalDefinition, Target } from './schema.ts'

export interface IdentifierLimits {
	readonly functions: number
	readonly globals: number
	readonly scripts: number
}

export interface TargetProfile {
	readonly id: Target
	readonly displayName: string
	readonly limits: IdentifierLimits
	readonly maxNameLength: number
}

export interface ParameterSignature {
	readonly type: ValueType
	/** Repeats for every remaining argument */
	readonly many: boolean
	readonly optional: boolean
	/** Literal text keeps its case */
	readonly allowUppercase: boolean
}

export interface FunctionSignature {
	readonly name: string
	/** Index in the target's function table */
	readonly id: number
	readonly returnType: ValueType
	readonly parameters: readonly ParameterSignature[]
	readonly minArguments: number
	readonly maxArguments: number
	/** Every argument but the last is evaluated for effect */
	readonly passthroughLast: boolean
	/** The passthrough type must be numeric */
	readonly numberPassthrough: boolean
	/** The passthrough type must be numeric or enumerated */
	readonly inequality: boolean
	/** The first argument names the global being written */
	readonly assignsGlobal: boolean
	readonly specialForm: boolean
}

export interface EngineGlobal {
	readonly name: string
	/** Index in the target's global table */
	readonly id: number
	readonly valueType: ValueType
}

export interface BuiltinTable extends CoercionTable {
	readonly target: TargetProfile
	readonly functions: readonly FunctionSignature[]
	readonly globals: readonly EngineGlobal[]
	lookupFunction(name: string): FunctionSignature | undefined
	lookupGlobal(name: string): EngineGlobal | undefined
	/** Names a script may not take. */
	isReservedName(name: string): boolean
	/** Spellings of an enumerated type, indexed by value. */
	enumeration(type: ValueType): readonly string[] | undefined
}

/** Expanded into `if`/`begin` by the reader, never looked up. */
const MACRO_NAMES: ReadonlySet<string> = new Set(['cond'])

function toSignature(definition: FunctionDefinition, id: number): FunctionSignature {
	const { parameters } = definition
	const firstOptional = parameters.findIndex((param) => param.optional)
	const last = parameters[parameters.length - 1]
	return {
		assignsGlobal: definition.assignsGlobal,
		id,
		inequality: definition.inequality,
		maxArguments: last?.many ? Number.POSITIVE_INFINITY : parameters.length,
		minArguments: firstOptional === -1 ? parameters.length : firstOptional,
		name: definition.name,
		numberPassthrough: definition.numberPassthrough,
		parameters,
		passthroughLast: definition.passthroughLast,
		returnType: definition.returnType,
		specialForm: definition.specialForm,
	}
}

function toGlobal(definition: GlobalDefinition, id: number): EngineGlobal {
	return { id, name: definition.name, valueType: definition.type }
}

class DefinitionTable implements BuiltinTable {
	readonly target: TargetProfile
	readonly functions: readonly FunctionSignature[]
	readonly globals: readonly EngineGlobal[]

	private readonly functionsByName: ReadonlyMap<string, FunctionSignature>
	private readonly globalsByName: ReadonlyMap<string, EngineGlobal>
	private readonly coercions: ReadonlySet<string>
	private readonly enumerations: ReadonlyMap<ValueType, readonly string[]>

	constructor(
		target: TargetProfile,
		functions: readonly FunctionSignature[],
		globals: readonly EngineGlobal[],
		coercions: readonly (readonly [ValueType, ValueType])[],
		enumerations: ReadonlyMap<ValueType, readonly string[]>
	) {
		this.target = target
		this.functions = functions
		this.globals = globals
		this.functionsByName = new Map(functions.map((fn) => [fn.name, fn]))
		this.globalsByName = new Map(globals.map((global) => [global.name, global]))
		this.coercions = new Set(coercions.map(([from, to]) => coercionKey(from, to)))
		this.enumerations = enumerations
	}

	lookupFunction(name: string): FunctionSignature | undefined {
		return this.functionsByName.get(name)
	}

	lookupGlobal(name: string): EngineGlobal | undefined {
		return this.globalsByName.get(name)
	}

	isReservedName(name: string): boolean {
		return MACRO_NAMES.has(name) || this.lookupFunction(name)?.specialForm === true
	}

	canCoerce(from: ValueType, to: ValueType): boolean {
		return this.coercions.has(coercionKey(from, to))
	}

	enumeration(type: ValueType): readonly string[] | undefined {
		return this.enumerations.get(type)
	}
}

function coercionKey(from: ValueType, to: ValueType): string {
	return `${from}>${to}`
}

/**
 * Build the table of one target from validated definitions. Functions and
 * globals without an id for the target are absent from its table.
 */
export function createBuiltinTable(definitions: Definitions, target: Target): BuiltinTable {
	const profile = definitions.targets[target]
	if (profile === undefined) {
		throw new Error(`No builtin definitions for target "${target}"`)
	}

	const functions = definitions.functions.flatMap((fn) => {
		const id = fn.engines[target]
		return id === undefined ? [] : [toSignature(fn, id)]
	})
	const globals = definitions.globals.flatMap((global) => {
		const id = global.engines[target]
		return id === undefined ? [] : [toGlobal(global, id)]
	})

	const enumerations = new Map<ValueType, readonly string[]>()
	for (const [name, values] of Object.entries(definitions.enumerations)) {
		const type = valueTypeFromName(name)
		if (type !== undefined) enumerations.set(type, values)
	}

	return new DefinitionTable(
		{
			displayName: profile.displayName,
			id: target,
			limits: profile.limits,
			maxNameLength: profile.maxNameLength,
		},
		functions,
		globals,
		profile.coercions,
		enumerations
	)
}
