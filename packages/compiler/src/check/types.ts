/**
 * Value types, script types and the flattened node model.
 */

import type { SourceLocation } from '../core/source.ts'

/**
 * Engine value types. The numbers are the engine's type indices.
 */
export const ValueType = {
	ActorType: 35,
	ActorVariant: 29,
	Ai: 17,
	AiCommandList: 18,
	AiDefaultState: 34,
	AnimationGraph: 28,
	Boolean: 5,
	Conversation: 20,
	CutsceneCameraPoint: 13,
	CutsceneFlag: 12,
	CutsceneRecording: 15,
	CutsceneTitle: 14,
	Damage: 26,
	DamageEffect: 30,
	Device: 41,
	DeviceGroup: 16,
	DeviceName: 47,
	Effect: 25,
	FunctionName: 2,
	GameDifficulty: 32,
	HudCorner: 36,
	HudMessage: 22,
	Long: 8,
	LoopingSound: 27,
	Navpoint: 21,
	Object: 37,
	ObjectDefinition: 31,
	ObjectList: 23,
	ObjectName: 43,
	Passthrough: 3,
	Real: 6,
	Scenery: 42,
	SceneryName: 48,
	Script: 10,
	Short: 7,
	Sound: 24,
	SpecialForm: 1,
	StartingProfile: 19,
	String: 9,
	Team: 33,
	TriggerVolume: 11,
	Unit: 38,
	UnitName: 44,
	Unparsed: 0,
	Vehicle: 39,
	VehicleName: 45,
	Void: 4,
	Weapon: 40,
	WeaponName: 46,
} as const

export type ValueType = (typeof ValueType)[keyof typeof ValueType]

/** Source spellings, indexed by ValueType. */
const VALUE_TYPE_NAMES = [
	'unparsed',
	'special_form',
	'function_name',
	'passthrough',
	'void',
	'boolean',
	'real',
	'short',
	'long',
	'string',
	'script',
	'trigger_volume',
	'cutscene_flag',
	'cutscene_camera_point',
	'cutscene_title',
	'cutscene_recording',
	'device_group',
	'ai',
	'ai_command_list',
	'starting_profile',
	'conversation',
	'navpoint',
	'hud_message',
	'object_list',
	'sound',
	'effect',
	'damage',
	'looping_sound',
	'animation_graph',
	'actor_variant',
	'damage_effect',
	'object_definition',
	'game_difficulty',
	'team',
	'ai_default_state',
	'actor_type',
	'hud_corner',
	'object',
	'unit',
	'vehicle',
	'weapon',
	'device',
	'scenery',
	'object_name',
	'unit_name',
	'vehicle_name',
	'weapon_name',
	'device_name',
	'scenery_name',
] as const

export const ALL_VALUE_TYPES: readonly ValueType[] = Object.values(ValueType).sort((a, b) => a - b)

const typesByName: ReadonlyMap<string, ValueType> = new Map(
	ALL_VALUE_TYPES.map((type) => [VALUE_TYPE_NAMES[type], type])
)

/** Spelling used in declarations and the builtin table, e.g. `trigger_volume`. */
export function valueTypeName(type: ValueType): string {
	return VALUE_TYPE_NAMES[type]
}

/** Spelling used in messages, e.g. `trigger volume`. */
export function valueTypeDisplayName(type: ValueType): string {
	return VALUE_TYPE_NAMES[type].replaceAll('_', ' ')
}

export function valueTypeFromName(name: string): ValueType | undefined {
	return typesByName.get(name)
}

/** Types a global may hold or a parameter may name a value of. */
export function isDeclarableType(type: ValueType): boolean {
	return (
		type !== ValueType.Unparsed &&
		type !== ValueType.SpecialForm &&
		type !== ValueType.FunctionName &&
		type !== ValueType.Passthrough &&
		type !== ValueType.Void
	)
}

export function isReturnType(type: ValueType): boolean {
	return type === ValueType.Void || isDeclarableType(type)
}

/**
 * Script types, numbered as the engine stores them.
 */
export const ScriptType = {
	Continuous: 2,
	Dormant: 1,
	Startup: 0,
	Static: 3,
	Stub: 4,
} as const

export type ScriptType = (typeof ScriptType)[keyof typeof ScriptType]

const SCRIPT_TYPE_NAMES = ['startup', 'dormant', 'continuous', 'static', 'stub'] as const

const scriptTypesByName: ReadonlyMap<string, ScriptType> = new Map(
	Object.values(ScriptType).map((type) => [SCRIPT_TYPE_NAMES[type], type])
)

export function scriptTypeName(type: ScriptType): string {
	return SCRIPT_TYPE_NAMES[type]
}

export function scriptTypeFromName(name: string): ScriptType | undefined {
	return scriptTypesByName.get(name)
}

/**
 * Flattened node kinds.
 */
export const NodeKind = {
	FunctionCall: 2,
	GlobalRef: 1,
	Primitive: 0,
	ScriptCall: 3,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

/**
 * Index into the flattened node array.
 */
export type NodeIndex = number & { readonly __brand: 'NodeIndex' }

export function nodeIndex(n: number): NodeIndex {
	return n as NodeIndex
}

/** "No sibling" / "no children". */
export const NO_NODE = nodeIndex(0xffffffff)

/**
 * Node payload. Calls point at their first argument, global references carry
 * their slot or table id, literals carry their decoded value.
 */
export type NodeData =
	| { readonly kind: 'node'; readonly index: NodeIndex }
	| { readonly kind: 'boolean'; readonly value: boolean }
	| { readonly kind: 'short'; readonly value: number }
	| { readonly kind: 'long'; readonly value: number }
	| { readonly kind: 'real'; readonly value: number }
	| { readonly kind: 'none' }

export interface CompiledNode {
	readonly location: SourceLocation
	readonly valueType: ValueType
	readonly kind: NodeKind
	readonly data: NodeData
	/** Identifier or literal text; null when the value is fully encoded in data */
	readonly text: string | null
	/** 16-bit target-local id for global references and calls, null for literals */
	readonly id: number | null
	/** The id indexes the target's builtin table rather than this unit */
	readonly external: boolean
	readonly next: NodeIndex
}

export interface CompiledScript {
	readonly name: string
	readonly location: SourceLocation
	readonly scriptType: ScriptType
	readonly returnType: ValueType
	readonly firstNode: NodeIndex
}

export interface CompiledGlobal {
	readonly name: string
	readonly location: SourceLocation
	readonly valueType: ValueType
	readonly firstNode: NodeIndex
}
