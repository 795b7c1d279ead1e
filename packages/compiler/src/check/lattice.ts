/**
 * Implicit conversions between value types.
 */

import { ValueType } from './types.ts'

/**
 * The object subtype lattice, as a closed classification: each type maps to its
 * ancestors, nearest first.
 */
export function ancestorsOf(type: ValueType): readonly ValueType[] {
	switch (type) {
		case ValueType.Unit:
		case ValueType.Vehicle:
		case ValueType.Weapon:
		case ValueType.Device:
		case ValueType.Scenery:
		case ValueType.ObjectName:
			return [ValueType.Object]
		case ValueType.UnitName:
			return [ValueType.Unit, ValueType.Object]
		case ValueType.VehicleName:
			return [ValueType.Vehicle, ValueType.Object]
		case ValueType.WeaponName:
			return [ValueType.Weapon, ValueType.Object]
		case ValueType.DeviceName:
			return [ValueType.Device, ValueType.Object]
		case ValueType.SceneryName:
			return [ValueType.Scenery, ValueType.Object]
		default:
			return []
	}
}

/**
 * Scalar widening supplied with the target's builtin table.
 */
export interface CoercionTable {
	canCoerce(from: ValueType, to: ValueType): boolean
}

/**
 * Whether a value of type `from` is accepted where `to` is expected.
 * Passthrough and void accept anything; narrowing is never implicit.
 */
export function canConvert(from: ValueType, to: ValueType, coercions: CoercionTable): boolean {
	if (from === to) return true
	if (to === ValueType.Passthrough || to === ValueType.Void) return true
	if (ancestorsOf(from).includes(to)) return true
	return coercions.canCoerce(from, to)
}

export function isNumeric(type: ValueType, coercions: CoercionTable): boolean {
	return canConvert(type, ValueType.Real, coercions)
}

/** Types the ordering comparisons accept. */
export function isComparable(type: ValueType, coercions: CoercionTable): boolean {
	return isNumeric(type, coercions) || type === ValueType.GameDifficulty || type === ValueType.Team
}
