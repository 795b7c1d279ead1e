/**
 * Literal parsing against an expected value type.
 */

import type { BuiltinTable } from '../definitions/builtins.ts'
import { type NodeData, ValueType } from './types.ts'

export interface ParsedLiteral {
	readonly data: NodeData
	/** Null when the value is fully encoded in data */
	readonly text: string | null
}

const TRUE_SPELLINGS: ReadonlySet<string> = new Set(['1', 'true', 'on'])
const FALSE_SPELLINGS: ReadonlySet<string> = new Set(['0', 'false', 'off'])

const INTEGER_PATTERN = /^[+-]?\d+$/
const REAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i

export const SHORT_MIN = -32768
export const SHORT_MAX = 32767
export const LONG_MIN = -2147483648
export const LONG_MAX = 2147483647

export function parseBoolean(text: string): boolean | null {
	if (TRUE_SPELLINGS.has(text)) return true
	if (FALSE_SPELLINGS.has(text)) return false
	return null
}

export function parseInteger(text: string, min: number, max: number): number | null {
	if (!INTEGER_PATTERN.test(text)) return null
	// +0 folds negative zero
	const value = Number(text) + 0
	return value >= min && value <= max ? value : null
}

/** Decimal text rounded to single precision. */
export function parseReal(text: string): number | null {
	if (!REAL_PATTERN.test(text)) return null
	const value = Math.fround(Number(text)) + 0
	return Number.isFinite(value) ? value : null
}

/**
 * Parse literal text as `type`. Returns null when the text is not a value of
 * that type. Script literals name unit scripts and are resolved by the checker.
 */
export function parseLiteral(
	text: string,
	type: ValueType,
	builtins: Pick<BuiltinTable, 'enumeration'>
): ParsedLiteral | null {
	switch (type) {
		case ValueType.Boolean: {
			const value = parseBoolean(text)
			return value === null ? null : { data: { kind: 'boolean', value }, text: null }
		}
		case ValueType.Short: {
			const value = parseInteger(text, SHORT_MIN, SHORT_MAX)
			return value === null ? null : { data: { kind: 'short', value }, text: null }
		}
		case ValueType.Long: {
			const value = parseInteger(text, LONG_MIN, LONG_MAX)
			return value === null ? null : { data: { kind: 'long', value }, text: null }
		}
		case ValueType.Real: {
			const value = parseReal(text)
			return value === null ? null : { data: { kind: 'real', value }, text: null }
		}
		case ValueType.String:
			return { data: { kind: 'none' }, text }
		default: {
			const spellings = builtins.enumeration(type)
			if (spellings === undefined) {
				return { data: { kind: 'none' }, text }
			}
			const index = spellings.indexOf(text)
			return index === -1 ? null : { data: { kind: 'short', value: index }, text: null }
		}
	}
}
