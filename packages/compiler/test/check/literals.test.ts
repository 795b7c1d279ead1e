import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	LONG_MAX,
	parseBoolean,
	parseInteger,
	parseLiteral,
	parseReal,
	SHORT_MAX,
	SHORT_MIN,
} from '../../src/check/literals.ts'
import { ValueType } from '../../src/check/types.ts'
import { retail } from '../helpers/compile.ts'

describe('check/literals', () => {
	it('parses boolean spellings', () => {
		assert.deepStrictEqual(
			['1', 'true', 'on', '0', 'false', 'off', 'yes'].map(parseBoolean),
			[true, true, true, false, false, false, null]
		)
	})

	describe('parseInteger', () => {
		it('accepts signed decimal integers in range', () => {
			assert.strictEqual(parseInteger('32767', SHORT_MIN, SHORT_MAX), 32767)
			assert.strictEqual(parseInteger('-32768', SHORT_MIN, SHORT_MAX), -32768)
			assert.strictEqual(parseInteger('+5', SHORT_MIN, SHORT_MAX), 5)
		})

		it('rejects values out of range and non-integers', () => {
			assert.strictEqual(parseInteger('32768', SHORT_MIN, SHORT_MAX), null)
			assert.strictEqual(parseInteger(String(LONG_MAX + 1), SHORT_MIN, LONG_MAX), null)
			assert.strictEqual(parseInteger('1.0', SHORT_MIN, SHORT_MAX), null)
			assert.strictEqual(parseInteger('0x10', SHORT_MIN, SHORT_MAX), null)
		})

		it('folds negative zero', () => {
			assert.ok(Object.is(parseInteger('-0', SHORT_MIN, SHORT_MAX), 0))
		})
	})

	describe('parseReal', () => {
		it('rounds to single precision', () => {
			assert.strictEqual(parseReal('1.5'), 1.5)
			assert.strictEqual(parseReal('0.1'), Math.fround(0.1))
			assert.strictEqual(parseReal('.5'), 0.5)
			assert.strictEqual(parseReal('5.'), 5)
			assert.strictEqual(parseReal('-2e3'), -2000)
		})

		it('rejects text and values beyond single precision', () => {
			assert.strictEqual(parseReal('abc'), null)
			assert.strictEqual(parseReal('1e39'), null)
			assert.strictEqual(parseReal('.'), null)
		})
	})

	describe('parseLiteral', () => {
		const table = retail()

		it('encodes scalars in data', () => {
			assert.deepStrictEqual(parseLiteral('on', ValueType.Boolean, table), {
				data: { kind: 'boolean', value: true },
				text: null,
			})
			assert.deepStrictEqual(parseLiteral('7', ValueType.Short, table), { data: { kind: 'short', value: 7 }, text: null })
			assert.deepStrictEqual(parseLiteral('70000', ValueType.Long, table), {
				data: { kind: 'long', value: 70000 },
				text: null,
			})
			assert.strictEqual(parseLiteral('70000', ValueType.Short, table), null)
		})

		it('keeps the text of strings and engine objects', () => {
			assert.deepStrictEqual(parseLiteral('Hi', ValueType.String, table), { data: { kind: 'none' }, text: 'Hi' })
			assert.deepStrictEqual(parseLiteral('marines', ValueType.Ai, table), {
				data: { kind: 'none' },
				text: 'marines',
			})
		})

		it('maps enumerated spellings to their index', () => {
			assert.deepStrictEqual(parseLiteral('hard', ValueType.GameDifficulty, table), {
				data: { kind: 'short', value: 2 },
				text: null,
			})
			assert.strictEqual(parseLiteral('ultra', ValueType.GameDifficulty, table), null)
		})
	})
})
