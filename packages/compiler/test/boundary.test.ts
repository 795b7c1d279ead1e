import assert from 'node:assert'
import { describe, it } from 'node:test'
import { getGlobals, getNodes, getScripts, getWarnings } from '../src/boundary.ts'
import type { CompiledGlobal, CompiledNode, CompiledScript } from '../src/check/types.ts'
import type { Diagnostic } from '../src/core/context.ts'
import { compileText } from './helpers/compile.ts'

describe('boundary', () => {
	const data = compileText('(global short s 1)\n(global short spare 2)\n(script startup m (sleep s))')

	it('reports counts without a buffer', () => {
		assert.deepStrictEqual([getNodes(data), getScripts(data), getGlobals(data), getWarnings(data)], [4, 1, 2, 1])
	})

	it('fills a buffer of exactly the count', () => {
		const nodes = new Array<CompiledNode>(getNodes(data))
		assert.strictEqual(getNodes(data, nodes), 4)
		assert.deepStrictEqual(nodes, [...data.nodes])

		const scripts = new Array<CompiledScript>(getScripts(data))
		getScripts(data, scripts)
		assert.deepStrictEqual(scripts, [...data.scripts])

		const globals = new Array<CompiledGlobal>(getGlobals(data))
		getGlobals(data, globals)
		assert.deepStrictEqual(
			globals.map((global) => global.name),
			['s', 'spare']
		)

		const warnings = new Array<Diagnostic>(getWarnings(data))
		getWarnings(data, warnings)
		assert.deepStrictEqual(
			warnings.map((warning) => warning.message),
			['global "spare" is never used']
		)
	})

	it('fills the front of a larger buffer', () => {
		const scripts = new Array<CompiledScript>(3)
		assert.strictEqual(getScripts(data, scripts), 1)
		assert.strictEqual(scripts.length, 3)
		assert.strictEqual(scripts[0], data.scripts[0])
		assert.strictEqual(scripts[1], undefined)
	})

	it('rejects a buffer that is too small and leaves it untouched', () => {
		const nodes: CompiledNode[] = []
		assert.throws(() => getNodes(data, nodes), {
			message: 'node buffer holds 0 entries, 4 needed',
			name: 'RangeError',
		})
		assert.deepStrictEqual(nodes, [])
	})
})
