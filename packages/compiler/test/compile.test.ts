import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ScriptType } from '../src/check/types.ts'
import { compile, ScriptCompiler } from '../src/compiler.ts'
import { Target } from '../src/definitions/schema.ts'
import { SourceEncoding } from '../src/lex/encoding.ts'
import { compileText, compileWith, expectCompileError } from './helpers/compile.ts'
import { retailWithLimits } from './helpers/definitions.ts'
import { scriptBody } from './helpers/nodes.ts'

const encoder = new TextEncoder()

describe('compile', () => {
	describe('ScriptCompiler', () => {
		it('queues loaded files until compiled', () => {
			const compiler = new ScriptCompiler({ target: Target.Retail })
			compiler.loadSource('a.hsc', encoder.encode('(global short s 1)'))
			compiler.loadSource('b.hsc', encoder.encode('(script startup m (sleep s))'))
			assert.deepStrictEqual(compiler.pendingFiles, ['a.hsc', 'b.hsc'])

			const data = compiler.compile()
			assert.deepStrictEqual(data.files, ['a.hsc', 'b.hsc'])
			assert.deepStrictEqual(scriptBody(data, 'm'), ['(sleep:void s:short)'])
			assert.deepStrictEqual(compiler.pendingFiles, [])
		})

		it('leaves the unit untouched when a file fails to load', () => {
			const compiler = new ScriptCompiler({ target: Target.Retail })
			compiler.loadSource('a.hsc', encoder.encode('(script startup m (sleep 1))'))
			const error = expectCompileError(() => compiler.loadSource('b.hsc', encoder.encode('(script startup n')))
			assert.strictEqual(error.code, 'SCNLEX004')
			assert.strictEqual(error.diagnostic.file, 'b.hsc')
			assert.deepStrictEqual(compiler.pendingFiles, ['a.hsc'])
			assert.strictEqual(compiler.compile().scripts.length, 1)
		})

		it('empties the unit when compiling fails', () => {
			const compiler = new ScriptCompiler({ target: Target.Retail })
			compiler.loadSource('a.hsc', encoder.encode('(script startup m (fly))'))
			assert.strictEqual(expectCompileError(() => compiler.compile()).code, 'SCNRES001')
			assert.deepStrictEqual(compiler.pendingFiles, [])

			const empty = compiler.compile()
			assert.deepStrictEqual([empty.files, empty.nodes, empty.scripts, empty.globals], [[], [], [], []])
		})

		it('decodes with the configured encoding', () => {
			const bytes = Uint8Array.from([...encoder.encode('(script startup m (print "caf'), 0xe9, ...encoder.encode('"))')])

			const compiler = new ScriptCompiler({ encoding: SourceEncoding.Windows1252, target: Target.Retail })
			compiler.loadSource('a.hsc', bytes)
			assert.deepStrictEqual(scriptBody(compiler.compile(), 'm'), ['(print:void "café":string)'])

			const strict = new ScriptCompiler({ target: Target.Retail })
			assert.strictEqual(strict.encoding, SourceEncoding.Utf8)
			assert.strictEqual(expectCompileError(() => strict.loadSource('a.hsc', bytes)).code, 'SCNLEX001')
		})

		it('uses injected builtins', () => {
			const builtins = retailWithLimits({ scripts: 1 })
			const error = expectCompileError(() =>
				compileWith(builtins, '(script startup a (sleep 1))\n(script startup b (sleep 1))')
			)
			assert.strictEqual(error.code, 'SCNRES005')
			assert.strictEqual(error.diagnostic.message, 'too many scripts: 2 exceeds the limit of 1')
		})
	})

	it('merges declarations across files', () => {
		const data = compile(
			[
				{ content: '(script stub void f (sleep 1))\n(script startup m (f))', name: 'a.hsc' },
				{ content: '(script static void f (game_won))', name: 'b.hsc' },
			],
			{ target: Target.Retail }
		)
		assert.deepStrictEqual(
			data.scripts.map((script) => [script.name, script.scriptType, script.location.file]),
			[
				['m', ScriptType.Startup, 'a.hsc'],
				['f', ScriptType.Static, 'b.hsc'],
			]
		)
		assert.deepStrictEqual(scriptBody(data, 'f'), ['(game_won:void)'])
		assert.deepStrictEqual(scriptBody(data, 'm'), ['(f:void)'])
	})

	it('reports duplicates at the later file', () => {
		const error = expectCompileError(() =>
			compile(
				[
					{ content: '(script startup m (sleep 1))', name: 'a.hsc' },
					{ content: '(script startup m (sleep 2))', name: 'b.hsc' },
				],
				{ target: Target.Retail }
			)
		)
		assert.strictEqual(error.code, 'SCNDEF001')
		assert.strictEqual(error.diagnostic.file, 'b.hsc')
		assert.strictEqual(error.diagnostic.message, 'script "m" is already defined at a.hsc:1:17')
	})

	it('numbers builtins for the chosen target', () => {
		const text = '(script startup m (ai_place marines))'
		const retail = compileText(text, Target.Retail)
		const demo = compileText(text, Target.RetailDemo)
		assert.deepStrictEqual([retail.target, retail.nodes[0]?.id], [Target.Retail, 30])
		assert.deepStrictEqual([demo.target, demo.nodes[0]?.id], [Target.RetailDemo, 29])
	})

	it('rejects builtins the target lacks', () => {
		const error = expectCompileError(() => compileText('(script startup m (map_name "a"))', Target.ConsoleNtsc))
		assert.strictEqual(error.code, 'SCNRES001')
	})

	it('returns the warnings of a successful compile', () => {
		const data = compileText('(global short unused 1)\n(script startup m (sleep 1))')
		assert.deepStrictEqual(
			data.warnings.map((warning) => warning.message),
			['global "unused" is never used']
		)
	})

	it('is deterministic', () => {
		const text = '(global real r 2)\n(script dormant d (sleep 1))\n(script startup m (wake d) (set r (+ r 1)))'
		assert.deepStrictEqual(compileText(text), compileText(text))
	})
})
