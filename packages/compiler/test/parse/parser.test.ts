import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FormKind } from '../../src/core/nodes.ts'
import { SourceFile } from '../../src/core/source.ts'
import { TokenKind } from '../../src/core/tokens.ts'
import { parse } from '../../src/parse/parser.ts'
import { createContext, expectCompileError, read } from '../helpers/compile.ts'
import { showRoots } from '../helpers/forms.ts'

describe('parse/parser', () => {
	it('stores forms in postorder', () => {
		const file = read('(a (b c) "s")', { expand: false })
		const nodes = [...file.nodes].map(([, node]) => [node.kind, node.subtreeSize])
		assert.deepStrictEqual(nodes, [
			[FormKind.Atom, 1],
			[FormKind.Atom, 1],
			[FormKind.Atom, 1],
			[FormKind.List, 3],
			[FormKind.String, 1],
			[FormKind.List, 6],
		])
		assert.deepStrictEqual(file.roots, [5])
	})

	it('stores the direct child count of lists', () => {
		const file = read('(a (b c) "s")', { expand: false })
		assert.strictEqual(file.nodes.get(file.roots[0]!).payload, 3)
		assert.deepStrictEqual(file.nodes.children(file.roots[0]!), [0, 3, 4])
	})

	it('returns every top-level form as a root', () => {
		const file = read('(a) (b)\n()', { expand: false })
		assert.deepStrictEqual(file.roots, [1, 3, 4])
		assert.deepStrictEqual(showRoots(file), ['(a)', '(b)', '()'])
	})

	it('points lists at their opening parenthesis', () => {
		const file = read('(script startup main\n  (print "x"))', { expand: false })
		const [, , , body] = file.nodes.children(file.roots[0]!)
		assert.deepStrictEqual(file.nodeLocation(body!), { column: 3, file: 'test.hsc', line: 2 })
	})

	it('accepts an empty file', () => {
		assert.deepStrictEqual(read('; nothing here\n', { expand: false }).roots, [])
	})

	it('reports a token stream the grammar rejects', () => {
		const file = new SourceFile('test.hsc', ')')
		file.tokens.add({ column: 1, kind: TokenKind.RightParen, line: 1, payload: 0 })
		file.tokens.add({ column: 2, kind: TokenKind.Eof, line: 1, payload: 0 })
		const error = expectCompileError(() => parse(file, createContext()))
		assert.strictEqual(error.code, 'SCNPARSE001')
		assert.strictEqual(error.diagnostic.column, 1)
	})

	it('parses every tokenized file', () => {
		assert.strictEqual(read('(a (b) "c")', { expand: false }).roots.length, 1)
	})
})
