import { describe, it } from 'node:test'
import fc from 'fast-check'
import { CompileError } from '../../src/core/context.ts'
import { SourceFile } from '../../src/core/source.ts'
import { TokenKind } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { createContext } from '../helpers/compile.ts'

const atom = fc.stringMatching(/^[a-z_][a-z0-9_]{0,8}$/)

function tokenizeText(text: string): SourceFile {
	const file = new SourceFile('p.hsc', text)
	tokenize(file, createContext())
	return file
}

describe('lex/tokenizer properties', () => {
	describe('safety properties', () => {
		it('only ever fails with a lexical diagnostic', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					try {
						tokenizeText(input)
						return true
					} catch (error) {
						return error instanceof CompileError && error.code.startsWith('SCNLEX')
					}
				}),
				{ numRuns: 1000 }
			)
		})

		it('final token is always EOF', () => {
			fc.assert(
				fc.property(fc.array(atom), (atoms) => {
					const file = tokenizeText(`(${atoms.join(' ')})`)
					const last = [...file.tokens].pop()
					return last !== undefined && last[1].kind === TokenKind.Eof
				})
			)
		})
	})

	describe('structure properties', () => {
		it('one token per atom plus the parentheses and Eof', () => {
			fc.assert(
				fc.property(fc.array(atom), (atoms) => {
					const file = tokenizeText(`(${atoms.join(' ')})`)
					return file.tokens.count() === atoms.length + 3
				})
			)
		})

		it('comments never produce tokens', () => {
			fc.assert(
				fc.property(fc.array(atom, { minLength: 1 }), fc.stringMatching(/^[^\n*]*$/), (atoms, comment) => {
					const plain = tokenizeText(`(${atoms.join(' ')})`)
					const commented = tokenizeText(`(${atoms.join(` ;${comment}\n`)})`)
					return plain.tokens.count() === commented.tokens.count()
				})
			)
		})
	})

	describe('determinism properties', () => {
		it('same input always produces same token sequence', () => {
			fc.assert(
				fc.property(fc.array(atom), (atoms) => {
					const text = `(${atoms.join('\n')})`
					const a = [...tokenizeText(text).tokens].map(([, token]) => token)
					const b = [...tokenizeText(text).tokens].map(([, token]) => token)
					return JSON.stringify(a) === JSON.stringify(b)
				})
			)
		})
	})
})
