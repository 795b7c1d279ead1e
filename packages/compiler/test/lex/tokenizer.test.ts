import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SourceFile, stringId } from '../../src/core/source.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { createContext, expectCompileError } from '../helpers/compile.ts'

function lex(text: string): SourceFile {
	const file = new SourceFile('test.hsc', text)
	tokenize(file, createContext())
	return file
}

function tokens(file: SourceFile): Token[] {
	return [...file.tokens].map(([, token]) => token)
}

function kinds(text: string): number[] {
	return tokens(lex(text)).map((token) => token.kind)
}

function texts(file: SourceFile): string[] {
	return tokens(file)
		.filter((token) => token.kind === TokenKind.Atom || token.kind === TokenKind.String)
		.map((token) => file.strings.get(stringId(token.payload)))
}

describe('lex/tokenizer', () => {
	describe('tokens', () => {
		it('should split parentheses, atoms and strings', () => {
			const file = lex('(print "Hi")')
			assert.deepStrictEqual(
				tokens(file).map((token) => [token.kind, token.column]),
				[
					[TokenKind.LeftParen, 1],
					[TokenKind.Atom, 2],
					[TokenKind.String, 8],
					[TokenKind.RightParen, 12],
					[TokenKind.Eof, 13],
				]
			)
			assert.deepStrictEqual(texts(file), ['print', 'Hi'])
		})

		it('should end atoms at parentheses and semicolons', () => {
			assert.deepStrictEqual(texts(lex('(a(b)c;d\n)')), ['a', 'b', 'c'])
		})

		it('should keep atoms containing operators and signs', () => {
			assert.deepStrictEqual(texts(lex('(>= -1.5 x)')), ['>=', '-1.5', 'x'])
		})

		it('should let strings span lines', () => {
			const file = lex('(print "a\nb")')
			assert.deepStrictEqual(texts(file), ['a\nb'])
			const close = tokens(file)[3]!
			assert.strictEqual(close.line, 2)
			assert.strictEqual(close.column, 3)
		})

		it('should end with Eof for empty input', () => {
			assert.deepStrictEqual(kinds(''), [TokenKind.Eof])
		})
	})

	describe('comments', () => {
		it('should skip line and block comments', () => {
			const file = lex('; line\n(a ;* block\n *; b)')
			assert.deepStrictEqual(texts(file), ['a', 'b'])
			const b = tokens(file)[2]!
			assert.strictEqual(b.line, 3)
			assert.strictEqual(b.column, 5)
		})

		it('should close a block comment on the asterisk that opened it', () => {
			const file = lex(';*;\n(script startup m (sleep 1))')
			assert.deepStrictEqual(texts(file), ['script', 'startup', 'm', 'sleep', '1'])
			assert.strictEqual(tokens(file)[0]!.line, 2)
		})

		it('should run an unterminated block comment to end of file', () => {
			assert.deepStrictEqual(kinds('(a) ;* never closed )'), [
				TokenKind.LeftParen,
				TokenKind.Atom,
				TokenKind.RightParen,
				TokenKind.Eof,
			])
		})
	})

	describe('positions', () => {
		it('should count columns in UTF-16 units', () => {
			const file = lex('(é ab)')
			assert.strictEqual(tokens(file)[2]!.column, 4)
		})

		it('should treat CRLF as one line break', () => {
			const file = lex('(a\r\n b)')
			const b = tokens(file)[2]!
			assert.strictEqual(b.line, 2)
			assert.strictEqual(b.column, 2)
		})
	})

	describe('errors', () => {
		it('should report an unterminated string at its quote', () => {
			const error = expectCompileError(() => lex('(print "oops)'))
			assert.strictEqual(error.code, 'SCNLEX002')
			assert.strictEqual(error.diagnostic.column, 8)
		})

		it('should report a stray right parenthesis', () => {
			const error = expectCompileError(() => lex('(a))'))
			assert.strictEqual(error.code, 'SCNLEX003')
			assert.strictEqual(error.diagnostic.column, 4)
		})

		it('should report the innermost unclosed parenthesis', () => {
			const error = expectCompileError(() => lex('(a (b)\n(c'))
			assert.strictEqual(error.code, 'SCNLEX004')
			assert.strictEqual(error.diagnostic.line, 2)
			assert.strictEqual(error.diagnostic.column, 1)
		})

		it('should reject atoms outside a list', () => {
			const error = expectCompileError(() => lex('foo (a)'))
			assert.strictEqual(error.code, 'SCNLEX005')
			assert.strictEqual(error.diagnostic.message, 'expected left parenthesis, got "foo" instead')
		})

		it('should reject strings outside a list', () => {
			const error = expectCompileError(() => lex('(a)\n"x"'))
			assert.strictEqual(error.code, 'SCNLEX005')
			assert.deepStrictEqual(error.diagnostic.args, { found: '"x"' })
			assert.strictEqual(error.diagnostic.line, 2)
		})
	})
})
