import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompileError } from '../../src/core/context.ts'
import {
	decodeSource,
	findInvalidUtf8,
	findInvalidWindows1252,
	isSourceEncoding,
	SourceEncoding,
	sourceLocation,
} from '../../src/lex/encoding.ts'
import { createContext, expectCompileError } from '../helpers/compile.ts'

function bytes(...values: number[]): Uint8Array {
	return Uint8Array.from(values)
}

describe('lex/encoding', () => {
	it('recognizes the supported encodings', () => {
		assert.strictEqual(isSourceEncoding('utf-8'), true)
		assert.strictEqual(isSourceEncoding('windows-1252'), true)
		assert.strictEqual(isSourceEncoding('latin1'), false)
	})

	describe('findInvalidUtf8', () => {
		it('accepts well-formed text', () => {
			assert.strictEqual(findInvalidUtf8(new TextEncoder().encode('(print "héllo €")')), -1)
		})

		it('reports a stray continuation byte', () => {
			assert.strictEqual(findInvalidUtf8(bytes(0x61, 0x80)), 1)
		})

		it('reports a truncated sequence at its lead byte', () => {
			assert.strictEqual(findInvalidUtf8(bytes(0x61, 0xc3)), 1)
		})

		it('reports the continuation byte that breaks a sequence', () => {
			assert.strictEqual(findInvalidUtf8(bytes(0xc3, 0x28)), 1)
		})

		it('rejects overlong forms and surrogates', () => {
			assert.strictEqual(findInvalidUtf8(bytes(0xc0, 0xaf)), 0)
			assert.strictEqual(findInvalidUtf8(bytes(0xe0, 0x80, 0xaf)), 1)
			assert.strictEqual(findInvalidUtf8(bytes(0xed, 0xa0, 0x80)), 1)
		})
	})

	describe('findInvalidWindows1252', () => {
		it('reports the undefined bytes only', () => {
			assert.strictEqual(findInvalidWindows1252(bytes(0x80, 0xe9, 0x9f)), -1)
			for (const byte of [0x81, 0x8d, 0x8f, 0x90, 0x9d]) {
				assert.strictEqual(findInvalidWindows1252(bytes(0x41, byte)), 1)
			}
		})
	})

	describe('sourceLocation', () => {
		it('locates byte offsets by line and column', () => {
			assert.deepStrictEqual(sourceLocation('a.hsc', bytes(0x28, 0x0a, 0x61, 0xff), 3, SourceEncoding.Utf8), {
				column: 2,
				file: 'a.hsc',
				line: 2,
			})
		})

		it('counts decoded characters before the offset, as tokens do', () => {
			const utf8 = bytes(0x28, 0x22, 0xc3, 0xa9, 0xff, 0x22, 0x29)
			assert.strictEqual(sourceLocation('a.hsc', utf8, 4, SourceEncoding.Utf8).column, 4)
			const windows = bytes(0x28, 0x22, 0xe9, 0x81)
			assert.strictEqual(sourceLocation('a.hsc', windows, 3, SourceEncoding.Windows1252).column, 4)
		})

		it('skips a leading byte order mark', () => {
			assert.strictEqual(sourceLocation('a.hsc', bytes(0xef, 0xbb, 0xbf, 0x28, 0xff), 4, SourceEncoding.Utf8).column, 2)
		})
	})

	describe('decodeSource', () => {
		it('decodes UTF-8 and drops the byte order mark', () => {
			const text = decodeSource('a.hsc', bytes(0xef, 0xbb, 0xbf, 0x28, 0x61, 0x29), SourceEncoding.Utf8, createContext())
			assert.strictEqual(text, '(a)')
		})

		it('decodes Windows-1252 high bytes', () => {
			const text = decodeSource('a.hsc', bytes(0x22, 0x80, 0xe9, 0x22), SourceEncoding.Windows1252, createContext())
			assert.strictEqual(text, '"€é"')
		})

		it('raises an encoding error at the offending byte', () => {
			const error = expectCompileError(() =>
				decodeSource('a.hsc', bytes(0x28, 0x0a, 0x61, 0xff, 0x29), SourceEncoding.Utf8, createContext())
			)
			assert.ok(error instanceof CompileError)
			assert.strictEqual(error.code, 'SCNLEX001')
			assert.strictEqual(error.diagnostic.message, 'invalid utf-8 byte 0xFF')
			assert.strictEqual(error.diagnostic.line, 2)
			assert.strictEqual(error.diagnostic.column, 2)
		})

		it('counts the column in characters after non-ASCII text', () => {
			const error = expectCompileError(() =>
				decodeSource('a.hsc', bytes(0x28, 0x22, 0xc3, 0xa9, 0xff, 0x22, 0x29), SourceEncoding.Utf8, createContext())
			)
			assert.strictEqual(error.diagnostic.column, 4)
		})

		it('rejects undefined Windows-1252 bytes', () => {
			const error = expectCompileError(() =>
				decodeSource('a.hsc', bytes(0x28, 0x8d, 0x29), SourceEncoding.Windows1252, createContext())
			)
			assert.strictEqual(error.diagnostic.message, 'invalid windows-1252 byte 0x8D')
			assert.strictEqual(error.diagnostic.column, 2)
		})
	})
})
