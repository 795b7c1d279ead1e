import type { CompilationContext } from '../core/context.ts'
import type { SourceFile } from '../core/source.ts'
import { type TokenId, TokenKind } from '../core/tokens.ts'

export interface TokenizeResult {
	readonly tokenCount: number
}

interface TokenizerState {
	readonly file: SourceFile
	readonly context: CompilationContext
	pos: number
	line: number
	column: number
	/** Unclosed left parentheses, innermost last */
	readonly open: TokenId[]
}

function isWhitespace(char: string): boolean {
	return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v'
}

function isDelimiter(char: string): boolean {
	return isWhitespace(char) || char === '(' || char === ')' || char === ';'
}

function advance(state: TokenizerState, count = 1): void {
	const { text } = state.file
	for (let i = 0; i < count && state.pos < text.length; i++) {
		if (text.charAt(state.pos) === '\n') {
			state.line++
			state.column = 1
		} else {
			state.column++
		}
		state.pos++
	}
}

function skipLineComment(state: TokenizerState): void {
	const { text } = state.file
	while (state.pos < text.length && text.charAt(state.pos) !== '\n') {
		advance(state)
	}
}

/**
 * `;*` opens a block comment closed by the next `*;`, whose `*` may be the
 * opener's own. Unterminated ones run to end of file.
 */
function skipBlockComment(state: TokenizerState): void {
	const { text } = state.file
	const end = text.indexOf('*;', state.pos + 1)
	advance(state, end === -1 ? text.length - state.pos : end + 2 - state.pos)
}

function addTextToken(
	state: TokenizerState,
	kind: typeof TokenKind.Atom | typeof TokenKind.String,
	value: string,
	line: number,
	column: number
): void {
	if (state.open.length === 0) {
		const found = kind === TokenKind.String ? `"${value}"` : value
		state.context.failAt('SCNLEX005', state.file, line, column, { found })
	}
	state.file.tokens.add({ column, kind, line, payload: state.file.strings.intern(value) })
}

function readString(state: TokenizerState): void {
	const { text } = state.file
	const line = state.line
	const column = state.column
	const close = text.indexOf('"', state.pos + 1)
	if (close === -1) {
		state.context.failAt('SCNLEX002', state.file, line, column)
	}
	const value = text.slice(state.pos + 1, close)
	advance(state, close + 1 - state.pos)
	addTextToken(state, TokenKind.String, value, line, column)
}

function readAtom(state: TokenizerState): void {
	const { text } = state.file
	const line = state.line
	const column = state.column
	const start = state.pos
	let end = start
	while (end < text.length && !isDelimiter(text.charAt(end))) {
		end++
	}
	advance(state, end - start)
	addTextToken(state, TokenKind.Atom, text.slice(start, end), line, column)
}

function readParen(state: TokenizerState, char: string): void {
	const { file } = state
	if (char === '(') {
		const id = file.tokens.add({ column: state.column, kind: TokenKind.LeftParen, line: state.line, payload: 0 })
		state.open.push(id)
	} else {
		if (state.open.pop() === undefined) {
			state.context.failAt('SCNLEX003', file, state.line, state.column)
		}
		file.tokens.add({ column: state.column, kind: TokenKind.RightParen, line: state.line, payload: 0 })
	}
	advance(state)
}

/**
 * Split a decoded file into parentheses, atoms and quoted strings.
 * Comments are discarded. Parentheses must balance and every atom or string
 * must sit inside a list.
 */
export function tokenize(file: SourceFile, context: CompilationContext): TokenizeResult {
	const state: TokenizerState = { column: 1, context, file, line: 1, open: [], pos: 0 }
	const { text } = file

	while (state.pos < text.length) {
		const char = text.charAt(state.pos)
		if (isWhitespace(char)) {
			advance(state)
		} else if (char === ';') {
			if (text.charAt(state.pos + 1) === '*') skipBlockComment(state)
			else skipLineComment(state)
		} else if (char === '(' || char === ')') {
			readParen(state, char)
		} else if (char === '"') {
			readString(state)
		} else {
			readAtom(state)
		}
	}

	const unclosed = state.open[state.open.length - 1]
	if (unclosed !== undefined) {
		context.failAtToken('SCNLEX004', file, unclosed)
	}

	file.tokens.add({ column: state.column, kind: TokenKind.Eof, line: state.line, payload: 0 })
	return { tokenCount: file.tokens.count() }
}
