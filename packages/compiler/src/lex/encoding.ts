/**
 * Source text decoding.
 */

import type { CompilationContext } from '../core/context.ts'
import type { SourceLocation } from '../core/source.ts'

export const SourceEncoding = {
	Utf8: 'utf-8',
	Windows1252: 'windows-1252',
} as const

export type SourceEncoding = (typeof SourceEncoding)[keyof typeof SourceEncoding]

export function isSourceEncoding(value: string): value is SourceEncoding {
	return value === SourceEncoding.Utf8 || value === SourceEncoding.Windows1252
}

/** Code points of bytes 0x80-0x9F; 0 marks the five bytes Windows-1252 leaves undefined. */
const WINDOWS_1252_HIGH = [
	0x20ac, 0, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0,
	0x017d, 0, 0, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014, 0x02dc, 0x2122, 0x0161, 0x203a,
	0x0153, 0, 0x017e, 0x0178,
]

/**
 * Offset of the first byte that does not start or continue a well-formed
 * UTF-8 sequence, or -1. Overlong forms, surrogates and code points above
 * U+10FFFF are rejected.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
	let i = 0
	while (i < bytes.length) {
		const lead = bytes[i] ?? 0
		if (lead < 0x80) {
			i++
			continue
		}

		let length: number
		let min: number
		let max = 0xbf
		if (lead >= 0xc2 && lead <= 0xdf) {
			length = 2
			min = 0x80
		} else if (lead >= 0xe0 && lead <= 0xef) {
			length = 3
			min = lead === 0xe0 ? 0xa0 : 0x80
			if (lead === 0xed) max = 0x9f
		} else if (lead >= 0xf0 && lead <= 0xf4) {
			length = 4
			min = lead === 0xf0 ? 0x90 : 0x80
			if (lead === 0xf4) max = 0x8f
		} else {
			return i
		}

		for (let k = 1; k < length; k++) {
			const byte = bytes[i + k]
			if (byte === undefined) return i
			const lo = k === 1 ? min : 0x80
			const hi = k === 1 ? max : 0xbf
			if (byte < lo || byte > hi) return i + k
		}
		i += length
	}
	return -1
}

/** Offset of the first byte Windows-1252 leaves undefined, or -1. */
export function findInvalidWindows1252(bytes: Uint8Array): number {
	for (let i = 0; i < bytes.length; i++) {
		const byte = bytes[i] ?? 0
		if (byte >= 0x80 && byte <= 0x9f && WINDOWS_1252_HIGH[byte - 0x80] === 0) return i
	}
	return -1
}

function decodeWindows1252(bytes: Uint8Array): string {
	const parts: string[] = []
	for (const byte of bytes) {
		const high = byte >= 0x80 && byte <= 0x9f ? WINDOWS_1252_HIGH[byte - 0x80] : undefined
		parts.push(String.fromCharCode(high ?? byte))
	}
	return parts.join('')
}

/**
 * Line and column of a byte offset. Columns count UTF-16 code units of the
 * decoded line up to the offset, as token columns do.
 */
export function sourceLocation(
	file: string,
	bytes: Uint8Array,
	offset: number,
	encoding: SourceEncoding
): SourceLocation {
	let line = 1
	let lineStart = 0
	for (let i = 0; i < offset; i++) {
		if (bytes[i] === 0x0a) {
			line++
			lineStart = i + 1
		}
	}
	const prefix = bytes.subarray(lineStart, offset)
	const decoded =
		encoding === SourceEncoding.Utf8
			? new TextDecoder('utf-8', { ignoreBOM: lineStart !== 0 }).decode(prefix)
			: decodeWindows1252(prefix)
	return { column: decoded.length + 1, file, line }
}

/**
 * Decode one file's bytes. A leading UTF-8 byte order mark is dropped.
 * Invalid input raises an encoding error at the offending byte.
 */
export function decodeSource(
	file: string,
	bytes: Uint8Array,
	encoding: SourceEncoding,
	context: CompilationContext
): string {
	const invalidAt =
		encoding === SourceEncoding.Utf8 ? findInvalidUtf8(bytes) : findInvalidWindows1252(bytes)

	if (invalidAt !== -1) {
		context.fail('SCNLEX001', sourceLocation(file, bytes, invalidAt, encoding), {
			byte: (bytes[invalidAt] ?? 0).toString(16).toUpperCase().padStart(2, '0'),
			encoding,
		})
	}

	if (encoding === SourceEncoding.Utf8) {
		return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
	}
	return decodeWindows1252(bytes)
}
