/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic categories. Every fatal category aborts the compile call that raised it;
 * the two warning categories never alter compiled output.
 */
export const DiagnosticCategory = {
	ArityError: 'ArityError',
	DuplicateDefinitionError: 'DuplicateDefinitionError',
	EncodingError: 'EncodingError',
	IdentifierSpaceExhaustedError: 'IdentifierSpaceExhaustedError',
	LiteralFormatError: 'LiteralFormatError',
	SyntaxError: 'SyntaxError',
	TypeMismatchError: 'TypeMismatchError',
	UninitializedGlobalWarning: 'UninitializedGlobalWarning',
	UnknownIdentifierError: 'UnknownIdentifierError',
	UnusedDefinitionWarning: 'UnusedDefinitionWarning',
	UsageError: 'UsageError',
} as const

export type DiagnosticCategory = (typeof DiagnosticCategory)[keyof typeof DiagnosticCategory]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly category: DiagnosticCategory
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
