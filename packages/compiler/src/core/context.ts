/**
 * Compilation context shared by the phases of one load or compile call.
 * Holds the builtin table in effect and the diagnostics collected so far.
 */

import type { DefinitionPhase } from '../check/state.ts'
import type { BuiltinTable } from '../definitions/builtins.ts'
import {
	type DiagnosticArgs,
	DiagnosticCategory,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import type { NodeId } from './nodes.ts'
import { formatLocation, type SourceFile, type SourceLocation } from './source.ts'
import type { TokenId } from './tokens.ts'

export { DiagnosticCategory, DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Display name of the file */
	readonly file: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Text of the offending line, when the source was decoded */
	readonly sourceLine?: string
}

export function createDiagnostic(
	code: DiagnosticCode,
	location: SourceLocation,
	args?: DiagnosticArgs,
	sourceLine?: string
): Diagnostic {
	const def = getDiagnostic(code)
	return {
		column: location.column,
		def,
		file: location.file,
		line: location.line,
		message: interpolateMessage(def.message, args),
		...(args ? { args } : {}),
		...(sourceLine !== undefined ? { sourceLine } : {}),
	}
}

export function isWarning(diagnostic: Diagnostic): boolean {
	return diagnostic.def.severity === DiagnosticSeverity.Warning
}

/**
 * The definition being checked when a compile call failed.
 */
export interface DefinitionFailure {
	readonly definition: string
	readonly phase: DefinitionPhase
}

/**
 * Raised for every fatal input error. Carries exactly one diagnostic plus the
 * warnings recorded before it.
 */
export class CompileError extends Error {
	readonly diagnostic: Diagnostic
	readonly warnings: readonly Diagnostic[]
	readonly failure: DefinitionFailure | null

	constructor(
		diagnostic: Diagnostic,
		warnings: readonly Diagnostic[] = [],
		failure: DefinitionFailure | null = null
	) {
		super(
			`${diagnostic.file}:${diagnostic.line}:${diagnostic.column}: error[${diagnostic.def.code}]: ${diagnostic.message}`
		)
		this.name = 'CompileError'
		this.diagnostic = diagnostic
		this.warnings = warnings
		this.failure = failure
	}

	get category(): DiagnosticCategory {
		return this.diagnostic.def.category
	}

	get code(): string {
		return this.diagnostic.def.code
	}
}

// =============================================================================
// FORMATTING
// =============================================================================

function getSeverityLabel(severity: DiagnosticSeverity): string {
	const labels: Record<DiagnosticSeverity, string> = {
		[DiagnosticSeverity.Error]: 'error',
		[DiagnosticSeverity.Warning]: 'warning',
		[DiagnosticSeverity.Note]: 'note',
	}
	return labels[severity]
}

function buildSourceContext(
	diagnostic: Diagnostic,
	sourceLine: string
): { emptyPrefix: string; lines: string[] } {
	const lineNumWidth = String(diagnostic.line).length
	const pad = ' '.repeat(lineNumWidth)
	const linePrefix = ` ${diagnostic.line} | `
	const emptyPrefix = ` ${pad} | `
	const pointer = `${' '.repeat(diagnostic.column - 1)}^`

	return {
		emptyPrefix,
		lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
	}
}

/**
 * Format a diagnostic for display.
 *
 * Example:
 * ```
 * error[SCNCHECK002]: expected long, got string
 *   --> scripts/a.hsc:4:22
 *    |
 *  4 | (global long count "x")
 *    |                    ^
 *    |
 *    = help: ...
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	const { def } = diagnostic
	const header = `${getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
	const location = `  --> ${formatLocation(diagnostic)}`

	if (diagnostic.sourceLine === undefined) {
		return `${header}\n${location}`
	}

	const { emptyPrefix, lines: contextLines } = buildSourceContext(diagnostic, diagnostic.sourceLine)
	const lines = [header, location, ...contextLines]

	if (def.suggestion) {
		const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
		lines.push(emptyPrefix, `   = help: ${suggestion}`)
	}

	return lines.join('\n')
}

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * The compilation context.
 *
 * Warnings accumulate; the first fatal diagnostic is thrown as a CompileError
 * and ends the call.
 */
export class CompilationContext {
	readonly builtins: BuiltinTable

	private readonly warnings: Diagnostic[] = []

	constructor(builtins: BuiltinTable) {
		this.builtins = builtins
	}

	/** Record a warning. Never throws. */
	warn(code: DiagnosticCode, file: SourceFile, node: NodeId, args?: DiagnosticArgs): void {
		const location = file.nodeLocation(node)
		this.warnings.push(createDiagnostic(code, location, args, file.getSourceLine(location.line)))
	}

	/** Raise a fatal diagnostic at an explicit location. */
	fail(code: DiagnosticCode, location: SourceLocation, args?: DiagnosticArgs, sourceLine?: string): never {
		throw new CompileError(createDiagnostic(code, location, args, sourceLine), [...this.warnings])
	}

	failAt(code: DiagnosticCode, file: SourceFile, line: number, column: number, args?: DiagnosticArgs): never {
		return this.fail(code, file.location(line, column), args, file.getSourceLine(line))
	}

	failAtToken(code: DiagnosticCode, file: SourceFile, token: TokenId, args?: DiagnosticArgs): never {
		const location = file.tokenLocation(token)
		return this.fail(code, location, args, file.getSourceLine(location.line))
	}

	failAtNode(code: DiagnosticCode, file: SourceFile, node: NodeId, args?: DiagnosticArgs): never {
		return this.failAtToken(code, file, file.nodes.get(node).tokenId, args)
	}

	getWarnings(): readonly Diagnostic[] {
		return this.warnings
	}
}
