/**
 * CLI diagnostic definitions.
 *
 * Error code format: SCNCLI<NUMBER>
 * - SCNCLI: CLI errors (001-099)
 */

import { DiagnosticCategory, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SCNCLI001-099)
// =============================================================================

export const SCNCLI001: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI001',
	description: 'There is no file at this path.',
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SCNCLI002: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI002',
	description: 'The file exists but cannot be opened.',
	message: 'cannot read file {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SCNCLI003: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI003',
	description: 'The compiled output could not be saved.',
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const SCNCLI004: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI004',
	description: 'The builtin definitions have no target with this name.',
	message: 'unknown target "{target}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of: {targets}.',
}

export const SCNCLI005: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI005',
	description: 'Sources are read as UTF-8 or Windows-1252.',
	message: 'unknown encoding "{encoding}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--encoding utf-8` or `--encoding windows-1252`.',
}

export const SCNCLI006: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI006',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source files, or report this if it seems like a bug.',
}

export const SCNCLI007: DiagnosticDef = {
	category: DiagnosticCategory.UsageError,
	code: 'SCNCLI007',
	description: 'The build command needs at least one source file.',
	message: 'no input files',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass one or more .hsc files: `scenarioc build a.hsc b.hsc`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SCNCLI001,
	SCNCLI002,
	SCNCLI003,
	SCNCLI004,
	SCNCLI005,
	SCNCLI006,
	SCNCLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
