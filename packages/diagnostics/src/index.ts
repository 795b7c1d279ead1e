/**
 * @scenarioc/diagnostics
 *
 * Shared diagnostic types and definitions for the scenarioc packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	SCNCLI001,
	SCNCLI002,
	SCNCLI003,
	SCNCLI004,
	SCNCLI005,
	SCNCLI006,
	SCNCLI007,
} from './cli.ts'
export { COMPILER_DIAGNOSTICS, type CompilerDiagnosticCode } from './compiler.ts'
export { formatCatalogMessage, interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	DiagnosticCategory,
	type DiagnosticDef,
	DiagnosticSeverity,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
