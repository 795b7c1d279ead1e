/**
 * Re-export diagnostic types and compiler definitions from shared package.
 */

import { COMPILER_DIAGNOSTICS } from '@scenarioc/diagnostics'

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	DiagnosticCategory,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@scenarioc/diagnostics'

/**
 * All valid diagnostic codes for the compiler.
 */
export type DiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof COMPILER_DIAGNOSTICS)[typeof code] {
	return COMPILER_DIAGNOSTICS[code]
}
