import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	CLI_DIAGNOSTICS,
	COMPILER_DIAGNOSTICS,
	DIAGNOSTICS,
	DiagnosticCategory,
	DiagnosticSeverity,
	getDiagnostic,
	isValidDiagnosticCode,
} from '../src/index.ts'

describe('diagnostic catalog', () => {
	it('keys every entry by its own code', () => {
		for (const [key, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, key)
		}
	})

	it('merges compiler and CLI catalogs without collisions', () => {
		const total = Object.keys(COMPILER_DIAGNOSTICS).length + Object.keys(CLI_DIAGNOSTICS).length
		assert.strictEqual(Object.keys(DIAGNOSTICS).length, total)
	})

	it('uses the warning severity exactly for warning categories', () => {
		const warningCategories: string[] = [
			DiagnosticCategory.UnusedDefinitionWarning,
			DiagnosticCategory.UninitializedGlobalWarning,
		]
		for (const def of Object.values(DIAGNOSTICS)) {
			const isWarning = def.severity === DiagnosticSeverity.Warning
			assert.strictEqual(isWarning, warningCategories.includes(def.category), def.code)
		}
	})

	it('numbers compiler warnings from 050', () => {
		assert.strictEqual(getDiagnostic('SCNCHECK050').severity, DiagnosticSeverity.Warning)
		assert.strictEqual(getDiagnostic('SCNCHECK051').severity, DiagnosticSeverity.Warning)
		assert.strictEqual(getDiagnostic('SCNCHECK007').severity, DiagnosticSeverity.Error)
	})

	it('maps each fatal category the compiler raises to at least one code', () => {
		const fatal = [
			DiagnosticCategory.EncodingError,
			DiagnosticCategory.SyntaxError,
			DiagnosticCategory.DuplicateDefinitionError,
			DiagnosticCategory.UnknownIdentifierError,
			DiagnosticCategory.IdentifierSpaceExhaustedError,
			DiagnosticCategory.ArityError,
			DiagnosticCategory.TypeMismatchError,
			DiagnosticCategory.LiteralFormatError,
		]
		const used = new Set(Object.values(COMPILER_DIAGNOSTICS).map((def) => def.category))
		for (const category of fatal) {
			assert.ok(used.has(category), category)
		}
	})

	describe('isValidDiagnosticCode', () => {
		it('accepts catalog codes', () => {
			assert.strictEqual(isValidDiagnosticCode('SCNLEX001'), true)
			assert.strictEqual(isValidDiagnosticCode('SCNCLI004'), true)
		})

		it('rejects unknown codes and inherited property names', () => {
			assert.strictEqual(isValidDiagnosticCode('SCNLEX999'), false)
			assert.strictEqual(isValidDiagnosticCode('toString'), false)
		})
	})
})
