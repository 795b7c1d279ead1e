/**
 * Compiler diagnostic definitions.
 *
 * Error code format: SCN<PHASE><NUMBER>
 * - SCNLEX: Decoding and reader errors (001-099)
 * - SCNPARSE: Form and declaration errors (001-099)
 * - SCNDEF: Unit-wide definition errors (001-099)
 * - SCNRES: Identifier resolution errors (001-099)
 * - SCNCHECK: Checker errors (001-049), warnings (050-099)
 */

import { DiagnosticCategory, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// READER ERRORS (SCNLEX001-099)
// =============================================================================

export const SCNLEX001: DiagnosticDef = {
	category: DiagnosticCategory.EncodingError,
	code: 'SCNLEX001',
	description: 'The source bytes are not valid text in the encoding the compiler was created with.',
	message: 'invalid {encoding} byte 0x{byte}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Re-save the file as {encoding}, or compile it with the encoding it was written in.',
}

export const SCNLEX002: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNLEX002',
	description: 'A quoted token starts here but the file ends before its closing quote.',
	message: 'unterminated string',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing `"`.',
}

export const SCNLEX003: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNLEX003',
	description: 'This right parenthesis does not close any open form.',
	message: 'unexpected right parenthesis',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove it, or add the matching `(` earlier.',
}

export const SCNLEX004: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNLEX004',
	description: 'The file ends while this form is still open.',
	message: 'unclosed left parenthesis',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the matching `)`.',
}

export const SCNLEX005: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNLEX005',
	description: 'Only parenthesized forms may appear at the top level of a file.',
	message: 'expected left parenthesis, got "{found}" instead',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Wrap the expression in a `script` or `global` declaration.',
}

// =============================================================================
// FORM ERRORS (SCNPARSE001-099)
// =============================================================================

export const SCNPARSE001: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE001',
	description: 'The token stream does not form a sequence of s-expressions.',
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
}

export const SCNPARSE002: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE002',
	description: 'Top-level forms declare either a script or a global.',
	message: 'expected `script` or `global`, got "{found}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Start the form with `script` or `global`.',
}

export const SCNPARSE003: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE003',
	description: 'A declaration is missing a required element or has too many.',
	message: 'malformed {kind} declaration: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Globals are written `(global <type> <name> <expression>)`; scripts `(script <type> [<return type>] <name> <expression>...)`.',
}

export const SCNPARSE004: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE004',
	description: 'This word is not the name of a type that can be declared.',
	message: 'unknown value type "{name}"',
	severity: DiagnosticSeverity.Error,
}

export const SCNPARSE005: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE005',
	description: 'Scripts are startup, dormant, continuous, static or stub.',
	message: 'unknown script type "{name}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of: startup, dormant, continuous, static, stub.',
}

export const SCNPARSE006: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE006',
	description: 'Script and global names are stored in fixed-size fields by the engine.',
	message: 'name "{name}" is {length} characters long; the limit is {limit}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Shorten the name to {limit} characters or fewer.',
}

export const SCNPARSE007: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE007',
	description: 'Special forms are resolved before scripts, so a script with this name could never be called.',
	message: '"{name}" is a special form and cannot name a script',
	severity: DiagnosticSeverity.Error,
}

export const SCNPARSE008: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE008',
	description: '`cond` takes one or more clauses, each a list of a condition and at least one expression.',
	message: 'malformed cond: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write clauses as `(<condition> <expression>...)`.',
}

export const SCNPARSE009: DiagnosticDef = {
	category: DiagnosticCategory.SyntaxError,
	code: 'SCNPARSE009',
	description: 'The first element of a list is the name of the function or script to call.',
	message: 'expected a function name, got {found}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// DEFINITION ERRORS (SCNDEF001-099)
// =============================================================================

export const SCNDEF001: DiagnosticDef = {
	category: DiagnosticCategory.DuplicateDefinitionError,
	code: 'SCNDEF001',
	description: 'Every script and global in a unit needs its own name.',
	message: '{kind} "{name}" is already defined at {previous}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename or remove one of the declarations.',
}

export const SCNDEF002: DiagnosticDef = {
	category: DiagnosticCategory.DuplicateDefinitionError,
	code: 'SCNDEF002',
	description: 'Scripts and globals share one namespace.',
	message: '"{name}" is declared as both a script and a global (first at {previous})',
	severity: DiagnosticSeverity.Error,
}

export const SCNDEF003: DiagnosticDef = {
	category: DiagnosticCategory.DuplicateDefinitionError,
	code: 'SCNDEF003',
	description: 'A stub can only be replaced by a static script.',
	message: 'stub "{name}" can only be replaced by a static script, not a {found} script',
	severity: DiagnosticSeverity.Error,
}

export const SCNDEF004: DiagnosticDef = {
	category: DiagnosticCategory.TypeMismatchError,
	code: 'SCNDEF004',
	description: 'A static script replacing a stub must return the type the stub declared.',
	message: 'stub "{name}" returns {expected} but its replacement returns {found}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// RESOLUTION ERRORS (SCNRES001-099)
// =============================================================================

export const SCNRES001: DiagnosticDef = {
	category: DiagnosticCategory.UnknownIdentifierError,
	code: 'SCNRES001',
	description: 'Calls resolve to a script of this unit or a builtin function of the target.',
	message: 'unknown function or script "{name}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the spelling, or declare a script with this name.',
}

export const SCNRES002: DiagnosticDef = {
	category: DiagnosticCategory.UnknownIdentifierError,
	code: 'SCNRES002',
	description: 'Assignment forms take the name of the global they write as their first argument.',
	message: '"{name}" is not a global',
	severity: DiagnosticSeverity.Error,
}

export const SCNRES003: DiagnosticDef = {
	category: DiagnosticCategory.UnknownIdentifierError,
	code: 'SCNRES003',
	description: 'Script-typed values name a script declared in this unit.',
	message: 'unknown script "{name}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the spelling of the script name.',
}

export const SCNRES004: DiagnosticDef = {
	category: DiagnosticCategory.UnknownIdentifierError,
	code: 'SCNRES004',
	description: 'A function name appears where a value is expected.',
	message: '"{name}" is a function, not a value',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Call it as `({name})`.',
}

export const SCNRES005: DiagnosticDef = {
	category: DiagnosticCategory.IdentifierSpaceExhaustedError,
	code: 'SCNRES005',
	description: 'Identifiers are stored in a 16-bit field; each category holds at most {limit} values.',
	message: 'too many {category}: {count} exceeds the limit of {limit}',
	severity: DiagnosticSeverity.Error,
}

export const SCNRES006: DiagnosticDef = {
	category: DiagnosticCategory.IdentifierSpaceExhaustedError,
	code: 'SCNRES006',
	description: 'The builtin table assigns this identifier an id the target cannot encode.',
	message: '{category} id {id} of "{name}" is outside the {limit}-entry identifier space',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CHECKER ERRORS (SCNCHECK001-049)
// =============================================================================

export const SCNCHECK001: DiagnosticDef = {
	category: DiagnosticCategory.ArityError,
	code: 'SCNCHECK001',
	description: 'The number of arguments does not match the signature.',
	message: '"{name}" takes {expected} argument(s), got {found}',
	severity: DiagnosticSeverity.Error,
}

export const SCNCHECK002: DiagnosticDef = {
	category: DiagnosticCategory.TypeMismatchError,
	code: 'SCNCHECK002',
	description: 'Only widening conversions and object subtypes convert implicitly.',
	message: 'expected {expected}, got {found}',
	severity: DiagnosticSeverity.Error,
}

export const SCNCHECK003: DiagnosticDef = {
	category: DiagnosticCategory.LiteralFormatError,
	code: 'SCNCHECK003',
	description: 'This literal cannot be read as the type the call site expects.',
	message: 'cannot parse "{text}" as {expected}',
	severity: DiagnosticSeverity.Error,
}

export const SCNCHECK004: DiagnosticDef = {
	category: DiagnosticCategory.LiteralFormatError,
	code: 'SCNCHECK004',
	description: 'The value of this expression is discarded, so a literal here does nothing.',
	message: 'literal "{text}" has no effect here',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the literal, or move it to the end of the block.',
}

export const SCNCHECK005: DiagnosticDef = {
	category: DiagnosticCategory.TypeMismatchError,
	code: 'SCNCHECK005',
	description: '`{name}` computes on numbers.',
	message: '"{name}" needs numeric arguments, got {found}',
	severity: DiagnosticSeverity.Error,
}

export const SCNCHECK006: DiagnosticDef = {
	category: DiagnosticCategory.TypeMismatchError,
	code: 'SCNCHECK006',
	description: '`{name}` compares numbers or enumerated values.',
	message: '"{name}" cannot compare {found} values',
	severity: DiagnosticSeverity.Error,
}

export const SCNCHECK007: DiagnosticDef = {
	category: DiagnosticCategory.TypeMismatchError,
	code: 'SCNCHECK007',
	description: 'The last expression of a script is its return value.',
	message: 'script "{name}" returns {expected}, but its last expression is {found}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CHECKER WARNINGS (SCNCHECK050-099)
// =============================================================================

export const SCNCHECK050: DiagnosticDef = {
	category: DiagnosticCategory.UnusedDefinitionWarning,
	code: 'SCNCHECK050',
	description: 'Nothing in the unit refers to this definition.',
	message: '{kind} "{name}" is never used',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove it, or reference it from a script.',
}

export const SCNCHECK051: DiagnosticDef = {
	category: DiagnosticCategory.UninitializedGlobalWarning,
	code: 'SCNCHECK051',
	description: 'Globals are initialized in declaration order.',
	message: 'global "{name}" reads "{global}" before it is initialized',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CATALOG
// =============================================================================

export const COMPILER_DIAGNOSTICS = {
	SCNCHECK001,
	SCNCHECK002,
	SCNCHECK003,
	SCNCHECK004,
	SCNCHECK005,
	SCNCHECK006,
	SCNCHECK007,
	SCNCHECK050,
	SCNCHECK051,
	SCNDEF001,
	SCNDEF002,
	SCNDEF003,
	SCNDEF004,
	SCNLEX001,
	SCNLEX002,
	SCNLEX003,
	SCNLEX004,
	SCNLEX005,
	SCNPARSE001,
	SCNPARSE002,
	SCNPARSE003,
	SCNPARSE004,
	SCNPARSE005,
	SCNPARSE006,
	SCNPARSE007,
	SCNPARSE008,
	SCNPARSE009,
	SCNRES001,
	SCNRES002,
	SCNRES003,
	SCNRES004,
	SCNRES005,
	SCNRES006,
} as const

export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
