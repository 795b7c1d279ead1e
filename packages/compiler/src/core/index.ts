/**
 * Core data structures: dense stores with branded integer ids.
 */

export {
	CompilationContext,
	CompileError,
	createDiagnostic,
	type DefinitionFailure,
	type Diagnostic,
	formatDiagnostic,
	isWarning,
} from './context.ts'
export {
	type DiagnosticArgs,
	DiagnosticCategory,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { FormKind, type NodeId, NodeStore, nodeId, type ParseNode } from './nodes.ts'
export {
	formatLocation,
	SourceFile,
	type SourceLocation,
	type StringId,
	StringStore,
	stringId,
} from './source.ts'
export { type Token, type TokenId, TokenKind, TokenStore, tokenId } from './tokens.ts'
