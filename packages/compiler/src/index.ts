/**
 * scenarioc compiler public API
 *
 * Data-oriented pipeline:
 * - Dense per-file stores with branded integer ids (TokenStore, NodeStore)
 * - Postorder form storage, expanded and validated before checking
 * - One preorder node arena per compiled unit, linked by sibling indices
 */

export { getGlobals, getNodes, getScripts, getWarnings } from './boundary.ts'
export {
	type CompiledGlobal,
	type CompiledNode,
	type CompiledScript,
	type CompiledScriptData,
	DefinitionPhase,
	NO_NODE,
	type NodeData,
	type NodeIndex,
	NodeKind,
	ScriptType,
	scriptTypeName,
	ValueType,
	valueTypeDisplayName,
	valueTypeName,
} from './check/index.ts'
export { compile, ScriptCompiler, type ScriptCompilerOptions, type Source } from './compiler.ts'
export {
	CompileError,
	type DefinitionFailure,
	type Diagnostic,
	DiagnosticCategory,
	DiagnosticSeverity,
	formatDiagnostic,
	formatLocation,
	isWarning,
	type SourceLocation,
} from './core/index.ts'
export {
	ALL_TARGETS,
	type BuiltinTable,
	createBuiltinTable,
	type Definitions,
	type EngineGlobal,
	type FunctionSignature,
	getBuiltinTable,
	isTarget,
	loadDefinitions,
	parseDefinitions,
	Target,
} from './definitions/index.ts'
export { isSourceEncoding, SourceEncoding } from './lex/encoding.ts'
