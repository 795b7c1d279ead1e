/**
 * Check phase: name resolution, type checking and flattening.
 */

export { NodeArena } from './arena.ts'
export { type CompiledScriptData, checkUnit } from './checker.ts'
export {
	type CallExpr,
	type EngineGlobalExpr,
	type Expr,
	type GlobalExpr,
	type LiteralExpr,
	resolveExpression,
} from './expressions.ts'
export { ancestorsOf, type CoercionTable, canConvert, isComparable, isNumeric } from './lattice.ts'
export { parseBoolean, parseInteger, parseLiteral, parseReal } from './literals.ts'
export { DefinitionPhase, PhaseTracker } from './state.ts'
export {
	buildSymbolTable,
	type CallTarget,
	type DefinitionSymbol,
	type GlobalSymbol,
	type ReplacedStub,
	Resolver,
	type ScriptSymbol,
	SymbolTable,
	type TableEntry,
	type ValueTarget,
} from './symbols.ts'
export {
	ALL_VALUE_TYPES,
	type CompiledGlobal,
	type CompiledNode,
	type CompiledScript,
	isDeclarableType,
	isReturnType,
	NO_NODE,
	type NodeData,
	type NodeIndex,
	NodeKind,
	nodeIndex,
	ScriptType,
	scriptTypeFromName,
	scriptTypeName,
	ValueType,
	valueTypeDisplayName,
	valueTypeFromName,
	valueTypeName,
} from './types.ts'
export { describeArity, retype, type TypedExpr, TypeChecker } from './typing.ts'
export { reportUnused } from './usage.ts'
