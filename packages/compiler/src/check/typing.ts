/**
 * Type checking of resolved expressions.
 *
 * Literals are parsed against the type their position expects. Functions
 * returning passthrough take the expected type when the caller has one;
 * otherwise the first non-literal argument in a passthrough position decides,
 * and real is the fallback.
 */

import type { CompilationContext } from '../core/context.ts'
import type { SourceFile } from '../core/source.ts'
import type { FunctionSignature } from '../definitions/builtins.ts'
import type { CallExpr, EngineGlobalExpr, Expr, GlobalExpr, LiteralExpr } from './expressions.ts'
import { canConvert, isComparable, isNumeric } from './lattice.ts'
import { parseLiteral } from './literals.ts'
import type { GlobalSymbol, ScriptSymbol, SymbolTable } from './symbols.ts'
import { type NodeData, NodeKind, ValueType, valueTypeDisplayName } from './types.ts'

/**
 * An expression with its static type and the fields of its flattened node.
 */
export interface TypedExpr {
	readonly expr: Expr
	readonly kind: NodeKind
	readonly valueType: ValueType
	/** Literal and global payloads; calls get theirs when flattened */
	readonly data: NodeData
	readonly text: string | null
	readonly id: number | null
	readonly external: boolean
	readonly args: readonly TypedExpr[]
}

export function describeArity(signature: FunctionSignature): string {
	const { minArguments: min, maxArguments: max } = signature
	if (max === Number.POSITIVE_INFINITY) return `at least ${min}`
	if (min === max) return String(min)
	return `${min} to ${max}`
}

export function retype(typed: TypedExpr, valueType: ValueType): TypedExpr {
	if (valueType === ValueType.Passthrough || typed.valueType === valueType) return typed
	return { ...typed, valueType }
}

export class TypeChecker {
	private readonly file: SourceFile
	private readonly table: SymbolTable
	private readonly context: CompilationContext
	/** The global whose initializer is being checked */
	private readonly initializing: GlobalSymbol | null

	constructor(file: SourceFile, table: SymbolTable, context: CompilationContext, initializing: GlobalSymbol | null) {
		this.file = file
		this.table = table
		this.context = context
		this.initializing = initializing
	}

	/**
	 * Assign a type to `expr` where `expected` is wanted. Only literals are
	 * shaped by the expectation; callers check that other results convert.
	 */
	check(expr: Expr, expected: ValueType, allowUppercase = false): TypedExpr {
		switch (expr.kind) {
			case 'literal':
				return this.checkLiteral(expr, expected, allowUppercase)
			case 'global':
				return this.checkGlobal(expr)
			case 'engineGlobal':
				return this.checkEngineGlobal(expr)
			case 'call':
				return expr.target.kind === 'script'
					? this.checkScriptCall(expr, expr.target.symbol)
					: this.checkFunctionCall(expr, expr.target.signature, expected)
		}
	}

	/** Check, then convert the result to `expected`. */
	checkArgument(expr: Expr, expected: ValueType, allowUppercase = false): TypedExpr {
		return this.convert(this.check(expr, expected, allowUppercase), expected)
	}

	/**
	 * Retype `typed` to `expected`, failing when no conversion exists. A
	 * passthrough expectation keeps the source type.
	 */
	convert(typed: TypedExpr, expected: ValueType): TypedExpr {
		if (!canConvert(typed.valueType, expected, this.context.builtins)) {
			return this.context.failAtNode('SCNCHECK002', this.file, typed.expr.node, {
				expected: valueTypeDisplayName(expected),
				found: valueTypeDisplayName(typed.valueType),
			})
		}
		return retype(typed, expected)
	}

	private checkLiteral(expr: LiteralExpr, expected: ValueType, allowUppercase: boolean): TypedExpr {
		if (expected === ValueType.Void) {
			return this.context.failAtNode('SCNCHECK004', this.file, expr.node, { text: expr.text })
		}
		const type = expected === ValueType.Passthrough ? ValueType.Real : expected
		const text = allowUppercase ? expr.text : expr.text.toLowerCase()

		if (type === ValueType.Script) {
			const script = this.table.lookupScript(text)
			if (script === undefined) {
				return this.context.failAtNode('SCNRES003', this.file, expr.node, { name: text })
			}
			script.used = true
			return this.primitive(expr, type, { kind: 'short', value: script.index }, text)
		}

		const parsed = parseLiteral(text, type, this.context.builtins)
		if (parsed === null) {
			if (!expr.quoted && this.context.builtins.lookupFunction(text) !== undefined) {
				return this.context.failAtNode('SCNRES004', this.file, expr.node, { name: text })
			}
			return this.context.failAtNode('SCNCHECK003', this.file, expr.node, {
				expected: valueTypeDisplayName(type),
				text: expr.text,
			})
		}
		return this.primitive(expr, type, parsed.data, parsed.text)
	}

	private primitive(expr: LiteralExpr, valueType: ValueType, data: NodeData, text: string | null): TypedExpr {
		return { args: [], data, expr, external: false, id: null, kind: NodeKind.Primitive, text, valueType }
	}

	private checkGlobal(expr: GlobalExpr): TypedExpr {
		const { symbol } = expr
		symbol.used = true
		if (this.initializing !== null && symbol.slot >= this.initializing.slot) {
			this.context.warn('SCNCHECK051', this.file, expr.node, {
				global: symbol.declaration.name,
				name: this.initializing.declaration.name,
			})
		}
		return {
			args: [],
			data: { kind: 'long', value: symbol.slot },
			expr,
			external: false,
			id: symbol.slot,
			kind: NodeKind.GlobalRef,
			text: expr.name,
			valueType: symbol.declaration.valueType,
		}
	}

	private checkEngineGlobal(expr: EngineGlobalExpr): TypedExpr {
		const { global } = expr
		return {
			args: [],
			data: { kind: 'long', value: global.id },
			expr,
			external: true,
			id: global.id,
			kind: NodeKind.GlobalRef,
			text: expr.name,
			valueType: global.valueType,
		}
	}

	private checkScriptCall(expr: CallExpr, script: ScriptSymbol): TypedExpr {
		if (expr.args.length > 0) {
			this.context.failAtNode('SCNCHECK001', this.file, expr.node, {
				expected: 0,
				found: expr.args.length,
				name: expr.name,
			})
		}
		script.used = true
		return {
			args: [],
			data: { kind: 'none' },
			expr,
			external: false,
			id: script.index,
			kind: NodeKind.ScriptCall,
			text: expr.name,
			valueType: script.declaration.returnType,
		}
	}

	private checkFunctionCall(expr: CallExpr, signature: FunctionSignature, expected: ValueType): TypedExpr {
		const { args } = expr
		if (args.length < signature.minArguments || args.length > signature.maxArguments) {
			this.context.failAtNode('SCNCHECK001', this.file, expr.node, {
				expected: describeArity(signature),
				found: args.length,
				name: signature.name,
			})
		}

		const typed = new Array<TypedExpr | undefined>(args.length).fill(undefined)
		const passthrough = this.usesPassthrough(signature)
			? this.resolvePassthrough(expr, signature, expected, typed)
			: ValueType.Passthrough

		const checkedArgs = args.map((arg, i) => {
			const parameter = this.parameterAt(signature, i)
			const parameterType = this.isPassthroughPosition(signature, i, args.length)
				? passthrough
				: parameter.type
			const done = typed[i]
			if (done !== undefined) {
				return this.convert(done, parameterType)
			}
			return this.checkArgument(arg, parameterType, parameter.allowUppercase)
		})

		return {
			args: checkedArgs,
			data: { kind: 'none' },
			expr,
			external: true,
			id: signature.id,
			kind: NodeKind.FunctionCall,
			text: signature.name,
			valueType: signature.returnType === ValueType.Passthrough ? passthrough : signature.returnType,
		}
	}

	private parameterAt(signature: FunctionSignature, index: number): FunctionSignature['parameters'][number] {
		const { parameters } = signature
		const parameter = parameters[Math.min(index, parameters.length - 1)]
		if (parameter === undefined) {
			throw new Error(`${signature.name} has no parameter ${index}`)
		}
		return parameter
	}

	private usesPassthrough(signature: FunctionSignature): boolean {
		return (
			signature.returnType === ValueType.Passthrough ||
			signature.passthroughLast ||
			signature.parameters.some((parameter) => parameter.type === ValueType.Passthrough)
		)
	}

	/** `passthroughLast` functions evaluate every argument but the last for effect. */
	private isPassthroughPosition(signature: FunctionSignature, index: number, count: number): boolean {
		if (signature.passthroughLast) return index === count - 1
		return this.parameterAt(signature, index).type === ValueType.Passthrough
	}

	private fromExpected(signature: FunctionSignature, expected: ValueType): ValueType | null {
		if (signature.returnType !== ValueType.Passthrough || expected === ValueType.Passthrough) return null
		if (expected === ValueType.Void && (signature.numberPassthrough || signature.inequality)) return null
		return expected
	}

	private resolvePassthrough(
		expr: CallExpr,
		signature: FunctionSignature,
		expected: ValueType,
		typed: (TypedExpr | undefined)[]
	): ValueType {
		const { args } = expr
		let passthrough: ValueType | null = null

		if (signature.assignsGlobal) {
			const target = args[0]
			if (target === undefined || (target.kind !== 'global' && target.kind !== 'engineGlobal')) {
				const name = target?.kind === 'literal' ? target.text : (target?.kind === 'call' ? target.name : '')
				return this.context.failAtNode('SCNRES002', this.file, target?.node ?? expr.node, { name })
			}
			const assigned = this.check(target, ValueType.Passthrough)
			typed[0] = assigned
			passthrough = assigned.valueType
		}

		passthrough ??= this.fromExpected(signature, expected)

		if (passthrough === null) {
			const index = args.findIndex(
				(arg, i) => arg.kind !== 'literal' && this.isPassthroughPosition(signature, i, args.length)
			)
			const arg = args[index]
			if (arg !== undefined) {
				const inferred = this.check(arg, ValueType.Passthrough)
				typed[index] = inferred
				passthrough = inferred.valueType
			}
		}

		const resolved = passthrough ?? ValueType.Real
		const { builtins } = this.context
		if (signature.numberPassthrough && !isNumeric(resolved, builtins)) {
			this.context.failAtNode('SCNCHECK005', this.file, expr.node, {
				found: valueTypeDisplayName(resolved),
				name: signature.name,
			})
		}
		if (signature.inequality && !isComparable(resolved, builtins)) {
			this.context.failAtNode('SCNCHECK006', this.file, expr.node, {
				found: valueTypeDisplayName(resolved),
				name: signature.name,
			})
		}
		return resolved
	}
}
