/**
 * Schema of the builtin definitions file.
 */

import { z } from 'zod'
import { type ValueType, valueTypeFromName } from '../check/types.ts'

/**
 * Engine/platform variants.
 */
export const Target = {
	Anniversary: 'anniversary',
	ConsoleNtsc: 'console-ntsc',
	CustomEdition: 'custom-edition',
	Retail: 'retail',
	RetailDemo: 'retail-demo',
} as const

export type Target = (typeof Target)[keyof typeof Target]

export const ALL_TARGETS: readonly Target[] = Object.values(Target)

export function isTarget(value: string): value is Target {
	return ALL_TARGETS.some((target) => target === value)
}

const targetSchema = z.nativeEnum(Target)

const valueTypeSchema = z.string().transform((name, ctx): ValueType => {
	const type = valueTypeFromName(name)
	if (type === undefined) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown value type "${name}"` })
		return z.NEVER
	}
	return type
})

const limitSchema = z.number().int().positive().max(65536)

const targetProfileSchema = z.object({
	coercions: z.array(z.tuple([valueTypeSchema, valueTypeSchema])).default([]),
	displayName: z.string().min(1),
	limits: z.object({
		functions: limitSchema,
		globals: limitSchema,
		scripts: limitSchema,
	}),
	maxNameLength: z.number().int().positive(),
})

const parameterSchema = z.object({
	allowUppercase: z.boolean().default(false),
	many: z.boolean().default(false),
	optional: z.boolean().default(false),
	type: valueTypeSchema,
})

const engineIdsSchema = z.record(targetSchema, z.number().int().nonnegative())

const functionSchema = z
	.object({
		assignsGlobal: z.boolean().default(false),
		engines: engineIdsSchema,
		inequality: z.boolean().default(false),
		name: z.string().min(1),
		numberPassthrough: z.boolean().default(false),
		parameters: z.array(parameterSchema).default([]),
		passthroughLast: z.boolean().default(false),
		returnType: valueTypeSchema,
		specialForm: z.boolean().default(false),
	})
	.superRefine((fn, ctx) => {
		const manyIndex = fn.parameters.findIndex((param) => param.many)
		if (manyIndex !== -1 && manyIndex !== fn.parameters.length - 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `${fn.name}: only the last parameter may repeat`,
			})
		}
		const firstOptional = fn.parameters.findIndex((param) => param.optional)
		if (firstOptional !== -1 && fn.parameters.slice(firstOptional).some((param) => !param.optional)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `${fn.name}: required parameters cannot follow optional ones`,
			})
		}
	})

const globalSchema = z.object({
	engines: engineIdsSchema,
	name: z.string().min(1),
	type: valueTypeSchema,
})

export const definitionsSchema = z
	.object({
		enumerations: z.record(z.string(), z.array(z.string().min(1)).min(1)).default({}),
		functions: z.array(functionSchema),
		globals: z.array(globalSchema).default([]),
		targets: z.record(targetSchema, targetProfileSchema),
	})
	.superRefine((definitions, ctx) => {
		for (const name of Object.keys(definitions.enumerations)) {
			if (valueTypeFromName(name) === undefined) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown enumerated type "${name}"` })
			}
		}
		checkUnique(
			definitions.functions.map((fn) => fn.name),
			'function',
			ctx
		)
		checkUnique(
			definitions.globals.map((global) => global.name),
			'global',
			ctx
		)
		for (const target of ALL_TARGETS) {
			checkUnique(
				definitions.functions.flatMap((fn) => engineId(fn.engines, target)),
				`${target} function id`,
				ctx
			)
			checkUnique(
				definitions.globals.flatMap((global) => engineId(global.engines, target)),
				`${target} global id`,
				ctx
			)
		}
	})

export type Definitions = z.output<typeof definitionsSchema>
export type FunctionDefinition = Definitions['functions'][number]
export type GlobalDefinition = Definitions['globals'][number]

function engineId(engines: Partial<Record<Target, number>>, target: Target): number[] {
	const id = engines[target]
	return id === undefined ? [] : [id]
}

function checkUnique(values: readonly (string | number)[], what: string, ctx: z.RefinementCtx): void {
	const seen = new Set<string | number>()
	for (const value of values) {
		if (seen.has(value)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate ${what} ${value}` })
		}
		seen.add(value)
	}
}

/**
 * Validate raw definitions. Throws with every schema issue listed.
 */
export function parseDefinitions(input: unknown): Definitions {
	const result = definitionsSchema.safeParse(input)
	if (!result.success) {
		const issues = result.error.issues.map((issue) => {
			const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
			return `${path}${issue.message}`
		})
		throw new Error(`Invalid builtin definitions:\n${issues.join('\n')}`)
	}
	return result.data
}
