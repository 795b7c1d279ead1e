import { basename, extname, join } from 'node:path'
import {
	ALL_TARGETS,
	CompileError,
	type CompiledScriptData,
	type Diagnostic,
	formatDiagnostic,
	isSourceEncoding,
	isTarget,
	type SourceEncoding,
	type Target,
} from '@scenarioc/compiler'
import {
	type DiagnosticArgs,
	type DiagnosticDef,
	formatCatalogMessage,
	interpolateMessage,
	SCNCLI001,
	SCNCLI002,
	SCNCLI003,
	SCNCLI004,
	SCNCLI005,
	SCNCLI006,
	SCNCLI007,
} from '@scenarioc/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** `[CODE] message`, with the suggestion on a second line when the entry has one. */
export function formatCliDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	const line = formatCatalogMessage(def, args)
	return def.suggestion ? `${line}\n  = help: ${interpolateMessage(def.suggestion, args)}` : line
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCatalogMessage(SCNCLI001, { path: filePath })
	}
	return formatCatalogMessage(SCNCLI002, { path: filePath, reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCatalogMessage(SCNCLI003, { reason: getErrorMessage(error) })
}

export function formatInvalidTargetError(target: string): string {
	return formatCliDiagnostic(SCNCLI004, { target, targets: ALL_TARGETS.join(', ') })
}

export function formatInvalidEncodingError(encoding: string): string {
	return formatCliDiagnostic(SCNCLI005, { encoding })
}

export function formatNoInputError(): string {
	return formatCliDiagnostic(SCNCLI007)
}

export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return formatDiagnostic(error.diagnostic)
	}
	return formatCatalogMessage(SCNCLI006, { reason: getErrorMessage(error) })
}

export type BuildOptions = { target: Target; encoding: SourceEncoding }

/** Validated `--target` and `--encoding`, or the message for the first bad one. */
export function resolveBuildOptions(
	target: string,
	encoding: string
): { ok: true; options: BuildOptions } | { ok: false; error: string } {
	const normalizedTarget = target.toLowerCase()
	if (!isTarget(normalizedTarget)) {
		return { error: formatInvalidTargetError(target), ok: false }
	}
	const normalizedEncoding = encoding.toLowerCase()
	if (!isSourceEncoding(normalizedEncoding)) {
		return { error: formatInvalidEncodingError(encoding), ok: false }
	}
	return { ok: true, options: { encoding: normalizedEncoding, target: normalizedTarget } }
}

export function resolveOutputFilename(inputPath: string): string {
	return `${basename(inputPath, extname(inputPath))}.json`
}

export function resolveOutputPath(inputPath: string, outputDir: string | undefined): string {
	return join(outputDir ?? '.', resolveOutputFilename(inputPath))
}

function serializeDiagnostic(diagnostic: Diagnostic) {
	return {
		code: diagnostic.def.code,
		column: diagnostic.column,
		file: diagnostic.file,
		line: diagnostic.line,
		message: diagnostic.message,
	}
}

/** The compiled unit as JSON; warnings keep their code, location and message. */
export function serializeCompiledData(data: CompiledScriptData): string {
	const output = {
		files: data.files,
		globals: data.globals,
		nodes: data.nodes,
		scripts: data.scripts,
		target: data.target,
		warnings: data.warnings.map(serializeDiagnostic),
	}
	return `${JSON.stringify(output, null, '\t')}\n`
}
