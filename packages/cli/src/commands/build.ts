import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	CompileError,
	type CompiledScriptData,
	type Diagnostic,
	formatDiagnostic,
	ScriptCompiler,
} from '@scenarioc/compiler'
import {
	type BuildOptions,
	formatCompileError,
	formatNoInputError,
	formatReadError,
	formatWriteError,
	resolveBuildOptions,
	resolveOutputPath,
	serializeCompiledData,
} from '../utils.ts'

interface LoadedFile {
	readonly path: string
	readonly bytes: Uint8Array
}

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Compile scenario scripts into one flat node array'

	@args.spread({ description: 'Source files, compiled together as one unit' })
	declare files: string[]

	@flags.string({ alias: 'o', description: 'Output directory (created if not exists)' })
	declare output?: string

	@flags.string({
		alias: 't',
		default: 'retail',
		description: 'Engine target: anniversary, console-ntsc, custom-edition, retail or retail-demo',
	})
	declare target: string

	@flags.string({
		alias: 'e',
		default: 'utf-8',
		description: 'Source encoding: utf-8 or windows-1252',
	})
	declare encoding: string

	@flags.boolean({ alias: 'q', description: 'Print errors only' })
	declare quiet: boolean

	private fail(message: string): null {
		this.logger.error(message)
		this.exitCode = 1
		return null
	}

	private resolveOptions(): BuildOptions | null {
		const resolved = resolveBuildOptions(this.target, this.encoding)
		return resolved.ok ? resolved.options : this.fail(resolved.error)
	}

	private async readSourceFiles(): Promise<LoadedFile[] | null> {
		if (this.files.length === 0) return this.fail(formatNoInputError())
		const loaded: LoadedFile[] = []
		for (const path of this.files) {
			try {
				loaded.push({ bytes: await readFile(path), path })
			} catch (error: unknown) {
				return this.fail(formatReadError(path, error))
			}
		}
		return loaded
	}

	private displayWarnings(warnings: readonly Diagnostic[]): void {
		if (this.quiet) return
		for (const warning of warnings) {
			this.logger.warning(formatDiagnostic(warning))
		}
	}

	private compileSources(options: BuildOptions, files: readonly LoadedFile[]): CompiledScriptData | null {
		try {
			const compiler = new ScriptCompiler(options)
			for (const file of files) {
				compiler.loadSource(file.path, file.bytes)
			}
			const data = compiler.compile()
			this.displayWarnings(data.warnings)
			return data
		} catch (error: unknown) {
			if (error instanceof CompileError) this.displayWarnings(error.warnings)
			return this.fail(formatCompileError(error))
		}
	}

	private async emitOutput(inputPath: string, data: CompiledScriptData): Promise<void> {
		const outputPath = resolveOutputPath(inputPath, this.output)
		try {
			await mkdir(this.output ?? '.', { recursive: true })
			await writeFile(outputPath, serializeCompiledData(data))
		} catch (error: unknown) {
			this.fail(formatWriteError(error))
			return
		}
		if (!this.quiet) {
			this.logger.success(
				`${outputPath}: ${data.scripts.length} script(s), ${data.globals.length} global(s), ${data.nodes.length} node(s)`
			)
		}
	}

	override async run(): Promise<void> {
		const options = this.resolveOptions()
		if (options === null) return

		const files = await this.readSourceFiles()
		if (files === null) return

		const data = this.compileSources(options, files)
		if (data === null) return

		const [first] = files
		if (first !== undefined) await this.emitOutput(first.path, data)
	}
}
