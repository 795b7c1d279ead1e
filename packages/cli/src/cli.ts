#!/usr/bin/env node

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import BuildCommand from './commands/build.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'scenarioc')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([BuildCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`scenarioc v${version}`)
		console.log('')
		console.log('Usage: scenarioc build <files...> [--target retail] [--encoding utf-8] [--output dir]')
		console.log('')
		console.log('Run "scenarioc --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	if (kernel.exitCode !== undefined) process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
