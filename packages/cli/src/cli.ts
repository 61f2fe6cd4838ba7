import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ReflowCommand from './commands/reflow.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'matlab-reflow')
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

	kernel.on('help', async (command, $kernel, parsed) => {
		parsed.args.unshift(command.commandName)
		const help = new HelpCommand($kernel, parsed, kernel.ui, kernel.prompt)
		await help.exec()
		return $kernel.shortcircuit()
	})

	kernel.on('version', async (_command, $kernel) => {
		console.log(`matlab-reflow v${version}`)
		return $kernel.shortcircuit()
	})

	kernel.addLoader(new ListLoader([ReflowCommand, HelpCommand]))

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
