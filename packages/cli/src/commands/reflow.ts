import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { DEFAULT_LINE_LENGTH, type ReflowOptions, reflowSource } from '@matlab-reflow/engine'
import {
	type ErrorReport,
	reportReadError,
	reportReflowError,
	reportWriteError,
	toReflowOptions,
} from '../utils.ts'

export default class ReflowCommand extends BaseCommand {
	static override commandName = 'reflow'
	static override description = 'Reflow % comment blocks in MATLAB files to a fixed line width'

	@args.spread({ description: 'MATLAB files to rewrite in place', required: false })
	declare files?: string[]

	@flags.number({
		default: DEFAULT_LINE_LENGTH,
		description: 'Target width of reflowed comment lines',
		flagName: 'line-length',
	})
	declare lineLength: number

	@flags.boolean({
		default: true,
		description: 'Keep comments with two or more spaces after the % as they are',
		flagName: 'ignore-indented',
		showNegatedVariantInHelp: true,
	})
	declare ignoreIndented: boolean

	@flags.boolean({
		default: false,
		description: 'Start a new comment block at every line beginning with a capital letter',
		flagName: 'alternate-capital-handling',
		showNegatedVariantInHelp: true,
	})
	declare alternateCapitalHandling: boolean

	private fail(report: ErrorReport): void {
		this.logger.error(report.message)
		if (report.suggestion !== undefined) {
			this.logger.info(report.suggestion)
		}
		this.exitCode = 1
	}

	private async readSourceFile(file: string): Promise<string | null> {
		try {
			return await readFile(file, 'utf-8')
		} catch (error: unknown) {
			this.fail(reportReadError(file, error))
			return null
		}
	}

	private reflow(file: string, source: string, options: ReflowOptions): string | null {
		try {
			return reflowSource(source, options)
		} catch (error: unknown) {
			this.fail(reportReflowError(file, error))
			return null
		}
	}

	private async writeOutputFile(file: string, content: string): Promise<boolean> {
		try {
			await writeFile(file, content, 'utf-8')
			return true
		} catch (error: unknown) {
			this.fail(reportWriteError(error))
			return false
		}
	}

	private async reflowOne(file: string, options: ReflowOptions): Promise<boolean> {
		const source = await this.readSourceFile(file)
		if (source === null) return false

		const output = this.reflow(file, source, options)
		if (output === null) return false

		const written = await this.writeOutputFile(file, output)
		if (written && output !== source) {
			this.logger.info(`reflowed ${file}`)
		}
		return written
	}

	override async run(): Promise<void> {
		const options = toReflowOptions(this)

		// Files are rewritten one at a time; the first failure stops the run
		for (const file of this.files ?? []) {
			const succeeded = await this.reflowOne(file, options)
			if (!succeeded) return
		}
	}
}
