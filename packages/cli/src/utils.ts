import {
	type DiagnosticArgs,
	type DiagnosticDef,
	ENGINE_DIAGNOSTICS,
	formatDiagnostic,
	MRCLI001,
	MRCLI002,
	MRCLI003,
	MRCLI004,
} from '@matlab-reflow/diagnostics'
import { type ReflowOptions, ReflowError } from '@matlab-reflow/engine'

/**
 * Flag values as parsed by the reflow command.
 */
export interface ReflowFlags {
	lineLength: number
	ignoreIndented: boolean
	alternateCapitalHandling: boolean
}

/**
 * A failure ready for the logger: the diagnostic line and, when the
 * catalog has one, a hint on how to fix it.
 */
export interface ErrorReport {
	message: string
	suggestion?: string
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function report(def: DiagnosticDef, args: DiagnosticArgs): ErrorReport {
	const message = formatDiagnostic(def, args)
	return def.suggestion === undefined ? { message } : { message, suggestion: def.suggestion }
}

export function reportReadError(filePath: string, error: unknown): ErrorReport {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return report(MRCLI001, { path: filePath })
	}
	return report(MRCLI002, { reason: getErrorMessage(error) })
}

export function reportWriteError(error: unknown): ErrorReport {
	return report(MRCLI003, { reason: getErrorMessage(error) })
}

export function reportReflowError(filePath: string, error: unknown): ErrorReport {
	if (error instanceof ReflowError) {
		const { suggestion } = ENGINE_DIAGNOSTICS[error.code]
		const message = `${filePath}: ${error.message}`
		return suggestion === undefined ? { message } : { message, suggestion }
	}
	return report(MRCLI004, { path: filePath, reason: getErrorMessage(error) })
}

export function toReflowOptions(flags: ReflowFlags): ReflowOptions {
	return {
		alternateCapitalHandling: flags.alternateCapitalHandling,
		ignoreIndented: flags.ignoreIndented,
		lineLength: flags.lineLength,
	}
}
