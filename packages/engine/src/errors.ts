import { type EngineDiagnosticCode, formatDiagnostic, MRWRAP001 } from '@matlab-reflow/diagnostics'

/**
 * Error raised by the reflow engine. Filesystem errors are not wrapped.
 */
export class ReflowError extends Error {
	readonly code: EngineDiagnosticCode

	constructor(message: string, code: EngineDiagnosticCode) {
		super(message)
		this.name = 'ReflowError'
		this.code = code
	}
}

/**
 * Throws when text is wrapped to a width that can't hold a single column.
 */
export function throwInvalidWidthError(width: number): never {
	throw new ReflowError(formatDiagnostic(MRWRAP001, { width }), 'MRWRAP001')
}
