/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	/** One-line message; `{name}` placeholders are filled by interpolateMessage */
	readonly message: string
	/** Shown after the message to say how to fix the problem */
	readonly suggestion?: string
}

/**
 * Values for the placeholders of a diagnostic message.
 */
export type DiagnosticArgs = Record<string, string | number>
