import type { ReflowOptions } from './types.ts'

export const DEFAULT_LINE_LENGTH = 78

export const DEFAULT_REFLOW_OPTIONS: ReflowOptions = Object.freeze({
	alternateCapitalHandling: false,
	ignoreIndented: true,
	lineLength: DEFAULT_LINE_LENGTH,
})

/**
 * Fills in defaults for any option left unset.
 */
export function resolveReflowOptions(options: Partial<ReflowOptions> = {}): ReflowOptions {
	return Object.freeze({
		alternateCapitalHandling:
			options.alternateCapitalHandling ?? DEFAULT_REFLOW_OPTIONS.alternateCapitalHandling,
		ignoreIndented: options.ignoreIndented ?? DEFAULT_REFLOW_OPTIONS.ignoreIndented,
		lineLength: options.lineLength ?? DEFAULT_REFLOW_OPTIONS.lineLength,
	})
}
