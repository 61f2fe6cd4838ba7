/**
 * Reflow engine diagnostic definitions.
 *
 * Error code format: MR<PHASE><NUMBER>
 * - MRWRAP: Text wrapping errors (001-099)
 */

import type { DiagnosticDef } from './types.ts'

// =============================================================================
// WRAP ERRORS (MRWRAP001-099)
// =============================================================================

export const MRWRAP001: DiagnosticDef = {
	code: 'MRWRAP001',
	message: 'invalid width {width} (must be > 0)',
	suggestion: 'Pass a positive value to `--line-length`, such as the default of 78.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all engine diagnostics.
 */
export const ENGINE_DIAGNOSTICS = {
	MRWRAP001,
} as const

/**
 * All valid engine diagnostic codes.
 */
export type EngineDiagnosticCode = keyof typeof ENGINE_DIAGNOSTICS
