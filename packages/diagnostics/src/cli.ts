/**
 * CLI diagnostic definitions.
 *
 * Error code format: MRCLI<NUMBER>
 * - MRCLI: CLI errors (001-099)
 */

import type { DiagnosticDef } from './types.ts'

// =============================================================================
// CLI ERRORS (MRCLI001-099)
// =============================================================================

export const MRCLI001: DiagnosticDef = {
	code: 'MRCLI001',
	message: 'file not found: {path}',
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const MRCLI002: DiagnosticDef = {
	code: 'MRCLI002',
	message: 'cannot read file: {reason}',
	suggestion: 'Check that you have read permission for this file.',
}

export const MRCLI003: DiagnosticDef = {
	code: 'MRCLI003',
	message: 'cannot write file: {reason}',
	suggestion: 'Check that you have write permission for this file.',
}

export const MRCLI004: DiagnosticDef = {
	code: 'MRCLI004',
	message: 'reflow failed for {path}: {reason}',
	suggestion: 'Check the flags you passed, or report this if it seems like a bug.',
}
