/**
 * @matlab-reflow/diagnostics
 *
 * Shared diagnostic types and definitions for matlab-reflow packages.
 */

export { MRCLI001, MRCLI002, MRCLI003, MRCLI004 } from './cli.ts'
export { ENGINE_DIAGNOSTICS, type EngineDiagnosticCode, MRWRAP001 } from './engine.ts'
export { interpolateMessage } from './interpolate.ts'
export type { DiagnosticArgs, DiagnosticDef } from './types.ts'

import { interpolateMessage } from './interpolate.ts'
import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Render a diagnostic as a single `[CODE] message` line.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
