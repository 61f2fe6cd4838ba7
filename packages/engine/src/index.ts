/**
 * matlab-reflow engine public API
 *
 * Line-oriented reflow of MATLAB `%` comments:
 * - classify each line as code, pass-through comment or reflowable comment
 * - buffer consecutive reflowable comments
 * - wrap each buffer to the target width when a non-eligible line or EOF ends it
 */

export {
	COMMENT_MARKER,
	classifyLine,
	INDENTED_COMMENT_THRESHOLD,
	isCommentLine,
	uncomment,
} from './classify.ts'
export { ReflowError, throwInvalidWidthError } from './errors.ts'
export { DEFAULT_LINE_LENGTH, DEFAULT_REFLOW_OPTIONS, resolveReflowOptions } from './options.ts'
export {
	flushBuffer,
	processLine,
	reflowLines,
	reflowSource,
	renderOutput,
	splitLines,
	writeLine,
} from './reflow.ts'
export { createReflowState, type ReflowState } from './state.ts'
export type { LineKind, ReflowOptions, WrapOptions } from './types.ts'
export { countLeadingWhitespace, expandTabs, startsWithUppercase } from './whitespace.ts'
export { splitChunks, wrapText } from './wrap.ts'
