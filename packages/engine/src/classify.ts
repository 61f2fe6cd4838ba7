import type { LineKind, ReflowOptions } from './types.ts'
import { countLeadingWhitespace, startsWithUppercase } from './whitespace.ts'

export const COMMENT_MARKER = '%'

/**
 * Minimum inner indentation for a comment to count as hand-formatted.
 */
export const INDENTED_COMMENT_THRESHOLD = 2

/**
 * True when the line, ignoring leading whitespace, starts with `%`.
 */
export function isCommentLine(line: string): boolean {
	return line.trimStart().startsWith(COMMENT_MARKER)
}

/**
 * Removes exactly one leading `%` and any trailing whitespace.
 * Inner indentation is kept, so percent signs later in the text survive.
 */
export function uncomment(line: string): string {
	const stripped = line.trimStart()
	const body = stripped.startsWith(COMMENT_MARKER)
		? stripped.slice(COMMENT_MARKER.length)
		: stripped
	return body.trimEnd()
}

/**
 * Decides what the reflow loop does with a single source line.
 */
export function classifyLine(
	line: string,
	options: Pick<ReflowOptions, 'alternateCapitalHandling' | 'ignoreIndented'>
): LineKind {
	if (!isCommentLine(line)) return { kind: 'code' }

	const text = uncomment(line)
	const innerIndent = countLeadingWhitespace(text)

	if (innerIndent === 0) return { kind: 'blank-comment' }

	if (options.ignoreIndented && innerIndent >= INDENTED_COMMENT_THRESHOLD) {
		return { kind: 'indented-comment' }
	}

	const startsBlock = options.alternateCapitalHandling && startsWithUppercase(text.trimStart())
	return { kind: 'comment', startsBlock, text }
}
