import { throwInvalidWidthError } from './errors.ts'
import type { WrapOptions } from './types.ts'
import { expandTabs } from './whitespace.ts'

const WRAP_WHITESPACE = /[\t\n\v\f\r ]/g
const WORD_SEPARATOR = /( +)/

function isBlank(chunk: string): boolean {
	return chunk.trim() === ''
}

/**
 * Normalizes whitespace and splits text into alternating word and space chunks.
 * Words are never split at hyphens.
 */
export function splitChunks(text: string, tabSize = 8): string[] {
	const munged = expandTabs(text, tabSize).replace(WRAP_WHITESPACE, ' ')
	return munged.split(WORD_SEPARATOR).filter((chunk) => chunk.length > 0)
}

/**
 * Breaks the next pending chunk so its head fills the rest of the current line.
 * `pending` is reversed: the next chunk is last.
 */
function breakLongChunk(
	pending: string[],
	current: string[],
	currentLength: number,
	available: number
): void {
	const chunk = pending.pop()
	if (chunk === undefined) return
	const spaceLeft = available < 1 ? 1 : available - currentLength
	current.push(chunk.slice(0, spaceLeft))
	const rest = chunk.slice(spaceLeft)
	if (rest.length > 0) pending.push(rest)
}

/**
 * Fills a single line greedily from the pending chunks.
 */
function fillLine(pending: string[], available: number, dropLeadingSpace: boolean): string[] {
	if (dropLeadingSpace) {
		const next = pending.at(-1)
		if (next !== undefined && isBlank(next)) pending.pop()
	}

	const current: string[] = []
	let currentLength = 0
	for (let next = pending.at(-1); next !== undefined; next = pending.at(-1)) {
		if (currentLength + next.length > available) break
		current.push(next)
		pending.pop()
		currentLength += next.length
	}

	const next = pending.at(-1)
	if (next !== undefined && next.length > available) {
		breakLongChunk(pending, current, currentLength, available)
	}

	const last = current.at(-1)
	if (last !== undefined && isBlank(last)) current.pop()
	return current
}

/**
 * Greedy word wrap.
 *
 * The first line is prefixed with initialIndent, the rest with subsequentIndent;
 * both count towards width. Whitespace at the edges of continuation lines is
 * dropped, while runs of spaces inside a line are kept. A word longer than the
 * space left on a line is broken across lines.
 *
 * @throws {ReflowError} MRWRAP001 if width is not positive
 */
export function wrapText(text: string, options: WrapOptions): string[] {
	const { width, initialIndent = '', subsequentIndent = '', tabSize = 8 } = options
	if (Number.isNaN(width) || width <= 0) throwInvalidWidthError(width)

	const pending = splitChunks(text, tabSize).reverse()
	const lines: string[] = []

	while (pending.length > 0) {
		const indent = lines.length > 0 ? subsequentIndent : initialIndent
		const current = fillLine(pending, width - indent.length, lines.length > 0)
		if (current.length > 0) {
			lines.push(indent + current.join(''))
		}
	}

	return lines
}
