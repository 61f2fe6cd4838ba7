import { classifyLine } from './classify.ts'
import { resolveReflowOptions } from './options.ts'
import type { ReflowState } from './state.ts'
import { createReflowState } from './state.ts'
import type { ReflowOptions } from './types.ts'
import { countLeadingWhitespace } from './whitespace.ts'
import { wrapText } from './wrap.ts'

/**
 * UTF-8 Byte Order Mark (BOM) character.
 * Kept at the start of the output, but never part of the first line.
 */
const UTF8_BOM = '\uFEFF'

const LINE_BREAK = /\r\n|\r|\n/

/**
 * Wraps the buffered fragments and appends them to the output.
 * Does nothing when the buffer is empty.
 */
export function flushBuffer(state: ReflowState, options: Pick<ReflowOptions, 'lineLength'>): void {
	if (state.buffer.length === 0) return

	const margin = ' '.repeat(state.indentLevel)
	const lines = wrapText(state.buffer.join(''), {
		initialIndent: `${margin}%`,
		subsequentIndent: `${margin}% `,
		width: options.lineLength,
	})
	if (lines.length === 0) {
		state.output.push('')
	}
	// One push per line: a long block can produce more lines than fit in an argument list
	for (const wrapped of lines) {
		state.output.push(wrapped)
	}
	state.buffer = []
}

/**
 * Writes a line verbatim, after any buffered comment text.
 */
export function writeLine(
	state: ReflowState,
	line: string,
	options: Pick<ReflowOptions, 'lineLength'>
): void {
	flushBuffer(state, options)
	state.output.push(line)
}

function appendToBuffer(state: ReflowState, line: string, text: string): void {
	if (state.buffer.length === 0) {
		state.indentLevel = countLeadingWhitespace(line)
	}
	state.buffer.push(text)
}

/**
 * Routes a single source line to the buffer or straight to the output.
 */
export function processLine(line: string, state: ReflowState, options: ReflowOptions): void {
	const lineKind = classifyLine(line, options)

	switch (lineKind.kind) {
		case 'code':
		case 'blank-comment':
		case 'indented-comment':
			writeLine(state, line, options)
			return
		case 'comment':
			if (lineKind.startsBlock) flushBuffer(state, options)
			appendToBuffer(state, line, lineKind.text)
			return
	}
}

/**
 * Joins output lines, terminating every line with `\n`.
 */
export function renderOutput(state: ReflowState): string {
	return state.output.map((line) => `${line}\n`).join('')
}

/**
 * Splits text on `\r\n`, `\r` or `\n`. A final terminator doesn't start another line.
 */
export function splitLines(source: string): string[] {
	if (source.length === 0) return []
	const lines = source.split(LINE_BREAK)
	if (lines.at(-1) === '') lines.pop()
	return lines
}

/**
 * Reflows `%` comment blocks in the given lines.
 *
 * Consecutive comment lines are joined and re-wrapped to options.lineLength,
 * keeping the leading whitespace of the first line of each block. Code lines,
 * comments without a space after the `%`, and indented comments (when
 * ignoreIndented is set) are copied unchanged and end the current block.
 *
 * @returns The rewritten text, with every line terminated by `\n`
 * @throws {ReflowError} If a block is wrapped to a non-positive width
 */
export function reflowLines(
	lines: readonly string[],
	options: Partial<ReflowOptions> = {}
): string {
	const resolved = resolveReflowOptions(options)
	const state = createReflowState()

	for (const line of lines) {
		processLine(line, state, resolved)
	}
	flushBuffer(state, resolved)

	return renderOutput(state)
}

/**
 * Reflows a whole source text, keeping a leading BOM if there is one.
 */
export function reflowSource(source: string, options: Partial<ReflowOptions> = {}): string {
	const hasBom = source.startsWith(UTF8_BOM)
	const body = hasBom ? source.slice(UTF8_BOM.length) : source
	const result = reflowLines(splitLines(body), options)
	return hasBom ? `${UTF8_BOM}${result}` : result
}
