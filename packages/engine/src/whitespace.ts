/**
 * Counts leading whitespace characters. Tabs count as one.
 */
export function countLeadingWhitespace(text: string): number {
	return text.length - text.trimStart().length
}

/**
 * Replaces each tab with spaces up to the next multiple of tabSize.
 * Columns restart after a line break.
 */
export function expandTabs(text: string, tabSize = 8): string {
	let column = 0
	let result = ''
	for (const char of text) {
		if (char === '\t') {
			const padding = tabSize > 0 ? tabSize - (column % tabSize) : 0
			result += ' '.repeat(padding)
			column += padding
		} else if (char === '\n' || char === '\r') {
			result += char
			column = 0
		} else {
			result += char
			column++
		}
	}
	return result
}

/**
 * True when the first character is an uppercase letter.
 */
export function startsWithUppercase(text: string): boolean {
	const [first] = text
	if (first === undefined) return false
	return first === first.toUpperCase() && first !== first.toLowerCase()
}
