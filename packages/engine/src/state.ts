/**
 * State tracked while reflowing one file.
 */
export interface ReflowState {
	/** Uncommented fragments waiting to be wrapped */
	buffer: string[]
	/** Leading whitespace of the line that started the current buffer */
	indentLevel: number
	/** Physical output lines, without terminators */
	output: string[]
}

export function createReflowState(): ReflowState {
	return {
		buffer: [],
		indentLevel: 0,
		output: [],
	}
}
