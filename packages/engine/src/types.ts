/**
 * Options controlling how comment blocks are reflowed.
 */
export interface ReflowOptions {
	/** Target width of wrapped comment lines, including indentation and `%` */
	readonly lineLength: number
	/** Pass comments with two or more spaces after the `%` through unchanged */
	readonly ignoreIndented: boolean
	/** Start a new block at every comment line that begins with a capital letter */
	readonly alternateCapitalHandling: boolean
}

/**
 * Classification of a single source line.
 * - code: anything that isn't a `%` comment
 * - blank-comment: a comment with no leading space after the `%` (`%`, `%%`, `%{`)
 * - indented-comment: a comment with inner indentation, kept as-is when ignoreIndented is set
 * - comment: text eligible for reflow
 */
export type LineKind =
	| { readonly kind: 'code' }
	| { readonly kind: 'blank-comment' }
	| { readonly kind: 'indented-comment' }
	| {
			readonly kind: 'comment'
			readonly text: string
			readonly startsBlock: boolean
	  }

export interface WrapOptions {
	width: number
	initialIndent?: string
	subsequentIndent?: string
	tabSize?: number
}
