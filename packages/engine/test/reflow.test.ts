import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	flushBuffer,
	reflowLines,
	reflowSource,
	splitLines,
	writeLine,
} from '../src/reflow.ts'
import { createReflowState } from '../src/state.ts'

describe('reflow', () => {
	describe('splitLines', () => {
		it('should return no lines for empty input', () => {
			assert.deepStrictEqual(splitLines(''), [])
		})

		it('should not add a line after the final terminator', () => {
			assert.deepStrictEqual(splitLines('a\n'), ['a'])
			assert.deepStrictEqual(splitLines('a'), ['a'])
		})

		it('should keep blank lines', () => {
			assert.deepStrictEqual(splitLines('a\n\n'), ['a', ''])
			assert.deepStrictEqual(splitLines('\n'), [''])
		})

		it('should split on universal newlines', () => {
			assert.deepStrictEqual(splitLines('a\r\nb\rc\n'), ['a', 'b', 'c'])
		})
	})

	describe('flushBuffer', () => {
		it('should wrap buffered text at the buffer indent level', () => {
			const state = createReflowState()
			state.buffer = [' a', ' b']
			state.indentLevel = 2
			flushBuffer(state, { lineLength: 78 })
			assert.deepStrictEqual(state.output, ['  % a b'])
			assert.deepStrictEqual(state.buffer, [])
		})

		it('should do nothing for an empty buffer', () => {
			const state = createReflowState()
			flushBuffer(state, { lineLength: 78 })
			assert.deepStrictEqual(state.output, [])
		})
	})

	describe('writeLine', () => {
		it('should write buffered text before the line', () => {
			const state = createReflowState()
			state.buffer = [' a']
			writeLine(state, 'x = 1;', { lineLength: 78 })
			assert.deepStrictEqual(state.output, ['% a', 'x = 1;'])
			assert.deepStrictEqual(state.buffer, [])
		})
	})

	describe('reflowLines', () => {
		it('should terminate every line with a newline', () => {
			assert.strictEqual(reflowLines(['x = 1;', 'y = 2;']), 'x = 1;\ny = 2;\n')
		})

		it('should return empty output for no lines', () => {
			assert.strictEqual(reflowLines([]), '')
		})

		it('should join consecutive comment lines', () => {
			assert.strictEqual(reflowLines(['% one', '% two']), '% one two\n')
		})

		it('should flush comments before a code line', () => {
			assert.strictEqual(reflowLines(['% one', '% two', 'end']), '% one two\nend\n')
		})

		it('should not join comments across code', () => {
			assert.strictEqual(reflowLines(['% a', 'x = 1;', '% b']), '% a\nx = 1;\n% b\n')
		})
	})

	describe('reflowSource', () => {
		it('should pass code through unchanged', () => {
			assert.strictEqual(reflowSource('x = 1;\ny = 2;\n'), 'x = 1;\ny = 2;\n')
		})

		it('should keep empty input empty', () => {
			assert.strictEqual(reflowSource(''), '')
		})

		it('should add a final newline', () => {
			assert.strictEqual(reflowSource('x = 1;'), 'x = 1;\n')
		})

		it('should write \\n line endings', () => {
			assert.strictEqual(reflowSource('a\r\nb\r\n'), 'a\nb\n')
		})

		it('should wrap a long comment to the line length', () => {
			const source =
				'% This is a very long comment that should wrap across multiple lines because it exceeds the limit\n'
			assert.strictEqual(
				reflowSource(source, { lineLength: 40 }),
				'% This is a very long comment that\n% should wrap across multiple lines\n% because it exceeds the limit\n'
			)
		})

		it('should keep the indentation of the first line of a block', () => {
			assert.strictEqual(
				reflowSource('  % alpha beta gamma delta\n', { lineLength: 20 }),
				'  % alpha beta gamma\n  % delta\n'
			)
		})

		it('should write tab indentation as spaces', () => {
			assert.strictEqual(reflowSource('\t% one\n\t% two\n'), ' % one two\n')
		})

		it('should keep a blank comment line and start a new block after it', () => {
			assert.strictEqual(reflowSource('%\n% Next para\n'), '%\n% Next para\n')
			assert.strictEqual(reflowSource('% first\n%\n% second\n'), '% first\n%\n% second\n')
		})

		it('should keep cell markers verbatim', () => {
			assert.strictEqual(
				reflowSource('%% Setup\n% load the\n% data\n'),
				'%% Setup\n% load the data\n'
			)
		})

		it('should keep indented comments when ignoreIndented is on', () => {
			const source = '% intro\n%   code example here\n% outro\n'
			assert.strictEqual(reflowSource(source), source)
		})

		it('should reflow indented comments when ignoreIndented is off', () => {
			assert.strictEqual(
				reflowSource('% intro\n%   code example here\n% outro\n', { ignoreIndented: false }),
				'% intro   code example here outro\n'
			)
		})

		it('should start a new block at a capital letter when enabled', () => {
			assert.strictEqual(
				reflowSource('% first sentence\n% Second sentence\n', { alternateCapitalHandling: true }),
				'% first sentence\n% Second sentence\n'
			)
		})

		it('should join capitalized lines when capital handling is off', () => {
			assert.strictEqual(
				reflowSource('% first sentence\n% Second sentence\n'),
				'% first sentence Second sentence\n'
			)
		})

		it('should take the indent of a capitalized line that starts a new block', () => {
			assert.strictEqual(
				reflowSource('% first\n    % Second\n', { alternateCapitalHandling: true }),
				'% first\n    % Second\n'
			)
		})

		it('should trim trailing whitespace from comments', () => {
			assert.strictEqual(reflowSource('% one   \n'), '% one\n')
		})

		it('should keep percent signs inside comment text', () => {
			assert.strictEqual(reflowSource('% 50% of cases\n'), '% 50% of cases\n')
		})

		it('should keep code with trailing comments verbatim', () => {
			const source = 'x = 5; % a very long trailing comment that goes well past the limit\n'
			assert.strictEqual(reflowSource(source, { lineLength: 20 }), source)
		})

		it('should break a word longer than the line', () => {
			const word = 'a'.repeat(100)
			assert.strictEqual(
				reflowSource(`% ${word}\n`),
				`% ${'a'.repeat(76)}\n% ${'a'.repeat(24)}\n`
			)
		})

		it('should keep a leading byte order mark', () => {
			assert.strictEqual(reflowSource('\uFEFF% one\n% two\n'), '\uFEFF% one two\n')
		})

		it('should reject a non-positive line length when a block is flushed', () => {
			assert.throws(() => reflowSource('% text\n', { lineLength: 0 }), {
				code: 'MRWRAP001',
				name: 'ReflowError',
			})
		})

		it('should not check the line length when there is nothing to wrap', () => {
			assert.strictEqual(reflowSource('x = 1;\n%\n', { lineLength: 0 }), 'x = 1;\n%\n')
		})

		it('should split a continuation line that starts with a capital the same way again', () => {
			const options = { alternateCapitalHandling: true, lineLength: 10 }
			const once = reflowSource('% one two Three four\n', options)
			assert.strictEqual(once, '% one two\n% Three\n% four\n')
			assert.strictEqual(reflowSource(once, options), once)
		})

		it('should wrap a block longer than a single argument list can hold', () => {
			const output = reflowSource(`% ${'ab '.repeat(600_000)}\n`, { lineLength: 5 })
			assert.strictEqual(output, '% ab\n'.repeat(600_000))
		})

		it('should be idempotent on wrapped output', () => {
			const once = reflowSource(
				'% This is a very long comment that should wrap across multiple lines because it exceeds the limit\n',
				{ lineLength: 40 }
			)
			assert.strictEqual(reflowSource(once, { lineLength: 40 }), once)
		})
	})
})
