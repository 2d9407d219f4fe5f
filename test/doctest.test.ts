import { describe, it, expect } from 'vitest';
import { interactiveExamples, parseInteractive, runInteractiveExamples } from '../src/doctest';
import { InteractiveFailure } from '../src/errors';

describe('parseInteractive', () => {
	it('reads continuations and indented expected output', () => {
		const text = 'Intro\n\t>>> const x = [1, 2]\n\t>>> x.map(i =>\n\t... \ti * 2)\n\t[ 2, 4 ]\n\nMore';
		expect(parseInteractive(text)).toEqual([
			{ source: 'const x = [1, 2]', want: '' },
			{ source: 'x.map(i =>\n\ti * 2)', want: '[ 2, 4 ]' },
		]);
	});

	it('keeps a bare ellipsis as expected output', () => {
		expect(parseInteractive('>>> [1, 2, 3]\n...')).toEqual([{ source: '[1, 2, 3]', want: '...' }]);
	});
});

describe('interactiveExamples', () => {
	it('reads every doc comment of the source', () => {
		const source = '/**\n * >>> 1 + 1\n * 2\n */\nconst a = 1;\n/**\n * >>> a * 3\n * 3\n */\n';
		expect(interactiveExamples({ source, doc: '' })).toEqual([
			{ source: '1 + 1', want: '2' },
			{ source: 'a * 3', want: '3' },
		]);
	});

	it('falls back to the doc without a source', () => {
		expect(interactiveExamples({ doc: '>>> 4\n4' })).toEqual([{ source: '4', want: '4' }]);
	});
});

describe('runInteractiveExamples', () => {
	const run = (source: string, want: string, scope: Record<string, unknown> = {}) =>
		runInteractiveExamples([{ source, want }], scope, 1);

	it('shares bindings between examples', async () => {
		const examples = parseInteractive('>>> const x = [1, 2]\n>>> x.map(i => i * 2)\n[ 2, 4 ]');
		expect(await runInteractiveExamples(examples, {}, 1)).toBe(2);
	});

	it('sees the host scope', async () => {
		expect(await run('double(21)', '42', { double: (n: number) => n * 2 })).toBe(1);
	});

	it('captures console output', async () => {
		expect(await run("console.log('hi', 3)", 'hi 3')).toBe(1);
	});

	it('awaits promises', async () => {
		expect(await run('Promise.resolve(5)', '5')).toBe(1);
	});

	it('gives up on a promise that outlives the timeout', async () => {
		const failure = await runInteractiveExamples([{ source: 'new Promise(() => {})', want: '1' }], {}, 0.2).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(InteractiveFailure);
		if (failure instanceof InteractiveFailure) {
			expect(failure.example).toBe(1);
			expect(failure.received).toBe('timed out after 0.2s');
		}
	});

	it('does not let an ellipsis accept a timeout', async () => {
		const failure = await runInteractiveExamples([{ source: 'new Promise(resolve => later(resolve, 2000))', want: '...' }], { later: setTimeout }, 0.2).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(InteractiveFailure);
	});

	it('accepts an expected exception by name', async () => {
		expect(await run('null.x', 'TypeError: Cannot read properties of null')).toBe(1);
	});

	it('compares with normalised whitespace and ellipses', async () => {
		expect(await run('({a: 1, b: [1, 2]})', '{ a: 1,\n  b: [ 1, 2 ] }')).toBe(1);
		expect(await run("'abcdef'", "'ab...'")).toBe(1);
	});

	it('fails on a mismatch', async () => {
		const failure = await run('1 + 1', '3').catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(InteractiveFailure);
		if (failure instanceof InteractiveFailure) {
			expect(failure.expected).toBe('3');
			expect(failure.received).toBe('2');
		}
	});

	it('fails on an unexpected exception', async () => {
		const failure = await run("throw new RangeError('bad')", '1').catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(InteractiveFailure);
		if (failure instanceof InteractiveFailure)
			expect(failure.received).toBe('RangeError: bad');
	});
});
