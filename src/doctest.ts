import * as util from 'util';
import * as vm from 'vm';
import { docComments, type ToolConfig } from './config';
import { InteractiveFailure } from './errors';
import { matchesExpected } from './verify';

export interface InteractiveExample {
	source:		string;
	want:		string;
}

//	>>> const x = [1, 2]
//	>>> x.map(i =>
//	... 	i * 2)
//	[ 2, 4 ]
export function parseInteractive(text: string): InteractiveExample[] {
	const lines		= text.split(/\r?\n/);
	const examples: InteractiveExample[] = [];

	for (let i = 0; i < lines.length; i++) {
		const m = /^(\s*)>>> ?(.*)$/.exec(lines[i]);
		if (!m)
			continue;

		const indent	= m[1];
		const source	= [m[2]];
		const want: string[] = [];
		const strip		= (line: string) => line.startsWith(indent) ? line.slice(indent.length) : line.trimStart();

		let c: RegExpExecArray | null;
		while (i + 1 < lines.length && (c = /^\s*\.\.\. (.*)$/.exec(lines[i + 1]))) {
			source.push(c[1]);
			++i;
		}
		while (i + 1 < lines.length && lines[i + 1].trim() && !/^\s*>>>/.test(lines[i + 1]))
			want.push(strip(lines[++i]));

		examples.push({ source: source.join('\n'), want: want.join('\n') });
	}
	return examples;
}

// Every doc comment of the host source, or its doc when the source is unreadable
export function interactiveExamples(config: Pick<ToolConfig, 'source' | 'doc'>): InteractiveExample[] {
	const texts = config.source !== undefined ? docComments(config.source) : [config.doc];
	return texts.flatMap(parseInteractive);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
	return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

// errors raised inside the vm context are not instances of this realm's Error
function thrownName(error: unknown): string {
	return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
}

const expired = Symbol('expired');

async function settleWithin(value: PromiseLike<unknown>, seconds: number): Promise<unknown> {
	let timer: NodeJS.Timeout | undefined;
	try {
		return await Promise.race([value, new Promise<typeof expired>(resolve => { timer = setTimeout(() => resolve(expired), seconds * 1000); })]);
	} finally {
		clearTimeout(timer);
	}
}

function normalizeWhitespace(text: string) {
	return text.trim().split(/\s+/).join(' ');
}

//-----------------------------------------------------------------------------
// runInteractiveExamples
//-----------------------------------------------------------------------------

// One shared context, so bindings carry over from one example to the next
export async function runInteractiveExamples(examples: InteractiveExample[], scope: Record<string, unknown>, timeout: number): Promise<number> {
	const captured: string[] = [];
	const capture	= (...args: unknown[]) => { captured.push(util.format(...args)); };
	const context	= vm.createContext({ ...scope, console: { log: capture, info: capture, warn: capture, error: capture } });

	for (const [i, {source, want}] of examples.entries()) {
		captured.length = 0;
		let received: string;
		let timedOut = false;
		try {
			let value: unknown = vm.runInContext(source, context, { timeout: timeout * 1000, filename: `example ${i + 1}` });
			if (isPromiseLike(value))
				value = await settleWithin(value, timeout);
			timedOut = value === expired;
			received = [...captured, ...(value === undefined ? [] : [util.inspect(value)])].join('\n');

		} catch (error) {
			const expectedName = /^(\w+):/.exec(want)?.[1];
			if (expectedName && expectedName === thrownName(error))
				continue;
			received = String(error);
		}

		if (timedOut)
			throw new InteractiveFailure(i + 1, source, want, `timed out after ${timeout}s`);
		if (!matchesExpected(normalizeWhitespace(want), normalizeWhitespace(received)))
			throw new InteractiveFailure(i + 1, source, want, received);
	}
	return examples.length;
}
