import * as child_process from 'child_process';
import * as fs from 'fs';
import { createTwoFilesPatch } from 'diff';
import type { ToolConfig } from './config';
import type { CommandGroup } from './extract';
import { ExecutionFailure, TimeoutFailure, VerificationFailure, errorCode } from './errors';

export type RunContext = Pick<ToolConfig, 'cwd' | 'moduleDir' | 'platform' | 'env' | 'timeout'>;

export interface ShellResult {
	code:		number;
	stdout:		string;
	stderr:		string;
	timedOut:	boolean;
}

//-----------------------------------------------------------------------------
// ellipsis matching
//-----------------------------------------------------------------------------

export function escapeRe(pattern: string) {
	return pattern.replace(/[*?.+^${}()|[\]\\]/g, '\\$&');
}

// Drops exactly one trailing newline
export function chomp(text: string): string {
	return text.replace(/\r?\n$/, '');
}

// `...` in the expected text matches any text, newlines included
export function ellipsisPattern(expected: string): RegExp {
	return new RegExp('^' + expected.split('...').map(escapeRe).join('[\\s\\S]*') + '$');
}

export function matchesExpected(expected: string, received: string): boolean {
	return ellipsisPattern(chomp(expected)).test(chomp(received));
}

export function unifiedDiff(expected: string, received: string): string {
	return createTwoFilesPatch('expected', 'received', expected, received, undefined, undefined, { context: 3 });
}

//-----------------------------------------------------------------------------
// runShell
//-----------------------------------------------------------------------------

export function exampleScript(group: CommandGroup, context: RunContext): string {
	let script = group.commands.map((command, i) => command + (group.comments[i] ?? '')).join('\n');
	if (context.platform === 'win32')
		script = `cmd /C ${script}`;
	if (context.moduleDir)
		script = `( cd ${context.moduleDir} && ${script} )`;
	return script;
}

export const maxBuffer = 10 * 1024 * 1024;

// Runs in the platform shell, with . first on PATH so local executables need no ./
export function runShell(script: string, context: RunContext): Promise<ShellResult> {
	const delimiter = context.platform === 'win32' ? ';' : ':';
	return new Promise<ShellResult>((resolve, reject) => child_process.exec(script, {
		cwd:			context.cwd,
		env:			{...context.env, PATH: `.${delimiter}${context.env.PATH ?? ''}`},
		timeout:		context.timeout * 1000,
		encoding:		'utf8' as const,
		windowsHide:	true,
		maxBuffer
		}, (error: child_process.ExecException | null, stdout: string, stderr: string) => {
			// killed for flooding stdout, not for running too long
			if (errorCode(error) === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER')
				return resolve({ code: 1, stdout, stderr: `${stderr}${error?.message ?? ''}\n`, timedOut: false });
			if (error && error.killed)
				return resolve({ code: error.code ?? 1, stdout, stderr, timedOut: true });
			if (error && typeof error.code !== 'number')
				return reject(error);
			resolve({ code: error?.code ?? 0, stdout, stderr, timedOut: false });
		})
	);
}

//-----------------------------------------------------------------------------
// runCommandExamples
//-----------------------------------------------------------------------------

// Strictly sequential and fail-fast; resolves to the number of verified examples
export async function runCommandExamples(groups: CommandGroup[], context: RunContext): Promise<number> {
	for (const [i, group] of groups.entries()) {
		const example	= i + 1;
		const script	= exampleScript(group, context);
		const result	= await runShell(script, context);

		if (result.timedOut)
			throw new TimeoutFailure(example, script, context.timeout);
		if (result.code)
			throw new ExecutionFailure(example, script, result.code, result.stdout, result.stderr);

		// no documented output: only the exit code counts
		if (!group.output.length)
			continue;

		const expected = group.output.join('\n');
		if (!matchesExpected(expected, result.stdout))
			throw new VerificationFailure(example, script, expected, result.stdout, unifiedDiff(chomp(expected) + '\n', chomp(result.stdout) + '\n'));
	}
	return groups.length;
}

//-----------------------------------------------------------------------------
// reentrancy lock
//-----------------------------------------------------------------------------

export interface Lock {
	path:		string;
	release():	Promise<void>;
}

export function lockPath(file: string) {
	return file + '.lock';
}

// Exclusive mkdir; undefined when another run on the same file holds the lock
export async function acquireLock(file: string): Promise<Lock | undefined> {
	const dir = lockPath(file);
	try {
		await fs.promises.mkdir(dir);
	} catch (error) {
		if (errorCode(error) === 'EEXIST')
			return undefined;
		throw error;
	}

	return {
		path:		dir,
		release:	() => fs.promises.rmdir(dir).catch(error => {
			if (errorCode(error) !== 'ENOENT')
				throw error;
		}),
	};
}
