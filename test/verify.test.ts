import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { buildCommands } from '../src/extract';
import { ExecutionFailure, TimeoutFailure, VerificationFailure } from '../src/errors';
import {
	acquireLock, chomp, ellipsisPattern, exampleScript, lockPath, matchesExpected, maxBuffer,
	runCommandExamples, runShell, unifiedDiff, type RunContext
} from '../src/verify';
import { tempDir } from './toolConfig';

describe('matching', () => {
	it('drops exactly one trailing newline', () => {
		expect(chomp('a\n')).toBe('a');
		expect(chomp('a\r\n')).toBe('a');
		expect(chomp('a\n\n')).toBe('a\n');
	});

	it('compares without the trailing newline on either side', () => {
		expect(matchesExpected('hello', 'hello\n')).toBe(true);
		expect(matchesExpected('hello\n', 'hello')).toBe(true);
		expect(matchesExpected('x', 'x\n\n')).toBe(false);
	});

	it('lets ... stand for any text, newlines included', () => {
		expect(ellipsisPattern('a...b').source).toBe('^a[\\s\\S]*b$');
		expect(matchesExpected('a...z', 'a\nb\nz\n')).toBe(true);
		expect(matchesExpected('a...z', 'a b y')).toBe(false);
	});

	it('treats everything else literally', () => {
		expect(matchesExpected('1+1 (x)', '1+1 (x)')).toBe(true);
		expect(matchesExpected('1+1', '11')).toBe(false);
	});

	it('shows a unified diff of the two outputs', () => {
		const diff = unifiedDiff('one\ntwo\n', 'one\nthree\n');
		expect(diff).toContain('--- expected');
		expect(diff).toContain('+++ received');
		expect(diff).toContain('\n-two\n+three\n');
	});
});

describe('exampleScript', () => {
	const group = { commands: ['ls', 'wc -l'], comments: ['  # list', ''], output: [] };

	it('runs in the tool directory', () => {
		const context: RunContext = { cwd: '/work', moduleDir: 'tools', platform: 'linux', env: {}, timeout: 3 };
		expect(exampleScript(group, context)).toBe('( cd tools && ls  # list\nwc -l )');
	});

	it('goes through cmd on windows', () => {
		const context: RunContext = { cwd: 'C:/work', moduleDir: '', platform: 'win32', env: {}, timeout: 3 };
		expect(exampleScript(group, context)).toBe('cmd /C ls  # list\nwc -l');
	});
});

describe.skipIf(process.platform === 'win32')('running examples', () => {
	let dir: string;
	let context: RunContext;

	beforeEach(async () => {
		dir		= await tempDir();
		context	= { cwd: dir, moduleDir: '', platform: process.platform, env: process.env, timeout: 5 };
	});

	afterEach(async () => {
		await fs.promises.rm(dir, { recursive: true, force: true });
	});

	it('captures output and exit code', async () => {
		expect(await runShell('echo hello', context)).toEqual({ code: 0, stdout: 'hello\n', stderr: '', timedOut: false });
		expect((await runShell('exit 3', context)).code).toBe(3);
	});

	it('puts . first on PATH', async () => {
		const result = await runShell('echo "$PATH"', context);
		expect(result.stdout.startsWith('.:')).toBe(true);
	});

	it('counts the verified groups', async () => {
		const groups = buildCommands('$ echo one\none\n$ printf "a\\nb\\n"\na\nb');
		expect(await runCommandExamples(groups, context)).toBe(2);
	});

	it('accepts elided output', async () => {
		const groups = buildCommands('Examples:\n$ echo 1 2 3 4 5 6 7 8 9 10\n1 2 3 ... 9 10\n', { heading: 'Examples:' });
		expect(await runCommandExamples(groups, context)).toBe(1);
	});

	it('accepts a bare ellipsis as the whole output', async () => {
		const groups = buildCommands('Examples:\n$ echo 1 2 3 ... 9 10\n...\n', { heading: 'Examples:' });
		expect(groups).toEqual([{ commands: ['echo 1 2 3 ... 9 10'], comments: [''], output: ['...', ''] }]);
		expect(await runCommandExamples(groups, context)).toBe(1);
	});

	it('only checks the exit code when no output is documented', async () => {
		expect(await runCommandExamples(buildCommands('$ echo ignored'), context)).toBe(1);
	});

	it('reports mismatching output', async () => {
		const failure = await runCommandExamples(buildCommands('$ echo one\ntwo'), context).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(VerificationFailure);
		if (failure instanceof VerificationFailure) {
			expect(failure.example).toBe(1);
			expect(failure.expected).toBe('two');
			expect(failure.received).toBe('one\n');
		}
	});

	it('stops at the first failing command', async () => {
		const groups = buildCommands('$ echo ok\n$ false\n$ touch marker');
		const failure = await runCommandExamples(groups, context).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(ExecutionFailure);
		if (failure instanceof ExecutionFailure) {
			expect(failure.example).toBe(2);
			expect(failure.code).toBe(1);
		}
		expect(fs.existsSync(path.join(dir, 'marker'))).toBe(false);
	});

	it('reports output beyond the buffer as a failed command', async () => {
		const failure = await runCommandExamples(buildCommands(`$ head -c ${maxBuffer + 1024} /dev/zero`), context).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(ExecutionFailure);
		expect(failure).not.toBeInstanceOf(TimeoutFailure);
		if (failure instanceof ExecutionFailure)
			expect(failure.stderr).toContain('maxBuffer');
	});

	it('gives up after the timeout', async () => {
		const failure = await runCommandExamples(buildCommands('$ sleep 5'), { ...context, timeout: 0.5 }).catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(TimeoutFailure);
	});
});

describe('acquireLock', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await tempDir();
	});

	afterEach(async () => {
		await fs.promises.rm(dir, { recursive: true, force: true });
	});

	it('admits one holder per file', async () => {
		const file	= path.join(dir, 'usage.md');
		const lock	= await acquireLock(file);
		expect(lock?.path).toBe(lockPath(file));
		expect(await acquireLock(file)).toBeUndefined();

		await lock?.release();
		expect(fs.existsSync(lockPath(file))).toBe(false);

		const again = await acquireLock(file);
		expect(again).toBeDefined();
		await again?.release();
	});

	it('tolerates a lock removed by someone else', async () => {
		const file	= path.join(dir, 'usage.md');
		const lock	= await acquireLock(file);
		await fs.promises.rmdir(lockPath(file));
		await expect(lock?.release()).resolves.toBeUndefined();
	});
});
