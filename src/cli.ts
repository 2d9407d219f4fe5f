import * as fs from 'fs';
import * as path from 'path';
import { defaultTimeout, type ToolConfig } from './config';
import { interactiveExamples, runInteractiveExamples } from './doctest';
import { emitMakefile, writeEmission, type BuildMode } from './emit';
import { GuardViolation } from './errors';
import { buildCommands } from './extract';
import { acquireLock, lockPath, runCommandExamples } from './verify';

export interface Io {
	output(text: string): void;
	error(text: string): void;
}

export const stdio: Io = {
	output:	text => process.stdout.write(text),
	error:	text => process.stderr.write(text),
};

export type Command =
	| { kind: 'emit', mode: BuildMode }
	| { kind: 'test' }
	| { kind: 'sh-test', file: string }
	| { kind: 'inline', name: string }
	| { kind: 'shebang' }
	| { kind: 'help' };

export interface Invocation {
	command?:	Command;		// undefined when the host should carry on
	timeout?:	number;
	rest:		string[];		// arguments left for the host
}

//-----------------------------------------------------------------------------
// options
//-----------------------------------------------------------------------------

interface ParseState {
	make:		boolean;
	generic:	boolean;
	dep?:		string;
	timeout?:	number;
	actions:	Command[];
	used:		string[];
	rest:		string[];
}

interface Option {
	names:			string[];
	argument?:		string;
	description:	string;
	process:		(state: ParseState, arg: string) => void;
}

function parseTimeout(arg: string) {
	const seconds = Number(arg);
	if (!arg.trim() || !Number.isFinite(seconds) || seconds <= 0)
		throw new GuardViolation(`--timeout expects a positive number of seconds, not '${arg}'`);
	return seconds;
}

export const options: Option[] = [
	{
		names: ['make'],
		description: 'Print a Makefile for bringup and test of this tool, and exit.',
		process: state => state.make = true
	},
	{
		names: ['generic'],
		description: 'Print the Makefile generalized to every tool in its directory, and exit.',
		process: state => state.generic = true
	},
	{
		names: ['dep'],
		argument: 'FILE',
		description: 'Write the bringup rule into FILE, print an include of it, and exit.',
		process: (state, arg) => state.dep = arg
	},
	{
		names: ['test'],
		description: 'Verify the interactive and command line usage examples, and exit.',
		process: state => state.actions.push({ kind: 'test' })
	},
	{
		names: ['sh-test'],
		argument: 'FILE',
		description: 'Verify the command line usage examples in FILE, and exit.',
		process: (state, arg) => state.actions.push({ kind: 'sh-test', file: arg })
	},
	{
		names: ['timeout'],
		argument: 'SECONDS',
		description: `Give up on a command line example after SECONDS (default ${defaultTimeout}).`,
		process: (state, arg) => state.timeout = parseTimeout(arg)
	},
	{
		names: ['shebang'],
		description: 'Insert a shebang, make this tool executable, advise on PATH, and exit.',
		process: state => state.actions.push({ kind: 'shebang' })
	},
	{
		names: ['c'],
		argument: 'NAME',
		description: 'Print the configuration value NAME, and exit.',
		process: (state, arg) => state.actions.push({ kind: 'inline', name: arg })
	},
	{
		names: ['h', 'help'],
		description: 'Print this summary of the options, and exit.',
		process: state => state.actions.push({ kind: 'help' })
	},
];

export function usage(config: Pick<ToolConfig, 'doc' | 'epilog'>): string {
	const lines = options.map(opt => `${opt.names.map(i => (i.length === 1 ? '-' : '--') + i).join(', ')}${opt.argument ? ' ' + opt.argument : ''}\n\t${opt.description}\n`);
	return [config.doc && config.doc + '\n\n', 'options:\n', ...lines, config.epilog && '\n' + config.epilog + '\n'].join('');
}

// Unrecognised arguments are left for the host; of several actions the first wins
export function parseCommand(args: string[]): Invocation {
	const state: ParseState = { make: false, generic: false, actions: [], used: [], rest: [] };

	for (let i = 0; i < args.length; i++) {
		const arg	= args[i];
		const eq	= arg.indexOf('=');
		const long	= arg.startsWith('--');
		const name	= long ? (eq > 0 ? arg.slice(2, eq) : arg.slice(2)) : arg.slice(1);
		const option = arg[0] === '-' && options.find(opt => opt.names.includes(name) && (name.length === 1) !== long);

		if (!option) {
			state.rest.push(arg);
			continue;
		}

		let value = '';
		if (option.argument) {
			const next = long && eq > 0 ? arg.slice(eq + 1) : args[++i];
			if (next === undefined)
				throw new GuardViolation(`${arg} expects ${option.argument}`);
			value = next;
		}
		state.used.push(name);
		option.process(state, value);
	}

	if (state.make || state.generic || state.dep !== undefined) {
		const extra = state.used.filter(name => !['make', 'generic', 'dep'].includes(name));
		if (extra.length || state.rest.length)
			throw new GuardViolation(`--make, --generic and --dep take no other arguments: ${args.join(' ')}`);
		return {
			command: { kind: 'emit', mode: { kind: state.generic ? 'generic' : 'plain', make: state.make, dep: state.dep } },
			rest: [],
		};
	}

	return { command: state.actions[0], timeout: state.timeout, rest: state.rest };
}

//-----------------------------------------------------------------------------
// actions
//-----------------------------------------------------------------------------

async function emit(mode: BuildMode, config: ToolConfig, io: Io) {
	const emission = emitMakefile(config, mode);
	io.output(emission.stdout);
	await writeEmission(emission, config.cwd);
	return 0;
}

async function test(config: ToolConfig, io: Io) {
	const lock = await acquireLock(config.script);
	if (!lock) {
		io.error(`Recursive usage of ${lockPath(config.modulePath)}\n`);
		return 0;
	}
	try {
		const interactive = await runInteractiveExamples(interactiveExamples(config), config.scope, config.timeout);
		io.output(`All ${interactive} interactive usage examples PASS\n`);

		const commands = await runCommandExamples(buildCommands(config.epilog, { heading: 'Examples:' }), config);
		io.output(`All ${commands} command usage examples PASS\n`);
		return 0;
	} finally {
		await lock.release();
	}
}

async function shTest(file: string, config: ToolConfig, io: Io) {
	const fullpath	= path.resolve(config.cwd, file);
	const text		= await fs.promises.readFile(fullpath, 'utf8');
	const lock		= await acquireLock(fullpath);
	if (!lock) {
		io.error(`Recursive usage of ${lockPath(file)}\n`);
		return 0;
	}
	try {
		const commands = await runCommandExamples(buildCommands(text), config);
		io.output(`All ${commands} command usage examples PASS\n`);
		return 0;
	} catch (error) {
		if (error instanceof Error)
			throw new Error(`${file} ${error.message}`, { cause: error });
		throw error;
	} finally {
		await lock.release();
	}
}

export function configValue(config: ToolConfig, name: string): string | number | boolean | undefined {
	let value: unknown = config;
	for (const key of name.split('.')) {
		if (typeof value !== 'object' || value === null || !Object.hasOwn(value, key))
			return undefined;
		value = Reflect.get(value, key);
	}
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')
		return value;
}

function inline(name: string, config: ToolConfig, io: Io) {
	const value = configValue(config, name);
	if (value === undefined) {
		io.error(`No configuration value named ${name}\n`);
		return 1;
	}
	io.output(`${value}\n`);
	return 0;
}

const pathAdvice: Record<'posix' | 'win32', string> = {
	posix:	`echo 'export PATH=".:$PATH"' >> ~/.bashrc && . ~/.bashrc`,
	win32:	'setx PATH ".;%PATH%"',
};

async function shebang(config: ToolConfig, io: Io) {
	const text		= await fs.promises.readFile(config.script, 'utf8');
	const m			= /^(#![^\r\n]*)(\r?\n)?/.exec(text);
	const eol		= /\r?\n/.exec(text)?.[0] ?? '\n';
	const current	= m?.[1];
	const body		= m ? text.slice(m[0].length) : text;

	if (current !== config.shebang || eol !== '\n') {
		await fs.promises.writeFile(config.script, `${config.shebang}\n${body}`);
		io.output(`# ${config.modulePath} now starts with ${config.shebang}\n`);
	}
	if (eol === '\r\n')
		io.output('# Consider using LF line endings after a shebang, for example:\ngit config --global core.autocrlf input\n');

	const win32 = config.platform === 'win32';
	if (!win32 && !await fs.promises.access(config.script, fs.constants.X_OK).then(() => true, () => false)) {
		const stat = await fs.promises.stat(config.script);
		await fs.promises.chmod(config.script, (stat.mode & 0o7777) | 0o755);
		io.output(`# ${config.modulePath} is now executable\n`);
	}

	const delimiter = win32 ? ';' : ':';
	if (!(config.env.PATH ?? '').split(delimiter).includes('.'))
		io.output(`# Put . on PATH to run ${config.moduleFile} without a directory:\n${pathAdvice[win32 ? 'win32' : 'posix']}\n`);
	return 0;
}

//-----------------------------------------------------------------------------
// cli
//-----------------------------------------------------------------------------

export async function dispatch(invocation: Invocation, config: ToolConfig, io: Io = stdio): Promise<number | undefined> {
	const command = invocation.command;
	if (!command)
		return undefined;
	if (invocation.timeout !== undefined)
		config = { ...config, timeout: invocation.timeout };

	switch (command.kind) {
		case 'emit':	return emit(command.mode, config, io);
		case 'test':	return test(config, io);
		case 'sh-test':	return shTest(command.file, config, io);
		case 'inline':	return inline(command.name, config, io);
		case 'shebang':	return shebang(config, io);
		case 'help':	io.output(usage(config)); return 0;
	}
}

export interface Outcome {
	exit?:	number;			// undefined when no action ran
	rest:	string[];
}

export async function cli(args: string[], config: ToolConfig, io: Io = stdio): Promise<Outcome> {
	try {
		const invocation = parseCommand(args);
		return { exit: await dispatch(invocation, config, io), rest: invocation.rest };
	} catch (error) {
		io.error(`${error instanceof Error ? error.message : String(error)}\n`);
		return { exit: 1, rest: [] };
	}
}
