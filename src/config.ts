import * as fs from 'fs';
import * as path from 'path';
import * as makePath from './makePath';

// How Make recipes install the host's dependencies
export interface Toolchain {
	install:		string;		// installer prefix, followed by `install <packages>`
	installFlags:	string;
	requires?:		string;		// order-only prerequisite that provides the installer
}

export interface Toolchains {
	plain:			Toolchain;
	generic:		Toolchain;
}

export interface HostOptions {
	script?:		string;
	doc?:			string;
	epilog?:		string;
	scope?:			Record<string, unknown>;
	timeout?:		number;
	runner?:		string;
	shebang?:		string;
	makeTemplate?:	string;
	toolchains?:	Partial<Toolchains>;
}

export interface ProcessContext {
	argv:			string[];
	cwd:			string;
	env:			Record<string, string | undefined>;
	platform:		NodeJS.Platform;
}

/**
 * Everything the extractor, runner and emitter know about the host tool.
 * Built once at startup; nothing downstream reads process globals.
 */
export interface ToolConfig {
	script:			string;		// absolute
	cwd:			string;
	modulePath:		string;		// relative to cwd, forward slashes
	moduleDir:		string;		// '' when the script is in cwd
	moduleFile:		string;
	module:			string;		// moduleFile without its extension
	ext:			string;
	projectName:	string;
	argv:			string[];
	platform:		NodeJS.Platform;
	env:			Record<string, string | undefined>;
	timeout:		number;		// seconds
	doc:			string;
	epilog:			string;
	source?:		string;
	scope:			Record<string, unknown>;
	runner:			string;
	shebang:		string;
	makeTemplate?:	string;
	toolchains:		Toolchains;
}

export const defaultTimeout = 3;

export const defaultToolchains: Toolchains = {
	plain: {
		install:		'npm',
		installFlags:	'--no-save',
	},
	generic: {
		install:		'npm --prefix $(dir $<).',
		installFlags:	'--no-save',
		requires:		'$/node_modules',
	},
};

export function processContext(): ProcessContext {
	return {
		argv:		process.argv,
		cwd:		process.cwd(),
		env:		process.env,
		platform:	process.platform,
	};
}

//-----------------------------------------------------------------------------
// doc comments
//-----------------------------------------------------------------------------

function commentText(body: string): string {
	const lines = body.split(/\r?\n/).map(line => line.replace(/^\s*\* ?/, ''));
	while (lines.length && !lines[0].trim())
		lines.shift();
	while (lines.length && !lines.at(-1)?.trim())
		lines.pop();
	return lines.join('\n');
}

// The /** */ block opening a source file, after any shebang line or compiled "use strict"
export function leadingDocComment(source: string): string | undefined {
	const m = /^(?:#!.*\r?\n)?(?:\s*(["'])use strict\1;?)?\s*\/\*\*([\s\S]*?)\*\//.exec(source);
	if (m)
		return commentText(m[2]);
}

export function docComments(source: string): string[] {
	return [...source.matchAll(/\/\*\*([\s\S]*?)\*\//g)].map(m => commentText(m[1]));
}

//-----------------------------------------------------------------------------
// loadConfig
//-----------------------------------------------------------------------------

export async function loadConfig(options: HostOptions = {}, context: ProcessContext = processContext()): Promise<ToolConfig> {
	const script		= path.resolve(context.cwd, options.script ?? context.argv[1] ?? '');
	const modulePath	= makePath.relative(context.cwd, script);
	const parsed		= makePath.parse(modulePath);
	const source		= await fs.promises.readFile(script, 'utf8').catch(() => undefined);

	return {
		script,
		cwd:			context.cwd,
		modulePath,
		moduleDir:		parsed.dir,
		moduleFile:		parsed.base,
		module:			parsed.name,
		ext:			parsed.ext,
		projectName:	path.basename(context.cwd),
		argv:			context.argv.slice(1),
		platform:		context.platform,
		env:			context.env,
		timeout:		options.timeout ?? defaultTimeout,
		doc:			options.doc ?? (source !== undefined ? leadingDocComment(source) : undefined) ?? '',
		epilog:			options.epilog ?? '',
		source,
		scope:			options.scope ?? {},
		runner:			options.runner ?? 'npx tsx',
		shebang:		options.shebang ?? '#!/usr/bin/env -S npx tsx',
		makeTemplate:	options.makeTemplate,
		toolchains:		{
			plain:		{...defaultToolchains.plain, ...options.toolchains?.plain},
			generic:	{...defaultToolchains.generic, ...options.toolchains?.generic},
		},
	};
}
