import { cli, stdio, type Io, type Outcome } from './cli';
import { loadConfig, type HostOptions, type ProcessContext, type ToolConfig } from './config';

export { buildCommands, section, splitComment, CommandScanner } from './extract';
export type { CommandGroup, ExtractOptions } from './extract';
export { emitMakefile, writeEmission, formatRule, genericHeader } from './emit';
export type { BuildKind, BuildMode, Emission, DepFile, PendingRule } from './emit';
export { runCommandExamples, runShell, matchesExpected, ellipsisPattern, acquireLock } from './verify';
export type { RunContext, ShellResult, Lock } from './verify';
export { parseInteractive, runInteractiveExamples } from './doctest';
export type { InteractiveExample } from './doctest';
export { loadConfig, defaultToolchains, defaultTimeout } from './config';
export type { HostOptions, ProcessContext, ToolConfig, Toolchain, Toolchains } from './config';
export { cli, dispatch, parseCommand, usage, stdio } from './cli';
export type { Command, Invocation, Io, Outcome } from './cli';
export * from './errors';

/**
 * A host tool's view of its own documentation.
 * `run` performs at most one action; `main` also exits the process when it did.
 */
export class SelfMake {
	constructor(public readonly config: ToolConfig, public io: Io = stdio) {}

	static async load(options?: HostOptions, context?: ProcessContext): Promise<SelfMake> {
		return new SelfMake(await loadConfig(options, context));
	}

	// the arguments after the script
	get args() {
		return this.config.argv.slice(1);
	}

	run(args: string[] = this.args): Promise<Outcome> {
		return cli(args, this.config, this.io);
	}

	async main(args: string[] = this.args): Promise<string[]> {
		const outcome = await this.run(args);
		if (outcome.exit !== undefined)
			process.exit(outcome.exit);
		return outcome.rest;
	}
}

// Call first thing in a tool; resolves to the arguments the tool should handle itself
export async function selfmake(options?: HostOptions): Promise<string[]> {
	return (await SelfMake.load(options)).main();
}
