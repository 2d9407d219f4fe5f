//-----------------------------------------------------------------------------
// documentation micro-grammar
//
//	$ command		starts a command group
//	> more			continues the previous command line
//	cmd \			a trailing backslash continues onto the next line too
//	anything else	expected output of the open group, or a package name in pip mode
//-----------------------------------------------------------------------------

export interface CommandGroup {
	readonly commands:	readonly string[];
	readonly comments:	readonly string[];	// one per command line
	readonly output:	readonly string[];
}

export interface ExtractOptions {
	heading?:	string;
	embed?:		string;		// wraps each command at its %s
	end?:		string;		// appended after embedding
	pip?:		string;		// installer prefix; turns bare lines into install commands
	pipFlags?:	string;
}

export const defaultPipFlags = '--no-warn-script-location';

const commentRe = /(\s*#.*)?$/;

export function splitComment(line: string): [command: string, comment: string] {
	const m = commentRe.exec(line);
	return [line.slice(0, m?.index ?? line.length), m?.[1] ?? ''];
}

export function embedCommand(embed: string, command: string): string {
	return embed.replace('%s', () => command);
}

function isHeading(line: string) {
	return /^[^\s$>#].*:\s*$/.test(line);
}

// Lines after the heading line, up to the next unindented heading after a blank line
export function section(doc: string, heading?: string): string[] {
	const lines = doc.split(/\r?\n/);
	if (!heading)
		return lines;

	const start = lines.findIndex(line => line.trimEnd() === heading);
	if (start < 0)
		return [];

	let end = start + 1;
	while (end < lines.length && !(isHeading(lines[end]) && !lines[end - 1].trim()))
		++end;

	return lines.slice(start + 1, end);
}

//-----------------------------------------------------------------------------
// CommandScanner
//-----------------------------------------------------------------------------

interface Draft {
	commands:	string[];
	comments:	string[];
	output:		string[];
}

type ScanState =
	| { kind: 'idle' }
	| { kind: 'command', draft: Draft }
	| { kind: 'output', draft: Draft };

function freeze(draft: Draft): CommandGroup {
	return Object.freeze({
		commands:	Object.freeze([...draft.commands]),
		comments:	Object.freeze([...draft.comments]),
		output:		Object.freeze([...draft.output]),
	});
}

export class CommandScanner {
	private state:	ScanState		= { kind: 'idle' };
	private groups:	CommandGroup[]	= [];

	private embed:		string;
	private end:		string;
	private pip:		string;
	private pipFlags:	string;

	constructor(options: ExtractOptions = {}) {
		this.embed		= options.embed ?? '%s';
		this.end		= options.end ?? '';
		this.pip		= options.pip ?? '';
		this.pipFlags	= options.pipFlags ?? defaultPipFlags;
	}

	private open(command: string, comment: string) {
		this.close();
		this.state = { kind: 'command', draft: { commands: [command], comments: [comment], output: [] } };
	}

	private close() {
		if (this.state.kind !== 'idle')
			this.groups.push(freeze(this.state.draft));
		this.state = { kind: 'idle' };
	}

	private continueWith(draft: Draft, command: string, comment: string) {
		const last = draft.commands.length - 1;
		if (this.end && draft.commands[last].endsWith(this.end))
			draft.commands[last] = draft.commands[last].slice(0, -this.end.length);
		draft.commands.push(command);
		draft.comments.push(comment);
	}

	feed(line: string) {
		let [command, comment] = splitComment(line);

		// a bare marker followed only by a comment
		if ((command === '$' || command === '>') && (!comment || comment.startsWith(' '))) {
			command += ' ';
			comment = comment.slice(1);
		}

		const state = this.state;

		if (command.startsWith('$ ')) {
			if (command.length > 2)
				this.open(embedCommand(this.embed, command.slice(2)) + this.end, comment);

		} else if (command.startsWith('> ')) {
			if (state.kind !== 'idle')
				this.continueWith(state.draft, command.slice(2) + this.end, comment);

		} else if (state.kind === 'command' && state.draft.commands.at(-1)?.endsWith('\\')) {
			this.continueWith(state.draft, embedCommand(this.embed, command) + this.end, comment);

		} else if (state.kind !== 'idle' && !this.pip) {
			state.draft.output.push(line);
			this.state = { kind: 'output', draft: state.draft };

		} else if (command.trim() && this.pip) {
			this.open([this.pip, 'install', command.trim(), this.pipFlags].filter(Boolean).join(' '), comment);
		}
	}

	finish(): CommandGroup[] {
		this.close();
		const groups = this.groups;
		this.groups = [];
		return groups;
	}
}

export function buildCommands(doc: string | undefined, options: ExtractOptions = {}): CommandGroup[] {
	if (!doc)
		return [];

	const scanner = new CommandScanner(options);
	for (const line of section(doc, options.heading))
		scanner.feed(line);
	return scanner.finish();
}
