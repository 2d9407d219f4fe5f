// Make text always uses forward slashes, whatever the host platform

export interface ParsedPath {
	dir:	string;
	base:	string;
	name:	string;
	ext:	string;
}

export const sep	= '/';

export function fix(path: string): string {
	return path.replace(/\\/g, sep);
}

function parts(path: string): string[] {
	return fix(path).split(sep).filter(i => i && i !== '.');
}

export function relative(from: string, to: string): string {
	const fromParts = parts(from);
	const toParts	= parts(to);

	let i = 0;
	while (i < fromParts.length && i < toParts.length && fromParts[i] === toParts[i])
		++i;

	return [...Array<string>(fromParts.length - i).fill('..'), ...toParts.slice(i)].join(sep);
}

// [dir, base] with an empty dir when the path has none
export function split(path: string): [string, string] {
	path = fix(path);
	const i = path.lastIndexOf(sep);
	return i === -1 ? ['', path] : [path.slice(0, i) || sep, path.slice(i + 1)];
}

export function parse(path: string): ParsedPath {
	const [dir, base]	= split(path);
	const dot			= base.lastIndexOf('.');
	return {
		dir,
		base,
		name:	dot > 0 ? base.slice(0, dot) : base,
		ext:	dot > 0 ? base.slice(dot) : ''
	};
}
