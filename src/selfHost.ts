import * as path from 'path';

// How an example reaches the running script from the script's own directory
export function selfCommand(script: string): string {
	const file = path.basename(script);
	return path.extname(file) === '.ts' ? `npx tsx ${file}` : `node ${file}`;
}

export function selfEpilog(script: string): string {
	return `Examples:
$ printf '$ echo hello\\nhello\\n' > hello.md
$ ${selfCommand(script)} --sh-test hello.md; status=$?; rm -f hello.md; exit $status
All 1 command usage examples PASS`;
}
