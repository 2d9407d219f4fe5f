#!/usr/bin/env node
/**
 * Keep a tool's documentation honest: turn its Dependencies into Make bringup
 * rules, and run its usage examples as tests.
 *
 *	>>> buildCommands('$ echo hi\nhi').map(group => group.output)
 *	[ [ 'hi' ] ]
 *	>>> matchesExpected('total ... files', 'total 12 files\n')
 *	true
 *
 * Dependencies:
 * diff
 */

import { buildCommands } from './extract';
import { matchesExpected } from './verify';
import { loadConfig } from './config';
import { cli, stdio } from './cli';
import { selfEpilog } from './selfHost';

if (require.main === module) {
	loadConfig({ script: __filename, epilog: selfEpilog(__filename), scope: { buildCommands, matchesExpected } })
		.then(config => cli(config.argv.slice(1), config))
		.then(({exit, rest}) => {
			if (exit === undefined) {
				for (const arg of rest)
					stdio.error(`Warning: ignoring unsupported option: ${arg}\n`);
				stdio.error('selfmake: nothing to do; try --help\n');
				exit = 2;
			}
			process.exit(exit);
		})
		.catch(error => {
			stdio.error(`${error}\n`);
			process.exit(1);
		});
}
