import * as fs from 'fs';
import * as path from 'path';
import type { ToolConfig, Toolchain } from './config';
import { buildCommands, type CommandGroup } from './extract';
import { GuardViolation } from './errors';
import * as makePath from './makePath';

export interface PendingRule {
	rule:		string;
	recipe:		string[];
}

export type BuildKind = 'plain' | 'generic';

export interface BuildMode {
	kind:		BuildKind;
	make:		boolean;	// print the rule set, or the generic header
	dep?:		string;		// write the bringup rule into this file instead
}

export interface DepFile {
	path:		string;
	dir:		string;
	text:		string;
}

export interface Emission {
	stdout:		string;
	depFile?:	DepFile;
}

export function formatRule({rule, recipe}: PendingRule): string {
	return recipe.length
		? `${rule}\n\t${recipe.join(' \\\n\t')}\n`
		: `${rule}\n`;
}

function templateFetch(template?: string) {
	return !template					? 'echo "No make.mk found above $(dir $@)" >&2 && false'
		: /^https?:\/\//.test(template)	? `curl -fsSL ${template} -o "$@"`
		: `cp "${template}" "$@"`;
}

export function genericHeader(config: ToolConfig): string {
	return `# ${config.projectName}$ ${config.argv.join(' ')}
_Makefile := $(lastword $(MAKEFILE_LIST))
/ := $(patsubst %build/,%,$(patsubst ./%,%,$(patsubst C:/%,/c/%,$(subst \\,/,$(dir $(_Makefile))))))
$/bringup:

# Bringup and tested targets for every makeable source here come from make.mk
$/make.mk:
	if [ -e "$(dir $@)../make.mk" ]; then \\
	  ln -sf ../make.mk "$@"; \\
	else \\
	  ${templateFetch(config.makeTemplate)}; \\
	fi

-include $/make.mk
`;
}

function orderOnly(toolchain: Toolchain) {
	return toolchain.requires ? ` | ${toolchain.requires}` : '';
}

function checkDepFile(dep: string, file: string) {
	if (dep.startsWith('__'))
		throw new GuardViolation(`Reserved dependency file name: ${dep}`);

	const base = makePath.split(dep)[1];
	if ([file, `${file}.bringup`, `${file}.tested`, `${file}.shebang`].includes(base))
		throw new GuardViolation(`Dependency file ${dep} collides with a target of ${file}`);
}

// Each group's output goes into the bringup target itself, the first truncating it
export function bringupRecipe(groups: CommandGroup[]): string[] {
	const recipe: string[] = [];
	let op = '>';
	for (const [i, {commands}] of groups.entries()) {
		const glue = i < groups.length - 1 ? ' &&' : '';
		recipe.push(...commands.slice(0, -1), `${commands.at(-1) ?? ''} ${op} $@${glue}`);
		op = '>>';
	}
	return recipe;
}

//-----------------------------------------------------------------------------
// emitMakefile
//-----------------------------------------------------------------------------

export function emitMakefile(config: ToolConfig, mode: BuildMode): Emission {
	const generic	= mode.kind === 'generic';
	const file		= config.moduleFile;
	const toolchain	= config.toolchains[mode.kind];

	let dep			= mode.dep;
	let depDir		= 'build/';
	let depFilename	= `${file}.mk`;
	let buildDir	= 'build/';

	if (dep) {
		checkDepFile(dep, file);
		[depDir, depFilename] = makePath.split(dep);
		buildDir = depDir && !depDir.endsWith('/') ? depDir + '/' : depDir;
		if (buildDir.startsWith('_/'))
			buildDir = buildDir.slice(2);
	} else if (generic) {
		dep = `build/${depFilename}`;
	}

	const stdout: string[]	= [];
	const rules: PendingRule[]	= [];
	const source	= generic ? '$<' : config.modulePath;
	const srcFile	= generic ? `$/${file}` : config.modulePath;

	if (generic) {
		buildDir = '$/build/';
		if (mode.make)
			stdout.push(genericHeader(config));

	} else {
		if (mode.make) {
			const mkDep = dep ? ` ${buildDir}${depFilename}` : '';
			rules.push(
				{ rule: `bringup: ${buildDir}${file}.bringup`, recipe: [] },
				{ rule: `tested: ${buildDir}${file}.tested`, recipe: [] },
				{ rule: `${buildDir}${file}.tested: ${srcFile} ${buildDir}${file}.shebang${mkDep}`, recipe: [`${source} --test > $@`] },
				{ rule: `${buildDir}${file}.shebang: ${srcFile} ${buildDir}${file}.bringup`, recipe: [`${config.runner} ${source} --shebang > $@`] },
			);
		}
		if (dep)
			rules.push({ rule: `${buildDir}${depFilename}: ${srcFile}${orderOnly(toolchain)}`, recipe: [`${config.runner} ${source} --dep $@ > /dev/null`] });
	}

	const groups = buildCommands(config.doc, {
		heading:	'Dependencies:',
		embed:		generic ? '( cd $(dir $<). && %s' : '%s',
		end:		generic ? ' )' : '',
		pip:		toolchain.install,
		pipFlags:	toolchain.installFlags,
	});

	const recipe = bringupRecipe(groups);
	if (!recipe.length)
		recipe.push('touch $@');
	if (!dep)
		recipe.unshift(`mkdir -p ${buildDir} &&`);

	const depTarget	= dep ? ` ${buildDir}${depFilename}` : '';
	const bringup	= { rule: `${buildDir}${file}.bringup: ${srcFile}${depTarget}${orderOnly(toolchain)}`, recipe };
	rules.push(bringup);

	let depFile: DepFile | undefined;
	for (const rule of rules) {
		if (rule === bringup && dep) {
			if (!generic)
				stdout.push(`-include ${buildDir}${depFilename}\n`);
			depFile = { path: dep, dir: depDir, text: formatRule(rule) };
		} else {
			stdout.push(formatRule(rule));
		}
	}

	return { stdout: stdout.join(''), depFile };
}

// Last write wins; a crash mid-write is repaired by the next run
export async function writeEmission(emission: Emission, cwd: string): Promise<void> {
	const depFile = emission.depFile;
	if (depFile) {
		if (depFile.dir)
			await fs.promises.mkdir(path.resolve(cwd, depFile.dir), { recursive: true });
		await fs.promises.writeFile(path.resolve(cwd, depFile.path), depFile.text);
	}
}
