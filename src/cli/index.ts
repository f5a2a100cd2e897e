#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger';
import { EnvKeepError } from '../utils/errors';
import { loadConfig, mergeWithCliOptions, environmentsDir, generateExampleConfig } from '../utils/config';
import { ask } from './prompt';
import {
	formatAddResult,
	formatAdvisories,
	formatAnalyticsAsTable,
	formatCleanupResult,
	formatConsistencyReport,
	formatFreezeListing,
	formatListAsTable,
	formatLockResult,
	formatPlanAsTable,
	formatSummaryAsTable,
	formatThawResult,
	output,
	OutputFormat,
} from '../utils/formatter';
import { describeReason } from '../core/cleanup-planner';
import { EnvironmentService } from '../core/environment-service';
import { FileMetadataStore } from '../core/file-store';
import { getManager } from '../managers';
import { BackendKind, CleanupMode, EnvironmentAnalytics, HealthTier, Result } from '../types';

// Simple spinner for progress indication
class Spinner {
	private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
	private current = 0;
	private interval: NodeJS.Timeout | null = null;
	private text: string;

	constructor(text: string) {
		this.text = text;
	}

	start(): void {
		process.stderr.write('\x1B[?25l'); // Hide cursor
		this.interval = setInterval(() => {
			process.stderr.write(`\r${chalk.cyan(this.frames[this.current])} ${this.text}`);
			this.current = (this.current + 1) % this.frames.length;
		}, 80);
	}

	succeed(text?: string): void {
		this.stop();
		console.error(`\r${chalk.green('✓')} ${text || this.text}`);
	}

	fail(text?: string): void {
		this.stop();
		console.error(`\r${chalk.red('✗')} ${text || this.text}`);
	}

	private stop(): void {
		if (this.interval) {
			clearInterval(this.interval);
			this.interval = null;
		}
		process.stderr.write('\x1B[?25h'); // Show cursor
		process.stderr.write('\r\x1B[K'); // Clear line
	}
}

type GlobalOptions = {
	quiet?: boolean;
	verbose?: boolean;
	format?: string;
	home?: string;
	backend?: string;
};

interface Context {
	service: EnvironmentService;
	format: OutputFormat;
	quiet: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
	return value === 'table' || value === 'json' || value === 'yaml';
}

function isBackendKind(value: string): value is BackendKind {
	return value === BackendKind.UV || value === BackendKind.VENV;
}

function parseFormat(value: string): OutputFormat {
	if (!isOutputFormat(value)) throw new InvalidArgumentError('Expected table, json or yaml.');
	return value;
}

function parseBackend(value: string): BackendKind {
	if (!isBackendKind(value)) throw new InvalidArgumentError('Expected uv or venv.');
	return value;
}

function parseCount(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
	return parsed;
}

function createContext(cmd: Command): Context {
	const g = cmd.optsWithGlobals<GlobalOptions>();
	const { config: fileConfig } = loadConfig();
	const config = mergeWithCliOptions(fileConfig, {
		home: g.home,
		backend: g.backend && isBackendKind(g.backend) ? g.backend : undefined,
		format: g.format && isOutputFormat(g.format) ? g.format : undefined,
		quiet: g.quiet || undefined,
		verbose: g.verbose || undefined,
	});
	if (config.verbose) logger.setLevel('debug');
	else if (config.quiet) logger.setLevel('error');

	const envsDir = environmentsDir(config);
	const service = new EnvironmentService({
		store: new FileMetadataStore(envsDir),
		backend: getManager(config.backend, envsDir),
		healthPolicy: config.health,
		cleanupPolicy: config.cleanup,
	});
	return { service, format: config.format, quiet: config.quiet };
}

/**
 * Report a failed result and exit
 */
function exitWith(error: EnvKeepError): never {
	logger.error(error.message, error);
	const where = error.details?.path;
	if (typeof where === 'string' && error.code !== 'NOT_FOUND') {
		console.error(chalk.gray(`  at ${where}`));
	}
	process.exit(1);
}

function unwrap<T>(result: Result<T>): T {
	if (!result.ok) exitWith(result.error);
	return result.value;
}

const HEALTH_ORDER: Record<HealthTier, number> = {
	[HealthTier.NEEDS_ATTENTION]: 0,
	[HealthTier.WARNING]: 1,
	[HealthTier.HEALTHY]: 2,
};

function sortEnvironments(envs: EnvironmentAnalytics[], sortBy: string): EnvironmentAnalytics[] {
	const byName = (a: EnvironmentAnalytics, b: EnvironmentAnalytics) => a.name.localeCompare(b.name);
	const sorted = [...envs];
	switch (sortBy) {
		case 'usage':
			return sorted.sort((a, b) => b.usageCount - a.usageCount || byName(a, b));
		case 'last-used':
			return sorted.sort((a, b) => (b.lastUsed?.getTime() ?? 0) - (a.lastUsed?.getTime() ?? 0) || byName(a, b));
		case 'health':
			return sorted.sort((a, b) => HEALTH_ORDER[a.health] - HEALTH_ORDER[b.health] || byName(a, b));
		default:
			return sorted.sort(byName);
	}
}

const program = new Command();
program
	.name('envkeep')
	.description('Track, analyze, clean up and lock Python virtual environments')
	.version('0.3.0')
	.option('-q, --quiet', 'Minimal output', false)
	.option('-v, --verbose', 'Verbose logging', false)
	.option('-f, --format <format>', 'Output format: table|json|yaml', parseFormat)
	.option('--home <dir>', 'envkeep home directory (default: $ENVKEEP_HOME or ~/.envkeep)')
	.option('--backend <backend>', 'Environment backend: uv|venv', parseBackend);

program
	.command('create')
	.description('Create an environment and its metadata')
	.argument('<name>', 'Environment name')
	.option('-p, --python <version>', 'Python version', '3.12')
	.option('-d, --description <text>', 'Description')
	.option('-t, --tags <tags...>', 'Tags')
	.action(async (name: string, opts: { python: string; description?: string; tags?: string[] }, cmd: Command) => {
		const ctx = createContext(cmd);
		const spinner = !ctx.quiet && ctx.format === 'table' ? new Spinner(`Creating environment '${name}'...`) : null;
		spinner?.start();

		const result = await ctx.service.create(name, opts.python, { description: opts.description, tags: opts.tags });
		if (!result.ok) {
			spinner?.fail(`Failed to create '${name}'`);
			exitWith(result.error);
		}
		spinner?.succeed(`Created '${name}' (Python ${opts.python})`);
		if (ctx.format !== 'table') output(result.value, ctx.format, () => '');
	});

program
	.command('remove')
	.description('Remove an environment and its metadata')
	.argument('<name>', 'Environment name')
	.option('-y, --yes', 'Do not ask for confirmation', false)
	.option('--force', 'Skip confirmation and also remove half-present or corrupt environments', false)
	.action(async (name: string, opts: { yes: boolean; force: boolean }, cmd: Command) => {
		const ctx = createContext(cmd);
		if (!opts.yes && !opts.force && !(await ask(`Remove environment '${name}'?`))) {
			logger.info('Aborted; nothing was removed.');
			return;
		}
		unwrap(await ctx.service.remove(name, { force: opts.force }));
		logger.success(`Removed '${name}'`);
	});

program
	.command('list')
	.description('List environments with usage and health')
	.option('-s, --sort-by <field>', 'name|usage|last-used|health', 'name')
	.option('--refresh-size', 'Rescan environment sizes', false)
	.action(async (opts: { sortBy: string; refreshSize: boolean }, cmd: Command) => {
		const ctx = createContext(cmd);
		if (opts.refreshSize) {
			for (const record of unwrap(await ctx.service.list())) {
				const refreshed = await ctx.service.refreshSize(record.name);
				if (!refreshed.ok) logger.warn(refreshed.error.message);
			}
		}
		const envs = sortEnvironments(unwrap(await ctx.service.overview()), opts.sortBy);
		output(envs, ctx.format, formatListAsTable);
	});

program
	.command('activate')
	.description('Record an activation and print the activation script path')
	.argument('<name>', 'Environment name')
	.action(async (name: string, _opts: unknown, cmd: Command) => {
		const ctx = createContext(cmd);
		const { activationScript } = unwrap(await ctx.service.activate(name));
		console.log(activationScript);
	});

program
	.command('edit')
	.description('Edit description, tags or project root')
	.argument('<name>', 'Environment name')
	.option('-d, --description <text>', 'Set the description')
	.option('--clear-description', 'Remove the description', false)
	.option('--add-tag <tags...>', 'Add tags')
	.option('--remove-tag <tags...>', 'Remove tags')
	.option('--project-root <path>', 'Associate a project directory')
	.option('--clear-project-root', 'Remove the project association', false)
	.action(
		async (
			name: string,
			opts: {
				description?: string;
				clearDescription: boolean;
				addTag?: string[];
				removeTag?: string[];
				projectRoot?: string;
				clearProjectRoot: boolean;
			},
			cmd: Command
		) => {
			const ctx = createContext(cmd);
			const record = unwrap(
				await ctx.service.edit(name, {
					description: opts.clearDescription ? null : opts.description,
					addTags: opts.addTag,
					removeTags: opts.removeTag,
					projectRoot: opts.clearProjectRoot ? null : opts.projectRoot ? path.resolve(opts.projectRoot) : undefined,
				})
			);
			if (ctx.format === 'table') logger.success(`Updated '${name}'`);
			else output(record, ctx.format, () => '');
		}
	);

program
	.command('analytics')
	.description('Show usage analytics for one environment, or a summary of all')
	.argument('[name]', 'Environment name')
	.option('--refresh-size', 'Rescan the environment size', false)
	.action(async (name: string | undefined, opts: { refreshSize: boolean }, cmd: Command) => {
		const ctx = createContext(cmd);
		if (name) {
			output(unwrap(await ctx.service.analytics(name, { refreshSize: opts.refreshSize })), ctx.format, formatAnalyticsAsTable);
		} else {
			output(unwrap(await ctx.service.summary()), ctx.format, formatSummaryAsTable);
		}
	});

program
	.command('status')
	.description('Show an overview of environment utility')
	.action(async (_opts: unknown, cmd: Command) => {
		const ctx = createContext(cmd);
		output(unwrap(await ctx.service.summary()), ctx.format, formatSummaryAsTable);
	});

program
	.command('cleanup')
	.description('Remove unused environments (asks for each one unless --force)')
	.option('--dry-run', 'Show what would be removed without removing anything', false)
	.option('--force', 'Remove every candidate without asking', false)
	.option('--low-usage', 'Also remove environments used only a few times', false)
	.option('--unused-for <days>', 'Days without use before an environment qualifies', parseCount)
	.action(async (opts: { dryRun: boolean; force: boolean; lowUsage: boolean; unusedFor?: number }, cmd: Command) => {
		const ctx = createContext(cmd);
		const plan = unwrap(
			await ctx.service.planCleanup({
				...(opts.lowUsage ? { includeLowUsage: true } : {}),
				...(opts.unusedFor !== undefined ? { unusedDays: opts.unusedFor } : {}),
			})
		);

		if (!plan.length) {
			output(plan, ctx.format, formatPlanAsTable);
			return;
		}
		if (ctx.format === 'table') console.log(formatPlanAsTable(plan));

		const mode: CleanupMode = opts.dryRun ? 'dry-run' : opts.force ? 'force' : 'interactive';
		const result = unwrap(
			await ctx.service.executeCleanup(plan, {
				mode,
				confirm: (candidate) => ask(`Remove '${candidate.name}' (${candidate.reasons.map(describeReason).join(', ')})?`),
			})
		);
		output(result, ctx.format, formatCleanupResult);
		if (result.failed.length) process.exitCode = 1;
	});

program
	.command('add')
	.description('Install packages into an environment and track them')
	.argument('<name>', 'Environment name')
	.argument('<packages...>', 'Requirement specs, e.g. requests or "django>=4.2"')
	.action(async (name: string, packages: string[], _opts: unknown, cmd: Command) => {
		const ctx = createContext(cmd);
		const spinner = !ctx.quiet && ctx.format === 'table' ? new Spinner(`Installing into '${name}'...`) : null;
		spinner?.start();

		const result = await ctx.service.addPackages(name, packages);
		if (!result.ok) {
			spinner?.fail(`Failed to install into '${name}'`);
			exitWith(result.error);
		}
		spinner?.succeed(`Installed ${packages.length} package(s)`);
		output(result.value, ctx.format, (record) => formatAddResult(record, packages));
	});

program
	.command('freeze')
	.description('Show the packages installed in an environment')
	.argument('<name>', 'Environment name')
	.option('--tracked-only', 'Only packages added with `envkeep add`', false)
	.action(async (name: string, opts: { trackedOnly: boolean }, cmd: Command) => {
		const ctx = createContext(cmd);
		output(unwrap(await ctx.service.freeze(name, { trackedOnly: opts.trackedOnly })), ctx.format, formatFreezeListing);
	});

program
	.command('lock')
	.description('Generate a lockfile for the environment')
	.argument('<name>', 'Environment name')
	.action(async (name: string, _opts: unknown, cmd: Command) => {
		const ctx = createContext(cmd);
		const spinner = !ctx.quiet && ctx.format === 'table' ? new Spinner(`Generating lockfile for '${name}'...`) : null;
		spinner?.start();

		const result = await ctx.service.lock(name);
		if (!result.ok) {
			spinner?.fail(`Failed to generate lockfile for '${name}'`);
			exitWith(result.error);
		}
		spinner?.succeed('Lockfile generated');
		const { snapshot, location } = result.value;
		output(snapshot, ctx.format, (s) => formatLockResult(s, location));
	});

program
	.command('thaw')
	.description('Reinstall the exact package set from the lockfile')
	.argument('<name>', 'Environment name')
	.option('-y, --yes', 'Proceed despite Python version or platform differences', false)
	.action(async (name: string, opts: { yes: boolean }, cmd: Command) => {
		const ctx = createContext(cmd);
		const outcome = unwrap(
			await ctx.service.thaw(name, {
				proceedWithAdvisories: async (advisories) => {
					console.error(formatAdvisories(advisories));
					return opts.yes || ask('Continue anyway?');
				},
			})
		);
		output(outcome, ctx.format, (o) => formatThawResult(o.plan, o.installed));
	});

program
	.command('check')
	.description('Report metadata and environments that do not match up')
	.action(async (_opts: unknown, cmd: Command) => {
		const ctx = createContext(cmd);
		const issues = unwrap(await ctx.service.checkConsistency());
		output(issues, ctx.format, formatConsistencyReport);
		if (issues.length) process.exitCode = 1;
	});

const configCommand = program.command('config').description('Manage envkeep configuration');

configCommand
	.command('init')
	.description('Write an example .envkeeprc.yaml to the current directory')
	.option('--force', 'Overwrite an existing file', false)
	.action((opts: { force: boolean }) => {
		const target = path.join(process.cwd(), '.envkeeprc.yaml');
		if (fs.existsSync(target) && !opts.force) {
			logger.error(`${target} already exists (use --force to overwrite)`);
			process.exit(1);
		}
		fs.writeFileSync(target, generateExampleConfig(), 'utf-8');
		logger.success(`Wrote ${target}`);
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	logger.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
