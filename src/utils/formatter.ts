/**
 * Output formatting utilities for the envkeep CLI
 * Provides human-readable, JSON, and YAML output formats
 */
import chalk from 'chalk';
import YAML from 'yaml';
import {
    Advisory,
    CleanupCandidate,
    CleanupResult,
    ConsistencyIssue,
    EnvironmentAnalytics,
    EnvironmentRecord,
    FreezeListing,
    HealthTier,
    LockSnapshot,
    ThawPlan,
    UsageSummary,
} from '../types';
import { describeReason } from '../core/cleanup-planner';
import { describeAdvisory } from '../core/lockfile';
import { USAGE_CATEGORIES } from '../core/analytics';

export type OutputFormat = 'table' | 'json' | 'yaml';

/**
 * Format bytes into a human-readable string
 */
export function formatBytes(bytes: number): string {
    if (bytes === 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Truncate a path to fit within maxLen characters
 */
export function truncatePath(pathStr: string, maxLen: number): string {
    if (pathStr.length <= maxLen) return pathStr;
    const ellipsis = '...';
    const start = Math.floor((maxLen - ellipsis.length) / 3);
    const end = maxLen - ellipsis.length - start;
    return pathStr.slice(0, start) + ellipsis + pathStr.slice(-end);
}

export function formatDate(date: Date | null): string {
    return date ? date.toISOString().slice(0, 10) : 'Never';
}

export function formatDays(days: number): string {
    return Number.isFinite(days) ? `${days}d` : '-';
}

/**
 * Get color for a health tier
 */
function getHealthColor(tier: HealthTier): chalk.Chalk {
    switch (tier) {
        case HealthTier.HEALTHY:
            return chalk.green;
        case HealthTier.WARNING:
            return chalk.yellow;
        case HealthTier.NEEDS_ATTENTION:
            return chalk.red;
    }
}

/**
 * Get human-readable health text
 */
export function formatHealth(tier: HealthTier): string {
    switch (tier) {
        case HealthTier.HEALTHY:
            return 'Healthy';
        case HealthTier.WARNING:
            return 'Warning';
        case HealthTier.NEEDS_ATTENTION:
            return 'Needs attention';
    }
}

/**
 * Render the environment list as a table
 */
export function formatListAsTable(envs: EnvironmentAnalytics[]): string {
    if (!envs.length) {
        return chalk.yellow('No environments found. Create one with `envkeep create <name>`.');
    }

    const lines: string[] = [chalk.bold.cyan('\nEnvironments\n')];
    lines.push(
        chalk.bold(
            `${'Name'.padEnd(24)} ${'Python'.padEnd(9)} ${'Health'.padEnd(16)} ${'Uses'.padStart(5)} ${'Last used'.padEnd(11)} ${'Size'.padEnd(10)} Tags`
        )
    );
    lines.push('─'.repeat(100));

    for (const env of envs) {
        const color = getHealthColor(env.health);
        const name = env.name.slice(0, 23).padEnd(24);
        const python = env.pythonVersion.slice(0, 8).padEnd(9);
        const health = formatHealth(env.health).padEnd(16);
        const uses = String(env.usageCount).padStart(5);
        const lastUsed = formatDate(env.lastUsed).padEnd(11);
        const size = (env.sizeBytes === null ? '-' : formatBytes(env.sizeBytes)).padEnd(10);
        lines.push(
            `${chalk.green(name)} ${chalk.cyan(python)} ${color(health)} ${uses} ${chalk.gray(lastUsed)} ${chalk.yellow(size)} ${env.tags.join(', ')}`
        );
    }

    lines.push(chalk.bold(`\n${envs.length} environment${envs.length === 1 ? '' : 's'}`));
    return lines.join('\n');
}

/**
 * Render analytics for a single environment
 */
export function formatAnalyticsAsTable(env: EnvironmentAnalytics): string {
    const rows: Array<[string, string]> = [
        ['Python Version', env.pythonVersion],
        ['Created', formatDate(env.createdAt)],
        ['Last Used', formatDate(env.lastUsed)],
        ['Days Since Used', Number.isFinite(env.daysSinceUse) ? String(env.daysSinceUse) : 'N/A'],
        ['Age (days)', String(env.ageDays)],
        ['Usage Count', String(env.usageCount)],
        ['Uses per Day', env.usageFrequency.toFixed(2)],
        ['Health', getHealthColor(env.health)(formatHealth(env.health))],
        ['Size', env.sizeBytes === null ? 'Unknown' : formatBytes(env.sizeBytes)],
    ];
    if (env.projectRoot) rows.push(['Project Root', truncatePath(env.projectRoot, 60)]);

    const lines = [chalk.bold.cyan(`\nAnalytics for '${env.name}'\n`)];
    for (const [metric, value] of rows) {
        lines.push(`  ${chalk.cyan(metric.padEnd(18))} ${value}`);
    }
    if (env.tags.length) lines.push(`\n${chalk.blue('Tags:')} ${env.tags.join(', ')}`);
    if (env.description) lines.push(`\n${chalk.blue('Description:')} ${env.description}`);
    return lines.join('\n');
}

/**
 * Render the usage summary (analytics without a name, and status)
 */
export function formatSummaryAsTable(summary: UsageSummary): string {
    const lines = [chalk.bold.cyan('\nEnvironment Usage Summary\n')];
    const total = summary.totalEnvironments;

    lines.push(`  ${chalk.cyan('Total Environments'.padEnd(22))} ${chalk.green(String(total))}`);
    lines.push(`  ${chalk.cyan('Active Environments'.padEnd(22))} ${chalk.green(String(total - summary.unusedEnvironments))}`);
    lines.push(`  ${chalk.cyan('Unused Environments'.padEnd(22))} ${chalk.green(String(summary.unusedEnvironments))}`);
    if (total > 0) {
        lines.push(`  ${chalk.cyan('Efficiency'.padEnd(22))} ${chalk.green(`${summary.efficiencyPercent}%`)}`);
    }

    if (total > 0) {
        lines.push(chalk.bold('\nUsage Category'.padEnd(24) + 'Count'.padStart(6) + 'Share'.padStart(9)));
        for (const category of USAGE_CATEGORIES) {
            const count = summary.environmentsByUsage[category] ?? 0;
            if (!count) continue;
            const share = ((count / total) * 100).toFixed(1) + '%';
            lines.push(`${category.padEnd(23)}${String(count).padStart(6)}${chalk.yellow(share.padStart(9))}`);
        }
    }

    if (summary.mostUsed.length) {
        lines.push(chalk.bold.blue('\nMost Active Environments:'));
        summary.mostUsed.forEach((env, i) => {
            lines.push(`  ${i + 1}. ${chalk.cyan(env.name)} - ${env.usageCount} uses, last used: ${formatDate(env.lastUsed)}`);
        });
    }

    if (summary.unusedEnvironments > 0) {
        lines.push(
            chalk.yellow(
                `\nFound ${summary.unusedEnvironments} unused environment(s). Consider running \`envkeep cleanup --dry-run\` to review.`
            )
        );
    }
    if (summary.totalSizeBytes > 0) {
        lines.push(chalk.blue(`\nTotal disk usage: ${formatBytes(summary.totalSizeBytes)}`));
    }
    return lines.join('\n');
}

/**
 * Format cleanup plan as a human-readable table
 */
export function formatPlanAsTable(plan: CleanupCandidate[]): string {
    const lines = [chalk.bold.cyan('\nCleanup Plan\n')];

    if (!plan.length) {
        lines.push(chalk.green('✓ No environments identified for cleanup!'));
        return lines.join('\n');
    }

    for (const candidate of plan) {
        lines.push(`  ${chalk.red('•')} ${chalk.bold(candidate.name.padEnd(24))} ${chalk.gray(formatDays(candidate.daysSinceUse).padStart(6))}  ${candidate.reasons.map(describeReason).join(', ')}`);
    }

    lines.push(chalk.bold.green(`\nSummary`));
    lines.push(`   ${chalk.bold('Candidates:')} ${plan.length}`);
    return lines.join('\n');
}

/**
 * Format cleanup execution result
 */
export function formatCleanupResult(result: CleanupResult): string {
    const lines = [chalk.bold.cyan('\nCleanup Results\n')];

    if (result.mode === 'dry-run') {
        lines.push(chalk.yellow(`Dry run: ${result.wouldRemove.length} environment(s) would be removed, freeing ${formatBytes(result.spaceFreed)}`));
        for (const name of result.wouldRemove) {
            lines.push(`  ${chalk.gray('•')} ${name}`);
        }
        return lines.join('\n');
    }

    for (const name of result.removed) {
        lines.push(chalk.green('✓') + ` Removed: ${chalk.cyan(name)}`);
    }
    for (const name of result.skipped) {
        lines.push(chalk.gray('-') + ` Kept: ${name}`);
    }
    for (const failure of result.failed) {
        lines.push(chalk.red('✗') + ` ${failure.name}: ${failure.error.message}`);
    }
    lines.push(chalk.bold.green(`\n✓ ${result.removed.length} environment(s) removed, ${formatBytes(result.spaceFreed)} freed`));
    return lines.join('\n');
}

export function formatLockResult(snapshot: LockSnapshot, location: string): string {
    return [
        chalk.green('✓') + ` Lockfile generated for '${chalk.cyan(snapshot.environmentName)}'`,
        `  ${chalk.gray('Packages:')} ${snapshot.dependencies.length}`,
        `  ${chalk.gray('Python:')} ${snapshot.pythonVersion}`,
        `  ${chalk.gray('Path:')} ${location}`,
    ].join('\n');
}

export function formatAdvisories(advisories: Advisory[]): string {
    return advisories.map((advisory) => chalk.yellow(`⚠ ${describeAdvisory(advisory)}`)).join('\n');
}

export function formatThawResult(plan: ThawPlan, installed: boolean): string {
    const lines: string[] = [];
    if (plan.advisories.length) lines.push(formatAdvisories(plan.advisories));
    if (installed) {
        lines.push(chalk.green('✓') + ` Environment '${chalk.cyan(plan.environmentName)}' rebuilt from lockfile (${plan.instructions.length} packages)`);
    } else {
        lines.push(chalk.yellow(`Thaw of '${plan.environmentName}' cancelled; nothing was installed`));
    }
    return lines.join('\n');
}

export function formatAddResult(record: EnvironmentRecord, added: string[]): string {
    return [
        chalk.green('✓') + ` Installed ${added.join(', ')} into '${chalk.cyan(record.name)}'`,
        `  ${chalk.gray('Tracked:')} ${record.trackedPackages.join(', ')}`,
    ].join('\n');
}

/**
 * One requirement per line, so the table form can be redirected to a
 * requirements file.
 */
export function formatFreezeListing(listing: FreezeListing): string {
    if (listing.packages.length > 0) {
        return listing.packages.join('\n');
    }
    if (listing.trackedOnly) {
        return [
            chalk.yellow(`No tracked packages found for environment '${listing.environmentName}'`),
            chalk.gray(`Use \`envkeep add ${listing.environmentName} <package>\` to install and track packages`),
        ].join('\n');
    }
    return chalk.yellow(`No packages installed in '${listing.environmentName}'`);
}

function describeIssue(issue: ConsistencyIssue): string {
    switch (issue.kind) {
        case 'metadata-without-environment':
            return 'metadata exists but the environment is missing';
        case 'environment-without-metadata':
            return 'environment exists but has no metadata';
        case 'corrupt-metadata':
            return `metadata is unreadable (${issue.reason})`;
    }
}

export function formatConsistencyReport(issues: ConsistencyIssue[]): string {
    if (!issues.length) {
        return chalk.green('✓ Metadata and environments are consistent');
    }
    const lines = [chalk.bold.yellow(`\n${issues.length} issue(s) found\n`)];
    for (const issue of issues) {
        lines.push(`  ${chalk.red('✗')} ${chalk.bold(issue.name)}: ${describeIssue(issue)}`);
        lines.push(`    ${chalk.gray(issue.path)}`);
    }
    lines.push(chalk.gray('\nNothing was changed. Use `envkeep remove <name> --force` to clear half-removed environments.'));
    return lines.join('\n');
}

/**
 * Convert to plain JSON values: Dates become ISO strings, Infinity becomes null
 */
export function toPlain(data: unknown): unknown {
    return JSON.parse(JSON.stringify(data, (_key, value: unknown) =>
        typeof value === 'number' && !Number.isFinite(value) ? null : value
    ));
}

/**
 * Format data as JSON
 */
export function formatAsJSON(data: unknown, pretty: boolean = true): string {
    return pretty ? JSON.stringify(toPlain(data), null, 2) : JSON.stringify(toPlain(data));
}

/**
 * Format data as YAML
 */
export function formatAsYAML(data: unknown): string {
    return YAML.stringify(toPlain(data));
}

/**
 * Output data in the specified format; `table` renders with the given function
 */
export function output<T>(data: T, format: OutputFormat, renderTable: (data: T) => string): void {
    switch (format) {
        case 'table':
            console.log(renderTable(data));
            break;
        case 'yaml':
            console.log(formatAsYAML(data));
            break;
        case 'json':
        default:
            console.log(formatAsJSON(data));
    }
}
