/**
 * Configuration Loader for the envkeep CLI
 *
 * Supports loading configuration from:
 * - .envkeeprc (JSON or YAML)
 * - .envkeeprc.json
 * - .envkeeprc.yaml / .envkeeprc.yml
 * - envkeep.config.json
 * - package.json "envkeep" key
 *
 * Configuration is merged with CLI arguments (CLI takes precedence)
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { BackendKind, CleanupPolicy, HealthPolicy } from '../types';
import { DEFAULT_HEALTH_POLICY } from '../core/health';
import { DEFAULT_CLEANUP_POLICY } from '../core/cleanup-planner';
import { logger } from './logger';

const count = z.number().int().nonnegative();

export const EnvKeepConfigSchema = z
    .object({
        /** Directory holding envs/ (default: $ENVKEEP_HOME or ~/.envkeep) */
        home: z.string().min(1),
        /** Tool that materializes environments */
        backend: z.nativeEnum(BackendKind),
        health: z
            .object({
                criticalDays: count,
                staleDays: count,
                lowUsageThreshold: count,
            })
            .partial(),
        cleanup: z
            .object({
                unusedDays: count,
                lowUsageThreshold: count,
                includeLowUsage: z.boolean(),
            })
            .partial(),
        /** Output format preference */
        format: z.enum(['table', 'json', 'yaml']),
        quiet: z.boolean(),
        verbose: z.boolean(),
    })
    .partial();

export type EnvKeepConfig = z.infer<typeof EnvKeepConfigSchema>;

export interface ResolvedConfig {
    home: string;
    backend: BackendKind;
    health: HealthPolicy;
    cleanup: CleanupPolicy;
    format: 'table' | 'json' | 'yaml';
    quiet: boolean;
    verbose: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
    home: path.join(os.homedir(), '.envkeep'),
    backend: BackendKind.UV,
    health: { ...DEFAULT_HEALTH_POLICY },
    cleanup: { ...DEFAULT_CLEANUP_POLICY },
    format: 'table',
    quiet: false,
    verbose: false,
};

/**
 * Configuration file search locations (in order)
 */
const CONFIG_FILES = [
    '.envkeeprc',
    '.envkeeprc.json',
    '.envkeeprc.yaml',
    '.envkeeprc.yml',
    'envkeep.config.json',
];

/**
 * Find configuration file by walking up directory tree
 */
export function findConfigFile(startDir: string): string | null {
    let dir = path.resolve(startDir);
    const root = path.parse(dir).root;

    while (true) {
        for (const filename of CONFIG_FILES) {
            const configPath = path.join(dir, filename);
            if (fs.existsSync(configPath)) {
                return configPath;
            }
        }
        if (dir === root) break;
        dir = path.dirname(dir);
    }

    return null;
}

/**
 * Parse raw configuration from file content
 */
function parseConfigFile(filepath: string): unknown {
    const content = fs.readFileSync(filepath, 'utf-8');
    const ext = path.extname(filepath).toLowerCase();

    if (ext === '.yaml' || ext === '.yml') {
        return yaml.parse(content);
    }

    // JSON files (including .envkeeprc without extension)
    try {
        return JSON.parse(content);
    } catch {
        // If JSON parse fails, try YAML (for extensionless .envkeeprc)
        return yaml.parse(content);
    }
}

/**
 * Check for envkeep key in package.json
 */
function loadFromPackageJson(startDir: string): unknown {
    let dir = path.resolve(startDir);
    const root = path.parse(dir).root;

    while (true) {
        const pkgPath = path.join(dir, 'package.json');
        if (fs.existsSync(pkgPath)) {
            try {
                const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
                if (pkg && typeof pkg === 'object' && 'envkeep' in pkg) {
                    return pkg.envkeep;
                }
            } catch (error) {
                logger.debug(`Skipping unreadable ${pkgPath}: ${String(error)}`);
            }
        }
        if (dir === root) break;
        dir = path.dirname(dir);
    }

    return null;
}

function validate(raw: unknown, source: string): EnvKeepConfig | null {
    const parsed = EnvKeepConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        logger.warn(`Ignoring invalid configuration in ${source}: ${problems}`);
        return null;
    }
    return parsed.data;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(
    cwd: string = process.cwd(),
    env: NodeJS.ProcessEnv = process.env
): { config: ResolvedConfig; source: string | null } {
    let config: ResolvedConfig = {
        ...DEFAULT_CONFIG,
        health: { ...DEFAULT_CONFIG.health },
        cleanup: { ...DEFAULT_CONFIG.cleanup },
    };
    let source: string | null = null;

    // 1. Try to find config file
    const configFile = findConfigFile(cwd);
    if (configFile) {
        try {
            const fileConfig = validate(parseConfigFile(configFile), configFile);
            if (fileConfig) {
                config = mergeConfig(config, fileConfig);
                source = configFile;
            }
        } catch (error) {
            logger.warn(`Failed to parse config file ${configFile}: ${String(error)}`);
        }
    }

    // 2. Check package.json if no config file found
    if (!source) {
        const pkgConfig = loadFromPackageJson(cwd);
        if (pkgConfig) {
            const validated = validate(pkgConfig, 'package.json');
            if (validated) {
                config = mergeConfig(config, validated);
                source = 'package.json';
            }
        }
    }

    // 3. The environment variable beats the file
    if (env.ENVKEEP_HOME) {
        config.home = env.ENVKEEP_HOME;
    }

    return { config, source };
}

function expandHome(dir: string): string {
    if (dir === '~') return os.homedir();
    if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
    return dir;
}

/**
 * Merge configuration objects; nested policies merge key by key
 */
export function mergeConfig(base: ResolvedConfig, override: EnvKeepConfig): ResolvedConfig {
    return {
        home: override.home ? expandHome(override.home) : base.home,
        backend: override.backend ?? base.backend,
        health: { ...base.health, ...override.health },
        cleanup: { ...base.cleanup, ...override.cleanup },
        format: override.format ?? base.format,
        quiet: override.quiet ?? base.quiet,
        verbose: override.verbose ?? base.verbose,
    };
}

/**
 * Merge CLI options with loaded config (CLI takes precedence)
 */
export function mergeWithCliOptions(config: ResolvedConfig, cliOptions: EnvKeepConfig): ResolvedConfig {
    return mergeConfig(config, cliOptions);
}

export function environmentsDir(config: ResolvedConfig): string {
    return path.join(config.home, 'envs');
}

/**
 * Generate example configuration file content
 */
export function generateExampleConfig(): string {
    return `# envkeep configuration
# Place this file as .envkeeprc.yaml in your project or home directory

# Where environments live (envs/ is created below it)
# home: ~/.envkeep

# Tool used to create environments: uv or venv
backend: uv

# Health tiers
health:
  criticalDays: ${DEFAULT_HEALTH_POLICY.criticalDays}
  staleDays: ${DEFAULT_HEALTH_POLICY.staleDays}
  lowUsageThreshold: ${DEFAULT_HEALTH_POLICY.lowUsageThreshold}

# Cleanup candidates
cleanup:
  unusedDays: ${DEFAULT_CLEANUP_POLICY.unusedDays}
  lowUsageThreshold: ${DEFAULT_CLEANUP_POLICY.lowUsageThreshold}
  includeLowUsage: ${DEFAULT_CLEANUP_POLICY.includeLowUsage}

# Output format: table, json, yaml
format: table

# Quiet mode (minimal output)
quiet: false

# Verbose mode (detailed output)
verbose: false
`;
}
