/**
 * Process helpers shared by the environment backends
 */
import { spawn } from 'child_process';
import * as path from 'path';
import * as fs from 'fs';
import { logger } from './logger';

/**
 * Check if running on Windows
 */
export function isWindows(): boolean {
	return process.platform === 'win32';
}

/**
 * Check if a file exists at the given path
 */
export function fileExists(p: string): boolean {
	try {
		return fs.existsSync(p);
	} catch {
		return false;
	}
}

/**
 * Resolve an executable from PATH environment variable
 */
export function resolveFromPATH(name: string): string | null {
	const exts = isWindows() ? ['.exe', '.cmd', ''] : [''];
	const parts = (process.env.PATH || '').split(path.delimiter);
	for (const dir of parts) {
		for (const ext of exts) {
			const candidate = path.join(dir, name + ext);
			if (fileExists(candidate)) return candidate;
		}
	}
	return null;
}

/**
 * Locate the uv binary.
 * Search order:
 * 1. ENVKEEP_UV environment variable
 * 2. PATH
 */
export function uvBinary(): string | null {
	const envPath = process.env.ENVKEEP_UV;
	if (envPath && fileExists(envPath)) return envPath;
	return resolveFromPATH('uv');
}

export interface CommandResult {
	stdout: string;
	stderr: string;
	code: number;
}

/**
 * Run an external command, collecting its output
 */
export function runCommand(bin: string, args: string[]): Promise<CommandResult> {
	logger.debug(`exec ${bin} ${args.join(' ')}`);
	return new Promise((resolve, reject) => {
		const child = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'], env: process.env });
		let out = '';
		let err = '';
		child.stdout.on('data', (d: Buffer) => out += d.toString());
		child.stderr.on('data', (d: Buffer) => err += d.toString());
		child.on('error', reject);
		child.on('close', (code) => resolve({ stdout: out, stderr: err, code: code ?? 1 }));
	});
}
