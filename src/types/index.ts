/**
 * Core type definitions for envkeep
 */
import type { EnvKeepError } from '../utils/errors';

export enum BackendKind {
  UV = 'uv',
  VENV = 'venv',
}

export enum HealthTier {
  HEALTHY = 'healthy',
  WARNING = 'warning',
  NEEDS_ATTENTION = 'needs-attention',
}

export interface EnvironmentRecord {
  name: string;
  description: string | null;
  tags: string[];
  pythonVersion: string;
  createdAt: Date;
  lastUsed: Date | null;
  usageCount: number;
  /** Advisory only; nothing enforces exclusive activation */
  active: boolean;
  projectRoot: string | null;
  /** Cached result of the last directory scan, may be stale */
  sizeBytes: number | null;
  /** Requirement specs added with `add`, in the order first added */
  trackedPackages: string[];
}

export interface Clock {
  now(): Date;
}

export type Result<T, E extends EnvKeepError = EnvKeepError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface HealthPolicy {
  criticalDays: number;
  staleDays: number;
  lowUsageThreshold: number;
}

export interface CleanupPolicy {
  unusedDays: number;
  lowUsageThreshold: number;
  includeLowUsage: boolean;
}

export interface UsageMetrics {
  ageDays: number;
  /** Infinity when the environment was never activated */
  daysSinceUse: number;
  usageFrequency: number;
}

export type CleanupReason =
  | { kind: 'never-used' }
  | { kind: 'stale'; days: number }
  | { kind: 'low-usage'; count: number };

export interface CleanupCandidate {
  name: string;
  reasons: CleanupReason[];
  daysSinceUse: number;
}

export type CleanupMode = 'dry-run' | 'interactive' | 'force';

export interface CleanupResult {
  mode: CleanupMode;
  removed: string[];
  /** Dry run only: what a real run would remove */
  wouldRemove: string[];
  /** Interactive candidates that were declined */
  skipped: string[];
  failed: Array<{ name: string; error: EnvKeepError }>;
  /** Sum of the cached sizes of removed (or, in dry-run, removable) environments */
  spaceFreed: number;
}

export interface Platform {
  system: string;
  machine: string;
}

export interface Dependency {
  name: string;
  version: string;
}

/**
 * Materializes and removes environments; implemented by the uv and venv
 * backends.
 */
export interface EnvironmentProvisioner {
  /** Resolves to the environment directory */
  create(name: string, pythonVersion: string): Promise<Result<string>>;
  remove(name: string): Promise<Result<void>>;
  computeSizeBytes(name: string): Promise<Result<number>>;
  exists(name: string): Promise<boolean>;
  listEnvironments(): Promise<string[]>;
  /** Installs `pip` requirement specs such as `requests` or `django==4.2` */
  install(name: string, requirements: readonly string[]): Promise<Result<void>>;
  activationScript(name: string): string;
}

export interface DependencyIntrospector {
  snapshotDependencies(name: string): Promise<Result<Dependency[]>>;
}

export interface FreezeListing {
  environmentName: string;
  trackedOnly: boolean;
  /** Requirement lines, `name==version` for installed packages */
  packages: string[];
}

export interface LockSnapshot {
  formatVersion: number;
  generatedAt: Date;
  environmentName: string;
  pythonVersion: string;
  dependencies: readonly Dependency[];
  platform: Platform;
}

export type Advisory =
  | { code: 'VERSION_MISMATCH'; expected: string; actual: string }
  | { code: 'INCOMPATIBLE_PLATFORM'; expected: Platform; actual: Platform };

export interface ThawPlan {
  environmentName: string;
  instructions: Dependency[];
  advisories: Advisory[];
}

export interface EnvironmentAnalytics {
  name: string;
  pythonVersion: string;
  createdAt: Date;
  lastUsed: Date | null;
  usageCount: number;
  ageDays: number;
  daysSinceUse: number;
  usageFrequency: number;
  health: HealthTier;
  tags: string[];
  description: string | null;
  projectRoot: string | null;
  sizeBytes: number | null;
}

export interface UsageSummary {
  totalEnvironments: number;
  unusedEnvironments: number;
  environmentsByUsage: Record<string, number>;
  mostUsed: Array<{ name: string; usageCount: number; lastUsed: Date | null }>;
  totalSizeBytes: number;
  efficiencyPercent: number;
}

export type ConsistencyIssue =
  | { kind: 'metadata-without-environment'; name: string; path: string }
  | { kind: 'environment-without-metadata'; name: string; path: string }
  | { kind: 'corrupt-metadata'; name: string; path: string; reason: string };
