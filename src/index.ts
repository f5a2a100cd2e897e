/**
 * envkeep library entry point
 */
export * from './types';
export { EnvKeepError, ErrorCodes, ok, fail } from './utils/errors';
export type { ErrorCode } from './utils/errors';
export { logger } from './utils/logger';
export { loadConfig, DEFAULT_CONFIG } from './utils/config';
export type { ResolvedConfig, EnvKeepConfig } from './utils/config';
export { BaseMetadataStore, validateName } from './core/metadata-store';
export type { MetadataStore, CreateOptions } from './core/metadata-store';
export { FileMetadataStore, METADATA_FILE, LOCK_FILE } from './core/file-store';
export { MemoryMetadataStore } from './core/memory-store';
export { UsageTracker, systemClock, usageMetrics, daysSinceUse, ageDays } from './core/usage-tracker';
export { classifyHealth, matchHealthRule, HEALTH_RULES, DEFAULT_HEALTH_POLICY } from './core/health';
export type { HealthRule } from './core/health';
export { planCleanup, cleanupReasons, describeReason, DEFAULT_CLEANUP_POLICY } from './core/cleanup-planner';
export {
  generateLock,
  serializeLock,
  deserializeLock,
  thawLock,
  currentPlatform,
  toRequirement,
  LOCK_FORMAT_VERSION,
} from './core/lockfile';
export { requirementName, validateRequirements, mergeTracked } from './core/packages';
export { environmentAnalytics, usageSummary, usageCategory } from './core/analytics';
export { EnvironmentService } from './core/environment-service';
export type {
  EnvironmentBackend,
  EnvironmentServiceOptions,
  EditChanges,
  CleanupOptions,
  ThawOptions,
  ThawOutcome,
  FreezeOptions,
} from './core/environment-service';
export { getManager, BaseEnvironmentManager, UvManager, VenvManager } from './managers';
