import { managerConfigSchema } from "../config/config-schema.js";

/** Delta update manager configuration with sensible defaults */
export interface ManagerConfig {
  // Resource limits
  maxConcurrentSessions?: number; // default: 50 live sessions

  // Timeouts
  maxSessionLifetimeMs?: number; // default: 0 (disabled)
  cancelGracePeriodMs?: number; // default: 30000; 0 waits for the operation indefinitely

  // Retention of terminal sessions
  reaper?: {
    retentionMs?: number; // default: 300000 (5 minutes)
    intervalMs?: number; // default: 30000
  };
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<ManagerConfig, "reaper">> & {
  reaper: Required<NonNullable<ManagerConfig["reaper"]>>;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  maxConcurrentSessions: 50,
  maxSessionLifetimeMs: 0,
  cancelGracePeriodMs: 30000,
  reaper: {
    retentionMs: 300000,
    intervalMs: 30000,
  },
};

export function resolveConfig(config: ManagerConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = managerConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  return {
    maxConcurrentSessions: config.maxConcurrentSessions ?? DEFAULT_CONFIG.maxConcurrentSessions,
    maxSessionLifetimeMs: config.maxSessionLifetimeMs ?? DEFAULT_CONFIG.maxSessionLifetimeMs,
    cancelGracePeriodMs: config.cancelGracePeriodMs ?? DEFAULT_CONFIG.cancelGracePeriodMs,
    reaper: {
      retentionMs: config.reaper?.retentionMs ?? DEFAULT_CONFIG.reaper.retentionMs,
      intervalMs: config.reaper?.intervalMs ?? DEFAULT_CONFIG.reaper.intervalMs,
    },
  };
}
